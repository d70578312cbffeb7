export const TITLE_PROP = 'title';
export const TYPE_PROP = 'type';
export const URL_PROP = 'url';
export const DESCRIPTION_PROP = 'description';
export const SITE_NAME_PROP = 'site_name';

export const IMAGE_PROP = 'image';
export const IMAGE_STRUCT_PROP_PREFIX = 'image:';
export const IMAGE_URL_PROP = 'image:url';
export const IMAGE_SECURE_URL_PROP = 'image:secure_url';
export const IMAGE_TYPE_PROP = 'image:type';
export const IMAGE_WIDTH_PROP = 'image:width';
export const IMAGE_HEIGHT_PROP = 'image:height';

export const PROFILE_FIRST_NAME_PROP = 'first_name';
export const PROFILE_LAST_NAME_PROP = 'last_name';

export const ARTICLE_SECTION_PROP = 'section';
export const ARTICLE_PUBLISHED_TIME_PROP = 'published_time';
export const ARTICLE_MODIFIED_TIME_PROP = 'modified_time';
export const ARTICLE_EXPIRATION_TIME_PROP = 'expiration_time';
export const ARTICLE_AUTHOR_PROP = 'author';

export const PROFILE_OBJECT_TYPE = 'profile';
export const ARTICLE_OBJECT_TYPE = 'article';
