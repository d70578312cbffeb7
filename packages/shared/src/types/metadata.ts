/** OGP vocabularies whose properties are recognised. */
export type Namespace = 'og' | 'profile' | 'article';

/** Prefix token bound to each namespace, e.g. `{ og: 'og', profile: 'profile', article: 'article' }`. */
export type PrefixMap = Readonly<Record<Namespace, string>>;

export interface Attribute {
  name: string;
  value: string;
}

/** A `<meta property="..." content="...">` declaration, in document order. */
export interface MetaDeclaration {
  property: string;
  content: string;
}

export interface OpenGraphImage {
  /** Content of the root `og:image` declaration that opened this structure. */
  image: string;
  /** `og:image:url` when declared, otherwise the root value. */
  url: string;
  secureUrl?: string;
  type?: string;
  width: number;
  height: number;
}

export interface OpenGraphArticle {
  publishedTime?: string;
  modifiedTime?: string;
  expirationTime?: string;
  section?: string;
  /** URLs of the authors' profiles, in declaration order. */
  authors?: string[];
}

export interface OpenGraphResult {
  title: string;
  type: string;
  url: string;
  description?: string;
  siteName?: string;
  images: OpenGraphImage[];
  /** First and last name of the profile object, only when `og:type` is `profile`. */
  profile?: string;
  article?: OpenGraphArticle;
}
