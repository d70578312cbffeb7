import type { OpenGraphImage } from '@ogp-extractor/shared/types';
import { parseDimension } from '@ogp-extractor/shared';
import {
  IMAGE_HEIGHT_PROP,
  IMAGE_PROP,
  IMAGE_SECURE_URL_PROP,
  IMAGE_TYPE_PROP,
  IMAGE_URL_PROP,
  IMAGE_WIDTH_PROP,
} from '../property-names.js';
import type { ConsumeOutcome, StructuralParser } from './types.js';

interface ImageEntry {
  root?: string;
  url?: string;
  secureUrl?: string;
  type?: string;
  width?: string;
  height?: string;
}

type ImageSlot = Exclude<keyof ImageEntry, 'root'>;

const SLOTS_BY_PROPERTY: ReadonlyMap<string, ImageSlot> = new Map<string, ImageSlot>([
  [IMAGE_URL_PROP, 'url'],
  [IMAGE_SECURE_URL_PROP, 'secureUrl'],
  [IMAGE_TYPE_PROP, 'type'],
  [IMAGE_WIDTH_PROP, 'width'],
  [IMAGE_HEIGHT_PROP, 'height'],
]);

/**
 * Groups `og:image` and its structured sub-properties into image entries.
 *
 * A root `image` declaration always opens a new entry; sub-properties attach to the entry
 * opened most recently. A sub-property seen before any root creates an orphan entry, which
 * {@link finalize} later drops because it has no root value.
 */
export class ImageGrouper implements StructuralParser {
  private readonly entries: ImageEntry[] = [];
  private current: ImageEntry | undefined;

  consume(property: string, content: string): ConsumeOutcome {
    if (property === IMAGE_PROP) {
      this.current = { root: content };
      this.entries.push(this.current);
      return 'discard';
    }

    const slot = SLOTS_BY_PROPERTY.get(property);
    if (!slot) {
      return 'discard';
    }

    if (!this.current) {
      this.current = {};
      this.entries.push(this.current);
    }
    this.current[slot] = content;

    // Images never go to the property table
    return 'discard';
  }

  /** Drops every entry whose root value is missing or empty. */
  finalize(): void {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (!this.entries[i]?.root) {
        this.entries.splice(i, 1);
      }
    }
  }

  getImages(): OpenGraphImage[] | undefined {
    if (this.entries.length === 0) {
      return undefined;
    }

    return this.entries.map((entry) => {
      const root = entry.root ?? '';
      const image: OpenGraphImage = {
        image: root,
        url: entry.url ?? root,
        width: parseDimension(entry.width),
        height: parseDimension(entry.height),
      };
      if (entry.secureUrl !== undefined) {
        image.secureUrl = entry.secureUrl;
      }
      if (entry.type !== undefined) {
        image.type = entry.type;
      }
      return image;
    });
  }
}
