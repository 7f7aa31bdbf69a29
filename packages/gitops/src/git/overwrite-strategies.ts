import { YAMLSeq, isMap, isScalar, isSeq, parseDocument, type Document } from 'yaml';

/**
 * Turns the current text of a config file into the text to write back.
 * Returns the input unchanged when there is nothing to update. The operator
 * owns reading, writing and staging.
 */
export interface OverwriteStrategy {
  readonly description: string;
  update(content: string): string;
}

function parseStrict(content: string): Document.Parsed {
  const document = parseDocument(content);
  if (document.errors.length > 0) {
    throw document.errors[0];
  }
  return document;
}

// A block sequence written at the same column as its key (`images:\n- name: x`).
const UNINDENTED_SEQUENCE = /^( *)[^\s#-][^\n]*:[ \t]*\r?\n\1- /m;

/**
 * Serializes with the sequence indentation the file was written in, so
 * kustomize-style `- ` items at the key's column stay there.
 */
export function serializeLike(document: Document.Parsed, original: string): string {
  return document.toString({ indentSeq: !UNINDENTED_SEQUENCE.test(original) });
}

/**
 * Points the `images` entry for one image at a new tag, appending the entry
 * when the manifest does not list the image yet.
 */
export class ImageTagOverwrite implements OverwriteStrategy {
  constructor(
    private readonly imageName: string,
    private readonly tag: string
  ) {}

  get description(): string {
    return `image ${this.imageName} -> ${this.tag}`;
  }

  update(content: string): string {
    const document = parseStrict(content);
    const existing = document.get('images');
    const images = isSeq(existing) ? existing : new YAMLSeq();

    let matched = false;
    let changed = false;
    for (const item of images.items) {
      if (!isMap(item) || item.get('name') !== this.imageName) {
        continue;
      }
      matched = true;
      const current = item.get('newTag', true);
      if (isScalar(current) && String(current.value) === this.tag) {
        continue;
      }
      item.set('newTag', this.tag);
      changed = true;
    }

    if (matched && !changed) {
      return content;
    }
    if (!matched) {
      images.add(document.createNode({ name: this.imageName, newTag: this.tag }));
    }
    if (!isSeq(existing)) {
      document.set('images', images);
    }

    return serializeLike(document, content);
  }
}

export const CACHE_PREFIX_KEY = 'MEMCACHED_PREFIX';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time, second precision: `YYYY-MM-DDTHH:mm:ss`.
 */
export function formatCachePrefix(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Replaces the cache prefix in a ConfigMap's `data` with the current time so
 * caches are invalidated by the redeploy. Leaves documents without the key alone.
 */
export class CachePrefixOverwrite implements OverwriteStrategy {
  readonly description: string;

  constructor(
    private readonly key: string = CACHE_PREFIX_KEY,
    private readonly now: () => Date = () => new Date()
  ) {
    this.description = `bust ${key}`;
  }

  update(content: string): string {
    const document = parseStrict(content);
    const data = document.get('data');
    if (!isMap(data) || !data.has(this.key)) {
      return content;
    }
    data.set(this.key, formatCachePrefix(this.now()));
    return serializeLike(document, content);
  }
}
