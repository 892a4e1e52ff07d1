import { InvalidArgumentError } from '@/services/storage/errors';

const ADDRESS_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/([^/]+)(\/.*)?$/i;

/**
 * Parsed target of a storage client: `scheme://host/path`.
 *
 * The path is kept raw (never percent-decoded or re-encoded) so object keys
 * round-trip untouched. Instances are immutable; use `withPath` to derive a
 * new address.
 */
export class ResourceAddress {
  readonly scheme: string;

  readonly host: string;

  readonly path: string;

  readonly separator: string;

  constructor(scheme: string, host: string, path: string, separator = '/') {
    this.scheme = scheme;
    this.host = host;
    this.path = path;
    this.separator = separator;
    Object.freeze(this);
  }

  static parse(value: string): ResourceAddress {
    const match = value.trim().match(ADDRESS_PATTERN);
    if (!match) {
      throw new InvalidArgumentError(`Unable to parse storage URL '${value}'`);
    }

    const [, scheme = '', host = '', path = ''] = match;
    return new ResourceAddress(scheme.toLowerCase(), host, path);
  }

  get isSecure(): boolean {
    return this.scheme !== 'http';
  }

  withPath(path: string): ResourceAddress {
    return new ResourceAddress(this.scheme, this.host, path, this.separator);
  }

  hasTrailingSeparator(): boolean {
    return this.path.endsWith(this.separator);
  }

  toString(): string {
    return `${this.scheme}://${this.host}${this.path}`;
  }
}

/**
 * Joins path segments with `separator`, collapsing repeated separators and
 * always producing a leading one. A trailing separator on the last segment is
 * kept so directory entries stay recognizable.
 */
export const joinPath = (separator: string, ...segments: string[]): string => {
  const parts = segments
    .flatMap((segment) => segment.split(separator))
    .filter((part) => part.length > 0);
  const last = segments[segments.length - 1] ?? '';
  const trailing = last.endsWith(separator) && parts.length > 0 ? separator : '';
  return `${separator}${parts.join(separator)}${trailing}`;
};
