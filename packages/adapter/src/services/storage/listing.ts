import { joinPath, type ResourceAddress } from '@/services/storage/address';
import type { BucketInfo, ListResult, StorageBackend } from '@/services/storage/backend';
import { ObjectOnGlacierError, translateError } from '@/services/storage/errors';
import { entryPath } from '@/services/storage/resolver';
import type {
  ContentEntry,
  ContentItem,
  EntryType,
  ItemErrorPolicy,
  ListOptions,
} from '@/services/storage/types';

/** Archive tier whose objects cannot be read without a restore. */
export const GLACIER_STORAGE_CLASS = 'GLACIER';

/**
 * Immutable view of a client taken at the start of a listing. Every emitted
 * URL is derived from `address`; nothing is written back.
 */
export interface ListingSnapshot {
  backend: StorageBackend;
  address: ResourceAddress;
  virtualStyle: boolean;
  bucketName: string;
  objectName: string;
}

interface ListingSource {
  bucket: string;
  /** Path of an emitted entry for a key of this source. */
  pathFor: (key: string) => string;
}

interface KeyedEntry {
  key: string;
  size: number;
  time: Date;
}

type Outcome = 'next' | 'stop';

class ListingRun {
  private readonly policy: ItemErrorPolicy;

  readonly signal: AbortSignal | undefined;

  constructor(
    private readonly snapshot: ListingSnapshot,
    options: ListOptions
  ) {
    this.policy = options.onItemError ?? 'continue';
    this.signal = options.signal;
  }

  get aborted(): boolean {
    return this.signal?.aborted === true;
  }

  failure(error: unknown, bucket = this.snapshot.bucketName): ContentItem {
    return {
      error: translateError(error, {
        operation: 'list',
        bucket,
        object: this.snapshot.objectName,
        path: this.snapshot.address.toString(),
      }),
    };
  }

  /** Outcome after a per-item error has been emitted. */
  afterItemError(): Outcome {
    return this.policy === 'stop' ? 'stop' : 'next';
  }

  entry(path: string, type: EntryType, item: KeyedEntry): ContentEntry {
    return { url: this.snapshot.address.withPath(path), size: item.size, time: item.time, type };
  }

  /**
   * Entry for a non-recursive listing: zero-size keys ending in the separator
   * are pseudo-directories and carry the current time.
   */
  delimitedEntry(source: ListingSource, type: EntryType, item: KeyedEntry): ContentEntry {
    const { separator } = this.snapshot.address;
    if (item.key.endsWith(separator) && item.size === 0) {
      return this.entry(source.pathFor(item.key), 'directory', { ...item, time: new Date() });
    }
    return this.entry(source.pathFor(item.key), type, item);
  }

  isRoot(): boolean {
    return this.snapshot.bucketName === '' && this.snapshot.objectName === '';
  }

  async buckets(): Promise<BucketInfo[]> {
    return this.snapshot.backend.listBuckets(this.signal);
  }

  /** A bucket of a root listing: paths are rooted at the client path. */
  rootSource(bucket: BucketInfo): ListingSource {
    const { address } = this.snapshot;
    return {
      bucket: bucket.name,
      pathFor: (key: string) => joinPath(address.separator, address.path, bucket.name, key),
    };
  }

  /** The client's own bucket; virtual hosts drop the bucket segment. */
  bucketSource(bucket: string): ListingSource {
    const { address, virtualStyle } = this.snapshot;
    return {
      bucket,
      pathFor: (key: string) => entryPath(address, virtualStyle, bucket, key),
    };
  }

  directoryForBucket(bucket: BucketInfo): ContentEntry {
    const { address } = this.snapshot;
    return this.entry(joinPath(address.separator, address.path, bucket.name), 'directory', {
      key: bucket.name,
      size: 0,
      time: bucket.creationDate,
    });
  }
}

async function* drain<T>(
  run: ListingRun,
  results: AsyncIterable<ListResult<T>>,
  bucket: string,
  handle: (value: T) => ContentItem | null
): AsyncGenerator<ContentItem, Outcome, undefined> {
  for await (const result of results) {
    if (run.aborted) {
      return 'stop';
    }
    if (!result.ok) {
      yield run.failure(result.error, bucket);
      if (run.afterItemError() === 'stop') {
        return 'stop';
      }
      continue;
    }
    const item = handle(result.value);
    if (item) {
      yield item;
    }
  }
  return 'next';
}

async function* listFlat(run: ListingRun, snapshot: ListingSnapshot): AsyncGenerator<ContentItem, void, undefined> {
  const { bucketName, objectName, address, backend } = snapshot;

  if (run.isRoot()) {
    let buckets: BucketInfo[];
    try {
      buckets = await run.buckets();
    } catch (error) {
      yield run.failure(error);
      return;
    }
    for (const bucket of buckets) {
      if (run.aborted) {
        return;
      }
      yield run.directoryForBucket(bucket);
    }
    return;
  }

  if (objectName === '' && !address.hasTrailingSeparator()) {
    // Confirms the bucket from the bucket list instead of walking its keys.
    let buckets: BucketInfo[];
    try {
      buckets = await run.buckets();
    } catch (error) {
      yield run.failure(error);
      return;
    }
    const match = buckets.find((bucket) => bucket.name === bucketName);
    if (match && !run.aborted) {
      yield run.entry(address.path, 'directory', { key: match.name, size: 0, time: match.creationDate });
    }
    return;
  }

  const source = run.bucketSource(bucketName);
  yield* drain(run, backend.listObjects(bucketName, objectName, false, run.signal), bucketName, (object) =>
    run.delimitedEntry(source, 'object', { key: object.key, size: object.size, time: object.lastModified })
  );
}

async function* listRecursive(
  run: ListingRun,
  snapshot: ListingSnapshot
): AsyncGenerator<ContentItem, void, undefined> {
  const { bucketName, objectName, address, backend } = snapshot;

  const walk = (source: ListingSource, skipDirectoryMarkers: boolean) =>
    drain(run, backend.listObjects(source.bucket, objectName, true, run.signal), source.bucket, (object) => {
      if (object.storageClass === GLACIER_STORAGE_CLASS) {
        return { error: new ObjectOnGlacierError(object.key) };
      }
      if (skipDirectoryMarkers && object.size === 0 && object.key.endsWith(address.separator)) {
        return null;
      }
      return run.entry(source.pathFor(object.key), 'object', {
        key: object.key,
        size: object.size,
        time: object.lastModified,
      });
    });

  if (!run.isRoot()) {
    yield* walk(run.bucketSource(bucketName), true);
    return;
  }

  let buckets: BucketInfo[];
  try {
    buckets = await run.buckets();
  } catch (error) {
    yield run.failure(error);
    return;
  }

  for (const bucket of buckets) {
    if (run.aborted) {
      return;
    }
    yield run.directoryForBucket(bucket);
    // Root walks keep zero-size directory markers.
    const outcome = yield* walk(run.rootSource(bucket), false);
    if (outcome === 'stop') {
      return;
    }
  }
}

async function* listIncomplete(
  run: ListingRun,
  snapshot: ListingSnapshot,
  recursive: boolean
): AsyncGenerator<ContentItem, void, undefined> {
  const { bucketName, objectName, backend } = snapshot;

  let sources: ListingSource[];
  if (run.isRoot()) {
    try {
      const buckets = await run.buckets();
      sources = buckets.map((bucket) => (recursive ? run.rootSource(bucket) : run.bucketSource(bucket.name)));
    } catch (error) {
      yield run.failure(error);
      return;
    }
  } else {
    sources = [run.bucketSource(bucketName)];
  }

  for (const source of sources) {
    if (run.aborted) {
      return;
    }
    const uploads = backend.listIncompleteUploads(source.bucket, objectName, recursive, run.signal);
    const outcome = yield* drain(run, uploads, source.bucket, (upload) => {
      const item = { key: upload.key, size: upload.size, time: upload.initiated };
      return recursive
        ? run.entry(source.pathFor(upload.key), 'incomplete', item)
        : run.delimitedEntry(source, 'incomplete', item);
    });
    if (outcome === 'stop') {
      return;
    }
  }
}

/**
 * Streams the entries below a snapshot. The sequence is lazy: nothing is
 * requested from the backend until the first item is pulled, and each pull
 * advances the backend enumeration by at most one item.
 */
export async function* listContents(
  snapshot: ListingSnapshot,
  options: ListOptions = {}
): AsyncGenerator<ContentItem, void, undefined> {
  const run = new ListingRun(snapshot, options);

  if (options.incomplete) {
    yield* listIncomplete(run, snapshot, options.recursive === true);
  } else if (options.recursive) {
    yield* listRecursive(run, snapshot);
  } else {
    yield* listFlat(run, snapshot);
  }
}
