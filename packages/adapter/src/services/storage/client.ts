import { Transform, type Readable } from 'node:stream';
import type { ResourceAddress } from '@/services/storage/address';
import type { StorageBackend } from '@/services/storage/backend';
import {
  BucketNameEmptyError,
  BucketNameTopLevelError,
  InvalidArgumentError,
  translateError,
  type TranslatedOperation,
  type TranslationContext,
} from '@/services/storage/errors';
import { listContents, type ListingSnapshot } from '@/services/storage/listing';
import { Mutex } from '@/services/storage/mutex';
import {
  addNotificationConfig,
  listNotificationConfigs,
  removeNotificationConfig,
} from '@/services/storage/notifications';
import { applyCannedPolicy, cannedPolicyFor, cannedPolicyRules, isCannedPolicy } from '@/services/storage/policy';
import { assertValidBucketName, isVirtualHostStyle, resolveBucketAndObject } from '@/services/storage/resolver';
import { statContent } from '@/services/storage/stat';
import {
  isContentFailure,
  type CannedPolicy,
  type ContentEntry,
  type ContentItem,
  type CopyOptions,
  type ListOptions,
  type NotificationConfig,
  type PutOptions,
  type RemoveOptions,
  type ShareUploadResult,
  type WatchHandle,
  type WatchParams,
} from '@/services/storage/types';
import { watchBucket, type WatchOptions } from '@/services/storage/watch';
import { getLogger, recordStorageOperation, withSpan } from '@/telemetry';
import type { StorageOperation } from '@/telemetry/types';

const clientLogger = () => getLogger('StorageClient');

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';
const DEFAULT_REGION = 'us-east-1';
const MAX_PRESIGN_EXPIRY_SECONDS = 7 * 24 * 60 * 60;

export interface StorageClientOptions {
  address: ResourceAddress;
  backend: StorageBackend;
  /** Defaults to detection from the host name. */
  virtualStyle?: boolean;
}

const assertExpiry = (expiresInSeconds: number): void => {
  if (
    !Number.isInteger(expiresInSeconds) ||
    expiresInSeconds < 1 ||
    expiresInSeconds > MAX_PRESIGN_EXPIRY_SECONDS
  ) {
    throw new InvalidArgumentError(
      `Expiry must be between 1 and ${MAX_PRESIGN_EXPIRY_SECONDS} seconds, got ${expiresInSeconds}`
    );
  }
};

/** Upload body ended before its declared size. */
class PrematureEndError extends Error {
  readonly code = 'UnexpectedEOF';

  constructor(expected: number, written: number) {
    super(`Upload body ended after ${written} of ${expected} bytes`);
    this.name = 'PrematureEndError';
  }
}

/**
 * Filesystem-style client for one storage URL. The URL decides what every
 * operation addresses: the backend root, a bucket, or a key or prefix inside
 * a bucket.
 */
export class StorageClient {
  readonly address: ResourceAddress;

  readonly virtualStyle: boolean;

  private readonly backend: StorageBackend;

  private readonly mutex = new Mutex();

  constructor(options: StorageClientOptions) {
    this.address = options.address;
    this.backend = options.backend;
    this.virtualStyle = options.virtualStyle ?? isVirtualHostStyle(options.address.host);
  }

  getURL(): ResourceAddress {
    return this.address;
  }

  private snapshot(): ListingSnapshot {
    const { bucketName, objectName } = resolveBucketAndObject(this.address, this.virtualStyle);
    return {
      backend: this.backend,
      address: this.address,
      virtualStyle: this.virtualStyle,
      bucketName,
      objectName,
    };
  }

  private context(operation: TranslatedOperation, snapshot: ListingSnapshot): TranslationContext {
    return {
      operation,
      bucket: snapshot.bucketName,
      object: snapshot.objectName,
      path: this.address.toString(),
    };
  }

  private async track<T>(operation: StorageOperation, bucket: string, fn: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await withSpan(
        `storage.${operation}`,
        { 'storage.operation': operation, 'storage.bucket': bucket, 'storage.url': this.address.toString() },
        fn
      );
      recordStorageOperation({ operation, bucket, result: 'success' }, Date.now() - startedAt);
      return result;
    } catch (error) {
      recordStorageOperation({ operation, bucket, result: 'failure' }, Date.now() - startedAt);
      clientLogger().debug({ err: error, operation, url: this.address.toString() }, 'Storage operation failed');
      throw error;
    }
  }

  /** Runs a backend call, translating whatever it throws. */
  private async call<T>(
    operation: TranslatedOperation,
    snapshot: ListingSnapshot,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw translateError(error, this.context(operation, snapshot));
    }
  }

  private requireBucket(snapshot: ListingSnapshot): string {
    if (snapshot.bucketName === '') {
      throw new BucketNameEmptyError();
    }
    return snapshot.bucketName;
  }

  /**
   * Lazily lists the entries below the client URL. The client state is
   * captured once, when the first item is pulled.
   */
  async *list(options: ListOptions = {}): AsyncGenerator<ContentItem, void, undefined> {
    const snapshot = await this.mutex.runExclusive(() => this.snapshot());
    const startedAt = Date.now();
    let failed = false;
    try {
      for await (const item of listContents(snapshot, options)) {
        if (isContentFailure(item)) {
          failed = true;
        }
        yield item;
      }
    } finally {
      recordStorageOperation(
        { operation: 'list', bucket: snapshot.bucketName, result: failed ? 'failure' : 'success' },
        Date.now() - startedAt
      );
    }
  }

  /** Metadata of the client URL; the client lock is held for the whole call. */
  async stat(): Promise<ContentEntry> {
    return this.mutex.runExclusive(() => {
      const snapshot = this.snapshot();
      return this.track('stat', snapshot.bucketName, () => statContent(snapshot));
    });
  }

  async get(): Promise<Readable> {
    const snapshot = this.snapshot();
    return this.track('get', snapshot.bucketName, async () => {
      const bucket = this.requireBucket(snapshot);
      return this.call('get', snapshot, () => this.backend.getObject(bucket, snapshot.objectName));
    });
  }

  /**
   * Uploads `size` bytes read from `body` to the client URL and resolves with
   * the number of bytes handed to the backend.
   */
  async put(body: Readable, size: number, options: PutOptions = {}): Promise<number> {
    const snapshot = this.snapshot();
    return this.track('put', snapshot.bucketName, async () => {
      const bucket = this.requireBucket(snapshot);
      let written = 0;
      const counter = new Transform({
        transform(chunk: Buffer, _encoding, callback) {
          written += chunk.length;
          options.onProgress?.(written);
          callback(null, chunk);
        },
        flush(callback) {
          if (written < size) {
            callback(new PrematureEndError(size, written));
            return;
          }
          callback();
        },
      });
      body.once('error', (error) => counter.destroy(error));
      body.pipe(counter);

      try {
        await this.backend.putObject({
          bucket,
          key: snapshot.objectName,
          body: counter,
          size,
          contentType: options.contentType || DEFAULT_CONTENT_TYPE,
        });
      } catch (error) {
        body.unpipe(counter);
        counter.destroy();
        throw translateError(error, {
          ...this.context('put', snapshot),
          expectedSize: size,
          writtenSize: written,
        });
      }
      return written;
    });
  }

  /** Server-side copy of `source` (`/<bucket>/<key>`) to the client URL. */
  async copy(source: string, size: number, options: CopyOptions = {}): Promise<void> {
    const snapshot = this.snapshot();
    await this.track('copy', snapshot.bucketName, async () => {
      const bucket = this.requireBucket(snapshot);
      await this.call('copy', snapshot, () => this.backend.copyObject(bucket, snapshot.objectName, source));
      options.onProgress?.(size);
    });
  }

  /**
   * Removes the object at the client URL, or the bucket when the URL names no
   * object. With `incomplete`, aborts the pending uploads of the object.
   */
  async remove(options: RemoveOptions = {}): Promise<void> {
    const snapshot = this.snapshot();
    await this.track('remove', snapshot.bucketName, async () => {
      const bucket = this.requireBucket(snapshot);
      const { objectName } = snapshot;
      if (options.incomplete && objectName !== '') {
        await this.call('remove', snapshot, () => this.backend.removeIncompleteUpload(bucket, objectName));
        return;
      }
      if (objectName === '') {
        await this.call('remove', snapshot, () => this.backend.removeBucket(bucket));
        return;
      }
      await this.call('remove', snapshot, () => this.backend.removeObject(bucket, objectName));
    });
  }

  async makeBucket(region = DEFAULT_REGION): Promise<void> {
    const snapshot = this.snapshot();
    await this.track('make-bucket', snapshot.bucketName, async () => {
      if (snapshot.objectName !== '') {
        throw new BucketNameTopLevelError();
      }
      assertValidBucketName(snapshot.bucketName);
      await this.call('other', snapshot, () => this.backend.makeBucket(snapshot.bucketName, region));
    });
  }

  async getAccess(): Promise<CannedPolicy> {
    const snapshot = this.snapshot();
    return this.track('policy', snapshot.bucketName, async () => {
      const bucket = this.requireBucket(snapshot);
      const document = await this.call('other', snapshot, () => this.backend.getBucketPolicy(bucket));
      return cannedPolicyFor(document, bucket, snapshot.objectName);
    });
  }

  async setAccess(policy: string): Promise<void> {
    const snapshot = this.snapshot();
    await this.track('policy', snapshot.bucketName, async () => {
      if (!isCannedPolicy(policy)) {
        throw new InvalidArgumentError(`Unknown access policy '${policy}'`);
      }
      const bucket = this.requireBucket(snapshot);
      const current = await this.call('other', snapshot, () => this.backend.getBucketPolicy(bucket));
      const next = applyCannedPolicy(current, bucket, snapshot.objectName, policy);
      if (current === null && next === null) {
        return;
      }
      await this.call('other', snapshot, () => this.backend.setBucketPolicy(bucket, next));
    });
  }

  /** Canned rules at or below the client URL, keyed by `<bucket>/<prefix>*`. */
  async getAccessRules(): Promise<Record<string, CannedPolicy>> {
    const snapshot = this.snapshot();
    return this.track('policy', snapshot.bucketName, async () => {
      const bucket = this.requireBucket(snapshot);
      const document = await this.call('other', snapshot, () => this.backend.getBucketPolicy(bucket));
      return cannedPolicyRules(document, bucket, snapshot.objectName);
    });
  }

  async addNotificationConfig(arn: string, events: string[], prefix = '', suffix = ''): Promise<void> {
    const snapshot = this.snapshot();
    await this.track('notification', snapshot.bucketName, async () => {
      assertValidBucketName(snapshot.bucketName);
      const bucket = snapshot.bucketName;
      await this.call('other', snapshot, () =>
        addNotificationConfig(this.backend, bucket, { arn, events, prefix, suffix })
      );
    });
  }

  async removeNotificationConfig(arn = ''): Promise<void> {
    const snapshot = this.snapshot();
    await this.track('notification', snapshot.bucketName, async () => {
      assertValidBucketName(snapshot.bucketName);
      const bucket = snapshot.bucketName;
      await this.call('other', snapshot, () => removeNotificationConfig(this.backend, bucket, arn));
    });
  }

  async listNotificationConfigs(arn = ''): Promise<NotificationConfig[]> {
    const snapshot = this.snapshot();
    return this.track('notification', snapshot.bucketName, async () => {
      assertValidBucketName(snapshot.bucketName);
      const bucket = snapshot.bucketName;
      return this.call('other', snapshot, () => listNotificationConfigs(this.backend, bucket, arn));
    });
  }

  /**
   * Opens a notification subscription. Arguments are validated under the
   * client lock; the subscription itself runs without it.
   */
  async watch(params: WatchParams, options: WatchOptions = {}): Promise<WatchHandle> {
    return this.mutex.runExclusive(() => {
      const snapshot = this.snapshot();
      return this.track('watch', snapshot.bucketName, async () =>
        watchBucket({ ...snapshot, client: this }, params, options)
      );
    });
  }

  /**
   * Only checks the bucket name of the client URL. Subscriptions end through
   * the handle returned by `watch`.
   */
  async unwatch(_params: WatchParams): Promise<void> {
    assertValidBucketName(this.snapshot().bucketName);
  }

  async shareDownload(expiresInSeconds: number): Promise<string> {
    const snapshot = this.snapshot();
    return this.track('share', snapshot.bucketName, async () => {
      assertExpiry(expiresInSeconds);
      const bucket = this.requireBucket(snapshot);
      return this.call('other', snapshot, () =>
        this.backend.presignedGetObject(bucket, snapshot.objectName, expiresInSeconds)
      );
    });
  }

  /**
   * Presigned form upload to the client URL. With `recursive`, any key that
   * starts with the URL's object name is accepted.
   */
  async shareUpload(recursive: boolean, expiresInSeconds: number, contentType?: string): Promise<ShareUploadResult> {
    const snapshot = this.snapshot();
    return this.track('share', snapshot.bucketName, async () => {
      assertExpiry(expiresInSeconds);
      const bucket = this.requireBucket(snapshot);
      return this.call('other', snapshot, () =>
        this.backend.presignedPostPolicy({
          bucket,
          key: snapshot.objectName,
          keyStartsWith: recursive,
          expiresInSeconds,
          contentType,
        })
      );
    });
  }
}
