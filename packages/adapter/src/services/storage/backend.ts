import type { Readable } from 'node:stream';

export interface BucketInfo {
  name: string;
  creationDate: Date;
}

export interface ObjectInfo {
  key: string;
  size: number;
  lastModified: Date;
  storageClass?: string;
}

export interface IncompleteUploadInfo {
  key: string;
  uploadId: string;
  /** Sum of the sizes of the parts uploaded so far. */
  size: number;
  initiated: Date;
}

/**
 * Element of a backend enumeration. A failed page is reported once as
 * `{ ok: false }` and ends the enumeration it belongs to.
 */
export type ListResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface NotificationFilter {
  prefix?: string;
  suffix?: string;
}

export interface NotificationTarget extends NotificationFilter {
  id?: string;
  arn: string;
  events: string[];
}

export interface BucketNotification {
  topics: NotificationTarget[];
  queues: NotificationTarget[];
  lambdas: NotificationTarget[];
}

export interface NotificationRecord {
  eventName: string;
  eventTime: string;
  bucketName: string;
  /** Object key as delivered by the backend, still URL-escaped. */
  key: string;
  size: number;
}

export type NotificationInfo =
  | { ok: true; records: NotificationRecord[] }
  | { ok: false; error: unknown };

export interface ListenOptions {
  bucket: string;
  prefix: string;
  suffix: string;
  events: string[];
  signal: AbortSignal;
}

export interface PresignedPostInput {
  bucket: string;
  key: string;
  keyStartsWith: boolean;
  expiresInSeconds: number;
  contentType?: string;
}

export interface PresignedPost {
  url: string;
  fields: Record<string, string>;
}

export interface UploadInput {
  bucket: string;
  key: string;
  body: Readable;
  size: number;
  contentType: string;
}

/**
 * Narrow view of the storage-protocol SDK that the adapter consumes. Backends
 * report failures with the provider's own errors; translation happens in the
 * adapter.
 */
export interface StorageBackend {
  listBuckets(signal?: AbortSignal): Promise<BucketInfo[]>;
  /**
   * Keys under `prefix`. Non-recursive listings group by '/' and report each
   * common prefix as a zero-size entry whose key ends in '/'.
   */
  listObjects(
    bucket: string,
    prefix: string,
    recursive: boolean,
    signal?: AbortSignal
  ): AsyncIterable<ListResult<ObjectInfo>>;
  listIncompleteUploads(
    bucket: string,
    prefix: string,
    recursive: boolean,
    signal?: AbortSignal
  ): AsyncIterable<ListResult<IncompleteUploadInfo>>;
  bucketExists(bucket: string): Promise<boolean>;
  makeBucket(bucket: string, region: string): Promise<void>;
  removeBucket(bucket: string): Promise<void>;

  getObject(bucket: string, key: string): Promise<Readable>;
  putObject(input: UploadInput): Promise<void>;
  copyObject(bucket: string, key: string, source: string): Promise<void>;
  removeObject(bucket: string, key: string): Promise<void>;
  removeIncompleteUpload(bucket: string, key: string): Promise<void>;

  /** Raw policy document, or null when the bucket has none. */
  getBucketPolicy(bucket: string): Promise<string | null>;
  /** Stores `policy`, or deletes the bucket policy when null. */
  setBucketPolicy(bucket: string, policy: string | null): Promise<void>;

  getBucketNotification(bucket: string): Promise<BucketNotification>;
  setBucketNotification(bucket: string, notification: BucketNotification): Promise<void>;
  removeAllBucketNotification(bucket: string): Promise<void>;
  listenBucketNotification(options: ListenOptions): AsyncIterable<NotificationInfo>;

  presignedGetObject(bucket: string, key: string, expiresInSeconds: number): Promise<string>;
  presignedPostPolicy(input: PresignedPostInput): Promise<PresignedPost>;
}
