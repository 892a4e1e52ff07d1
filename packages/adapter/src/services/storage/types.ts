import type { ResourceAddress } from '@/services/storage/address';
import type { StorageClient } from '@/services/storage/client';
import type { StorageError } from '@/services/storage/errors';

export type EntryType = 'object' | 'directory' | 'incomplete';

export interface ContentEntry {
  url: ResourceAddress;
  size: number;
  time: Date;
  type: EntryType;
}

export interface ContentFailure {
  error: StorageError;
}

/** One element of a listing: either an entry or an inline error. */
export type ContentItem = ContentEntry | ContentFailure;

export const isContentFailure = (item: ContentItem): item is ContentFailure => 'error' in item;

/**
 * What a listing does after emitting a per-item error: keep enumerating the
 * remaining sources, or end the stream.
 */
export type ItemErrorPolicy = 'continue' | 'stop';

export interface ListOptions {
  recursive?: boolean;
  incomplete?: boolean;
  signal?: AbortSignal;
  onItemError?: ItemErrorPolicy;
}

export interface WatchParams {
  events: string[];
  prefix?: string;
  suffix?: string;
}

export type StorageEventType = 'create' | 'remove';

export interface StorageEvent {
  readonly time: Date;
  readonly size: number;
  readonly url: string;
  /** Client whose watch produced the event. */
  readonly client: StorageClient;
  readonly type: StorageEventType;
}

export interface WatchHandle {
  readonly events: AsyncIterable<StorageEvent>;
  readonly errors: AsyncIterable<StorageError>;
  /** Ends both streams; safe to call more than once. */
  close(): void;
}

export interface NotificationConfig {
  id: string;
  arn: string;
  events: string[];
  prefix: string;
  suffix: string;
}

export type CannedPolicy = 'none' | 'readonly' | 'writeonly' | 'readwrite';

export interface PutOptions {
  contentType?: string;
  onProgress?: (bytesTransferred: number) => void;
}

export interface CopyOptions {
  onProgress?: (bytesTransferred: number) => void;
}

export interface RemoveOptions {
  incomplete?: boolean;
}

export interface ShareUploadResult {
  url: string;
  fields: Record<string, string>;
}
