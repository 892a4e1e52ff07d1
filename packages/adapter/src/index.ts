export { createStorageRuntime } from '@/runtime';
export type { StorageRuntime, StorageRuntimeOptions } from '@/runtime';

export {
  findStorageSource,
  getConfig,
  loadConfig,
  loadEnvFiles,
  resetConfigForTests,
  storageSourceSchema,
} from '@/config';
export type { Config, StorageSourceConfig } from '@/config';

export { getLogger, initTelemetry } from '@/telemetry';
export type { Logger, TelemetryStatus } from '@/telemetry';

export { ResourceAddress, joinPath } from '@/services/storage/address';
export { StorageClient } from '@/services/storage/client';
export type { StorageClientOptions } from '@/services/storage/client';
export { ClientFactory, createS3Backend, fnv1a32 } from '@/services/storage/factory';
export type { BackendBuilder, BackendSettings, ClientSettings } from '@/services/storage/factory';
export { S3Backend } from '@/services/storage/s3-backend';
export type { S3BackendOptions } from '@/services/storage/s3-backend';
export { NotificationStream, readNotifications } from '@/services/storage/notification-stream';
export type * from '@/services/storage/backend';
export * from '@/services/storage/errors';
export { isVirtualHostStyle, isValidBucketName, resolveBucketAndObject } from '@/services/storage/resolver';
export { applyCannedPolicy, cannedPolicyFor, cannedPolicyRules, isCannedPolicy } from '@/services/storage/policy';
export { parseArn } from '@/services/storage/notifications';
export { isContentFailure } from '@/services/storage/types';
export type {
  CannedPolicy,
  ContentEntry,
  ContentFailure,
  ContentItem,
  CopyOptions,
  EntryType,
  ItemErrorPolicy,
  ListOptions,
  NotificationConfig,
  PutOptions,
  RemoveOptions,
  ShareUploadResult,
  StorageEvent,
  StorageEventType,
  WatchHandle,
  WatchParams,
} from '@/services/storage/types';
export type { WatchOptions } from '@/services/storage/watch';
