export type StorageOperation =
  | 'list'
  | 'stat'
  | 'get'
  | 'put'
  | 'copy'
  | 'remove'
  | 'make-bucket'
  | 'policy'
  | 'notification'
  | 'watch'
  | 'share';

export interface StorageOperationAttributes {
  operation: StorageOperation;
  bucket: string;
  result: 'success' | 'failure';
}

export interface TelemetryStatus {
  loggerInitialized: boolean;
  metricsEnabled: boolean;
}
