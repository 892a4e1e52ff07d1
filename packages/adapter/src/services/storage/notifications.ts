import type { BucketNotification, NotificationTarget, StorageBackend } from '@/services/storage/backend';
import { InvalidArgumentError } from '@/services/storage/errors';
import type { NotificationConfig } from '@/services/storage/types';

export const OBJECT_CREATED_ALL = 's3:ObjectCreated:*';
export const OBJECT_REMOVED_ALL = 's3:ObjectRemoved:*';

const EVENT_TYPES: Record<string, string> = {
  put: OBJECT_CREATED_ALL,
  delete: OBJECT_REMOVED_ALL,
};

/** Maps event names ('put', 'delete') to backend event types; unknown names are rejected. */
export const toNotificationEvents = (events: string[]): string[] =>
  events.map((event) => {
    const mapped = EVENT_TYPES[event];
    if (!mapped) {
      throw new InvalidArgumentError(`Unsupported event '${event}', expected 'put' or 'delete'`);
    }
    return mapped;
  });

type TargetKind = keyof BucketNotification;

const SERVICE_TARGETS: Record<string, TargetKind> = {
  sns: 'topics',
  sqs: 'queues',
  lambda: 'lambdas',
};

const TARGET_KINDS: TargetKind[] = ['topics', 'queues', 'lambdas'];

export interface ParsedArn {
  partition: string;
  service: string;
  region: string;
  account: string;
  resource: string;
}

/** Splits `arn:partition:service:region:account:resource`. */
export const parseArn = (arn: string): ParsedArn => {
  const fields = arn.split(':');
  if (fields.length !== 6 || fields[0] !== 'arn') {
    throw new InvalidArgumentError(`Invalid notification target ARN '${arn}'`);
  }
  const [, partition = '', service = '', region = '', account = '', resource = ''] = fields;
  return { partition, service, region, account, resource };
};

const targetKindFor = (arn: string): TargetKind => {
  const { service } = parseArn(arn);
  const kind = SERVICE_TARGETS[service];
  if (!kind) {
    throw new InvalidArgumentError(`Unsupported notification service '${service}' in ARN '${arn}'`);
  }
  return kind;
};

export interface NotificationRequest {
  arn: string;
  events: string[];
  prefix: string;
  suffix: string;
}

export const addNotificationConfig = async (
  backend: StorageBackend,
  bucket: string,
  request: NotificationRequest
): Promise<void> => {
  const kind = targetKindFor(request.arn);
  const events = toNotificationEvents(request.events);

  const notification = await backend.getBucketNotification(bucket);
  const target: NotificationTarget = { arn: request.arn, events };
  if (request.prefix) {
    target.prefix = request.prefix;
  }
  if (request.suffix) {
    target.suffix = request.suffix;
  }
  await backend.setBucketNotification(bucket, {
    ...notification,
    [kind]: [...notification[kind], target],
  });
};

/** Removes every target with `arn`, or every notification of the bucket when `arn` is empty. */
export const removeNotificationConfig = async (
  backend: StorageBackend,
  bucket: string,
  arn: string
): Promise<void> => {
  if (arn === '') {
    await backend.removeAllBucketNotification(bucket);
    return;
  }

  const kind = targetKindFor(arn);
  const notification = await backend.getBucketNotification(bucket);
  await backend.setBucketNotification(bucket, {
    ...notification,
    [kind]: notification[kind].filter((target) => target.arn !== arn),
  });
};

export const listNotificationConfigs = async (
  backend: StorageBackend,
  bucket: string,
  arn: string
): Promise<NotificationConfig[]> => {
  const notification = await backend.getBucketNotification(bucket);
  const configs: NotificationConfig[] = [];
  for (const kind of TARGET_KINDS) {
    for (const target of notification[kind]) {
      if (arn !== '' && target.arn !== arn) {
        continue;
      }
      configs.push({
        id: target.id ?? '',
        arn: target.arn,
        events: [...target.events],
        prefix: target.prefix ?? '',
        suffix: target.suffix ?? '',
      });
    }
  }
  return configs;
};
