import type { NotificationRecord, StorageBackend } from '@/services/storage/backend';
import { Channel } from '@/services/storage/channel';
import { joinPath, type ResourceAddress } from '@/services/storage/address';
import { InvalidArgumentError, translateError, type StorageError } from '@/services/storage/errors';
import { toNotificationEvents } from '@/services/storage/notifications';
import { assertValidBucketName } from '@/services/storage/resolver';
import type { StorageEvent, WatchHandle, WatchParams } from '@/services/storage/types';
import { getLogger } from '@/telemetry';

const watchLogger = () => getLogger('Watch');

const OBJECT_CREATED_PREFIX = 's3:ObjectCreated:';
const OBJECT_REMOVED_PREFIX = 's3:ObjectRemoved:';

/** Decodes a key the way URL query values are decoded: '+' is a space. */
export const unescapeKey = (key: string): string => decodeURIComponent(key.replace(/\+/g, ' '));

export interface WatchTarget {
  backend: StorageBackend;
  address: ResourceAddress;
  bucketName: string;
  objectName: string;
  /** Client handle attached to every emitted event. */
  client: StorageEvent['client'];
}

export interface WatchOptions {
  signal?: AbortSignal;
}

const toEvent = (target: WatchTarget, record: NotificationRecord): StorageEvent | null => {
  const { address } = target;
  const url = address
    .withPath(joinPath(address.separator, record.bucketName, unescapeKey(record.key)))
    .toString();
  const parsedTime = new Date(record.eventTime);
  const time = Number.isNaN(parsedTime.getTime()) ? new Date() : parsedTime;

  if (record.eventName.startsWith(OBJECT_CREATED_PREFIX)) {
    return Object.freeze({ time, size: record.size, url, client: target.client, type: 'create' as const });
  }
  if (record.eventName.startsWith(OBJECT_REMOVED_PREFIX)) {
    return Object.freeze({ time, size: 0, url, client: target.client, type: 'remove' as const });
  }
  return null;
};

export interface WatchFilter {
  events: string[];
  prefix: string;
  suffix: string;
}

/**
 * Validates watch arguments against a target and resolves the notification
 * filter. An object in the target URL becomes the prefix.
 */
export const resolveWatchFilter = (
  target: Pick<WatchTarget, 'bucketName' | 'objectName'>,
  params: WatchParams
): WatchFilter => {
  const { bucketName, objectName } = target;
  assertValidBucketName(bucketName);

  const events = toNotificationEvents(params.events);
  const prefix = params.prefix ?? '';
  if (objectName !== '' && prefix !== '') {
    throw new InvalidArgumentError(`Prefix '${prefix}' cannot be combined with object '${objectName}'`);
  }
  return {
    events,
    prefix: objectName !== '' ? objectName : prefix,
    suffix: params.suffix ?? '',
  };
};

/**
 * Subscribes to bucket notifications and republishes them as two streams.
 * Every argument is validated before the subscription is opened. Closing the
 * handle (or aborting `options.signal`) ends both streams and the
 * subscription.
 */
export const watchBucket = (target: WatchTarget, params: WatchParams, options: WatchOptions = {}): WatchHandle => {
  const { backend, bucketName, objectName } = target;
  const { events, prefix, suffix } = resolveWatchFilter(target, params);

  const eventChannel = new Channel<StorageEvent>();
  const errorChannel = new Channel<StorageError>();
  const controller = new AbortController();

  const close = (): void => {
    if (controller.signal.aborted) {
      return;
    }
    controller.abort();
  };

  controller.signal.addEventListener(
    'abort',
    () => {
      options.signal?.removeEventListener('abort', close);
      eventChannel.close();
      errorChannel.close();
      watchLogger().debug({ bucket: bucketName, prefix, suffix }, 'Watch closed');
    },
    { once: true }
  );

  if (options.signal) {
    if (options.signal.aborted) {
      close();
    } else {
      options.signal.addEventListener('abort', close, { once: true });
    }
  }

  const translationContext = {
    operation: 'other' as const,
    bucket: bucketName,
    object: objectName,
    path: target.address.toString(),
  };

  const pump = async (): Promise<void> => {
    const notifications = backend.listenBucketNotification({
      bucket: bucketName,
      prefix,
      suffix,
      events,
      signal: controller.signal,
    });

    for await (const info of notifications) {
      if (controller.signal.aborted) {
        return;
      }
      if (!info.ok) {
        await errorChannel.send(translateError(info.error, translationContext));
        continue;
      }
      for (const record of info.records) {
        let event: StorageEvent | null;
        try {
          event = toEvent(target, record);
        } catch (error) {
          await errorChannel.send(
            new InvalidArgumentError(`Unable to decode object key '${record.key}'`, error)
          );
          continue;
        }
        if (event && !(await eventChannel.send(event))) {
          return;
        }
      }
    }
  };

  watchLogger().debug({ bucket: bucketName, prefix, suffix, events }, 'Watch opened');

  void pump()
    .catch(async (error: unknown) => {
      if (!controller.signal.aborted) {
        watchLogger().warn({ err: error, bucket: bucketName }, 'Notification subscription failed');
        await errorChannel.send(translateError(error, translationContext));
      }
    })
    .finally(close);

  return {
    events: eventChannel,
    errors: errorChannel,
    close,
  };
};
