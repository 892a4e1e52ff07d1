import type { ListingSnapshot } from '@/services/storage/listing';
import {
  BucketDoesNotExistError,
  BucketNameEmptyError,
  ObjectMissingError,
  translateError,
} from '@/services/storage/errors';
import type { ContentEntry } from '@/services/storage/types';

const trimTrailing = (value: string, separator: string): string => {
  let end = value.length;
  while (end > 0 && value.slice(end - separator.length, end) === separator) {
    end -= separator.length;
  }
  return value.slice(0, end);
};

/**
 * Metadata of the item a snapshot points at. Buckets are confirmed with an
 * existence check; keys with a delimited listing of the key itself, so a key
 * that only exists as a prefix of other keys resolves to a directory.
 */
export const statContent = async (snapshot: ListingSnapshot): Promise<ContentEntry> => {
  const { backend, address, bucketName } = snapshot;
  const context = {
    operation: 'stat' as const,
    bucket: bucketName,
    object: snapshot.objectName,
    path: address.toString(),
  };

  if (bucketName === '') {
    throw new BucketNameEmptyError();
  }

  if (snapshot.objectName === '') {
    let exists: boolean;
    try {
      exists = await backend.bucketExists(bucketName);
    } catch (error) {
      throw translateError(error, context);
    }
    if (!exists) {
      throw new BucketDoesNotExistError(bucketName);
    }
    return { url: address, size: 0, time: new Date(), type: 'directory' };
  }

  const objectName = trimTrailing(snapshot.objectName, address.separator);
  const directoryPrefix = `${objectName}${address.separator}`;

  for await (const result of backend.listObjects(bucketName, objectName, false)) {
    if (!result.ok) {
      throw translateError(result.error, context);
    }
    const object = result.value;
    if (object.key === objectName) {
      return { url: address, size: object.size, time: object.lastModified, type: 'object' };
    }
    if (object.key.startsWith(directoryPrefix)) {
      return { url: address, size: 0, time: new Date(), type: 'directory' };
    }
  }

  throw new ObjectMissingError();
};
