import { joinPath, type ResourceAddress } from '@/services/storage/address';
import {
  BucketInvalidError,
  BucketNameEmptyError,
} from '@/services/storage/errors';

export const AMAZON_HOST_NAME = 's3.amazonaws.com';
export const GOOGLE_HOST_NAME = 'storage.googleapis.com';

const AMAZON_VIRTUAL_HOST_PATTERN = '*.s3*.amazonaws.com';
const GOOGLE_VIRTUAL_HOST_PATTERN = '*.storage.googleapis.com';

const BUCKET_HOST_MARKERS = ['s3', 'storage.googleapis'] as const;

const escapeRegExp = (value: string): string => value.replace(/[.+?^${}()|[\]\\]/g, '\\$&');

const wildcardToRegExp = (pattern: string): RegExp =>
  new RegExp(`^${pattern.split('*').map(escapeRegExp).join('[^/]*')}$`);

const AMAZON_MATCHER = wildcardToRegExp(AMAZON_VIRTUAL_HOST_PATTERN);
const GOOGLE_MATCHER = wildcardToRegExp(GOOGLE_VIRTUAL_HOST_PATTERN);

export const isAmazonVirtualHost = (host: string): boolean => AMAZON_MATCHER.test(host);

export const isGoogleVirtualHost = (host: string): boolean => GOOGLE_MATCHER.test(host);

/**
 * Only Amazon S3 and Google Cloud Storage hosts are treated as virtual-host
 * style; every other endpoint is addressed path style.
 */
export const isVirtualHostStyle = (host: string): boolean =>
  isAmazonVirtualHost(host) || isGoogleVirtualHost(host);

/**
 * Endpoint the SDK talks to for a target host: virtual hosts collapse to the
 * provider's service endpoint, since the bucket travels in the request path.
 */
export const endpointHostFor = (host: string): string => {
  if (isAmazonVirtualHost(host)) {
    return AMAZON_HOST_NAME;
  }
  if (isGoogleVirtualHost(host)) {
    return GOOGLE_HOST_NAME;
  }
  return host;
};

export interface BucketObjectPair {
  bucketName: string;
  objectName: string;
}

const bucketFromHost = (host: string): string | null => {
  for (const marker of BUCKET_HOST_MARKERS) {
    const index = host.indexOf(marker);
    if (index === -1) {
      continue;
    }
    // A marker at the very start leaves no room for a bucket label.
    return index > 0 ? host.slice(0, index - 1) : null;
  }
  return null;
};

export const resolveBucketAndObject = (
  address: ResourceAddress,
  virtualStyle: boolean
): BucketObjectPair => {
  let path = address.path;
  if (virtualStyle) {
    const bucket = bucketFromHost(address.host);
    if (bucket !== null) {
      path = `${address.separator}${bucket}${address.path}`;
    }
  }

  const splits = path.split(address.separator);
  const bucketName = splits.length >= 2 ? (splits[1] ?? '') : '';
  const objectName = splits.length >= 3 ? splits.slice(2).join(address.separator) : '';
  return { bucketName, objectName };
};

/**
 * Path an emitted entry carries: `/<bucket>/<key>`, or just `/<key>` when the
 * bucket is already part of a virtual host.
 */
export const entryPath = (
  address: ResourceAddress,
  virtualStyle: boolean,
  bucketName: string,
  key: string
): string => {
  const segments = virtualStyle ? [key] : [bucketName, key];
  return joinPath(address.separator, ...segments);
};

// Names containing '.' are accepted; the SDK falls back to path-style requests for them.
const VALID_BUCKET_NAME = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

export const isValidBucketName = (bucketName: string): boolean =>
  bucketName.length >= 3 && bucketName.length <= 63 && VALID_BUCKET_NAME.test(bucketName);

export const assertValidBucketName = (bucketName: string): void => {
  if (bucketName.trim().length === 0) {
    throw new BucketNameEmptyError();
  }
  if (bucketName.length < 3 || bucketName.length > 63) {
    throw new BucketInvalidError(
      bucketName,
      'Bucket name should be more than 3 characters and less than 64 characters'
    );
  }
  if (!VALID_BUCKET_NAME.test(bucketName)) {
    throw new BucketInvalidError(
      bucketName,
      "Bucket name can contain lowercase letters, numbers, '.' and '-', and must start and end with a letter or number"
    );
  }
};
