import { describe, expect, it } from 'vitest';
import { joinPath, ResourceAddress } from './address';
import { isStorageError } from './errors';
import {
  assertValidBucketName,
  endpointHostFor,
  entryPath,
  isValidBucketName,
  isVirtualHostStyle,
  resolveBucketAndObject,
} from './resolver';

const resolve = (url: string) => {
  const address = ResourceAddress.parse(url);
  return resolveBucketAndObject(address, isVirtualHostStyle(address.host));
};

describe('ResourceAddress', () => {
  it('keeps the raw path and lowercases the scheme', () => {
    const address = ResourceAddress.parse('HTTPS://play.example.test:9000/bucket/a%20b/c.txt');

    expect(address.scheme).toBe('https');
    expect(address.host).toBe('play.example.test:9000');
    expect(address.path).toBe('/bucket/a%20b/c.txt');
    expect(address.isSecure).toBe(true);
    expect(address.toString()).toBe('https://play.example.test:9000/bucket/a%20b/c.txt');
  });

  it('derives new addresses without touching the original', () => {
    const address = ResourceAddress.parse('http://localhost:9000/bucket');
    const child = address.withPath('/bucket/key');

    expect(address.path).toBe('/bucket');
    expect(child.toString()).toBe('http://localhost:9000/bucket/key');
    expect(child.isSecure).toBe(false);
    expect(Object.isFrozen(child)).toBe(true);
  });

  it('rejects values that are not absolute URLs', () => {
    let thrown: unknown;
    try {
      ResourceAddress.parse('bucket/key');
    } catch (error) {
      thrown = error;
    }

    expect(isStorageError(thrown, 'InvalidArgument')).toBe(true);
  });
});

describe('joinPath', () => {
  it('collapses empty segments and keeps a trailing separator', () => {
    expect(joinPath('/', 'bucket', 'dir/')).toBe('/bucket/dir/');
    expect(joinPath('/', '', 'bucket')).toBe('/bucket');
    expect(joinPath('/', '/root/', 'bucket', 'key')).toBe('/root/bucket/key');
    expect(joinPath('/', 'a//b')).toBe('/a/b');
    expect(joinPath('/')).toBe('/');
  });
});

describe('resolveBucketAndObject', () => {
  it('splits path-style URLs into bucket and object', () => {
    expect(resolve('http://localhost:9000/bucket/dir/key.txt')).toEqual({
      bucketName: 'bucket',
      objectName: 'dir/key.txt',
    });
    expect(resolve('http://localhost:9000/bucket')).toEqual({ bucketName: 'bucket', objectName: '' });
    expect(resolve('http://localhost:9000/bucket/')).toEqual({ bucketName: 'bucket', objectName: '' });
    expect(resolve('http://localhost:9000/bucket/dir/')).toEqual({ bucketName: 'bucket', objectName: 'dir/' });
  });

  it('resolves the backend root to empty names', () => {
    expect(resolve('http://localhost:9000')).toEqual({ bucketName: '', objectName: '' });
    expect(resolve('http://localhost:9000/')).toEqual({ bucketName: '', objectName: '' });
  });

  it('takes the bucket from virtual hosts', () => {
    expect(resolve('https://photos.s3.amazonaws.com/2024/a.jpg')).toEqual({
      bucketName: 'photos',
      objectName: '2024/a.jpg',
    });
    expect(resolve('https://media.storage.googleapis.com/clip.mp4')).toEqual({
      bucketName: 'media',
      objectName: 'clip.mp4',
    });
    expect(resolve('https://photos.s3.amazonaws.com')).toEqual({ bucketName: 'photos', objectName: '' });
  });

  it('leaves path-style URLs alone on the provider endpoint', () => {
    expect(resolve('https://s3.amazonaws.com/photos/a.jpg')).toEqual({
      bucketName: 'photos',
      objectName: 'a.jpg',
    });
  });

  it('resolves a virtual host and its path-style form to the same pair', () => {
    const virtual = resolveBucketAndObject(ResourceAddress.parse('https://photos.s3.amazonaws.com/2024/a.jpg'), true);
    const pathStyle = resolveBucketAndObject(ResourceAddress.parse('https://s3.amazonaws.com/photos/2024/a.jpg'), false);

    expect(virtual).toEqual(pathStyle);
    expect(pathStyle).toEqual({ bucketName: 'photos', objectName: '2024/a.jpg' });
  });
});

describe('virtual host detection', () => {
  it('only matches provider virtual hosts', () => {
    expect(isVirtualHostStyle('photos.s3.amazonaws.com')).toBe(true);
    expect(isVirtualHostStyle('photos.s3-eu-west-1.amazonaws.com')).toBe(true);
    expect(isVirtualHostStyle('media.storage.googleapis.com')).toBe(true);
    expect(isVirtualHostStyle('s3.amazonaws.com')).toBe(false);
    expect(isVirtualHostStyle('localhost:9000')).toBe(false);
    expect(isVirtualHostStyle('minio.example.test')).toBe(false);
  });

  it('maps virtual hosts to the provider endpoint', () => {
    expect(endpointHostFor('photos.s3.amazonaws.com')).toBe('s3.amazonaws.com');
    expect(endpointHostFor('media.storage.googleapis.com')).toBe('storage.googleapis.com');
    expect(endpointHostFor('localhost:9000')).toBe('localhost:9000');
  });

  it('drops the bucket segment from entry paths on virtual hosts', () => {
    const address = ResourceAddress.parse('https://photos.s3.amazonaws.com/');

    expect(entryPath(address, true, 'photos', '2024/a.jpg')).toBe('/2024/a.jpg');
    expect(entryPath(address, false, 'photos', '2024/a.jpg')).toBe('/photos/2024/a.jpg');
    expect(entryPath(address, false, 'photos', '2024/')).toBe('/photos/2024/');
  });
});

describe('bucket name validation', () => {
  const failureOf = (name: string): unknown => {
    try {
      assertValidBucketName(name);
    } catch (error) {
      return error;
    }
    return null;
  };

  it('accepts well-formed names', () => {
    expect(isValidBucketName('my-bucket.logs')).toBe(true);
    expect(failureOf('abc')).toBeNull();
    expect(isValidBucketName('a..b')).toBe(true);
    expect(failureOf('a..b')).toBeNull();
  });

  it('reports blank names as empty', () => {
    const error = failureOf('   ');

    expect(isStorageError(error, 'BucketNameEmpty')).toBe(true);
  });

  it('reports the length bounds', () => {
    const short = failureOf('ab');
    const long = failureOf('a'.repeat(64));

    expect(isStorageError(short, 'BucketInvalid')).toBe(true);
    expect(isStorageError(long, 'BucketInvalid')).toBe(true);
    expect(short instanceof Error ? short.message : '').toBe(
      'Bucket name should be more than 3 characters and less than 64 characters'
    );
  });

  it('rejects upper case and edge punctuation', () => {
    expect(isStorageError(failureOf('MyBucket'), 'BucketInvalid')).toBe(true);
    expect(isStorageError(failureOf('-bucket'), 'BucketInvalid')).toBe(true);
    expect(isValidBucketName('bucket-')).toBe(false);
  });
});
