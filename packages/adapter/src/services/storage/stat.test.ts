import { beforeEach, describe, expect, it } from 'vitest';
import { ResourceAddress } from './address';
import { StorageClient } from './client';
import { backendError, MemoryBackend } from './testing/memory-backend';

const statCode = async (client: StorageClient): Promise<string> => {
  try {
    await client.stat();
    return 'ok';
  } catch (error) {
    return error instanceof Error && 'code' in error ? String(error.code) : 'unknown';
  }
};

describe('StorageClient.stat', () => {
  let backend: MemoryBackend;

  const clientFor = (url: string) => new StorageClient({ address: ResourceAddress.parse(url), backend });

  beforeEach(() => {
    backend = new MemoryBackend()
      .addBucket('photos')
      .addObject('photos', '2024/a.jpg', 'abc')
      .addObject('photos', 'report', 'r')
      .addObject('photos', 'report.pdf', 'pdf')
      .addObject('photos', 'readme.txt', 'hello');
  });

  it('reports an existing bucket as a directory', async () => {
    const entry = await clientFor('http://localhost:9000/photos').stat();

    expect(entry.type).toBe('directory');
    expect(entry.size).toBe(0);
    expect(entry.url.toString()).toBe('http://localhost:9000/photos');
    expect(backend.calls).toEqual(['bucketExists']);
  });

  it('fails for a missing bucket', async () => {
    expect(await statCode(clientFor('http://localhost:9000/videos'))).toBe('BucketDoesNotExist');
  });

  it('needs a bucket', async () => {
    expect(await statCode(clientFor('http://localhost:9000/'))).toBe('BucketNameEmpty');
  });

  it('returns object metadata for an exact key', async () => {
    const entry = await clientFor('http://localhost:9000/photos/readme.txt').stat();

    expect(entry).toMatchObject({ type: 'object', size: 5, time: new Date('2024-02-01T00:00:00Z') });
  });

  it('resolves a key that only exists as a prefix to a directory', async () => {
    const withoutSeparator = await clientFor('http://localhost:9000/photos/2024').stat();
    const withSeparator = await clientFor('http://localhost:9000/photos/2024/').stat();

    expect(withoutSeparator.type).toBe('directory');
    expect(withSeparator.type).toBe('directory');
    expect(withSeparator.url.toString()).toBe('http://localhost:9000/photos/2024/');
  });

  it('matches the exact key before longer keys sharing its prefix', async () => {
    const entry = await clientFor('http://localhost:9000/photos/report').stat();

    expect(entry).toMatchObject({ type: 'object', size: 1 });
  });

  it('does not treat a partial name as a match', async () => {
    expect(await statCode(clientFor('http://localhost:9000/photos/rep'))).toBe('ObjectMissing');
  });

  it('translates listing failures', async () => {
    backend.listFailures.set('photos', { after: 0, error: backendError('AccessDenied') });

    expect(await statCode(clientFor('http://localhost:9000/photos/readme.txt'))).toBe('PathInsufficientPermission');
  });
});
