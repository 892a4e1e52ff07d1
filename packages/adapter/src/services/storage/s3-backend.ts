import { Readable } from 'node:stream';
import {
  AbortMultipartUploadCommand,
  CopyObjectCommand,
  CreateBucketCommand,
  DeleteBucketCommand,
  DeleteBucketPolicyCommand,
  DeleteObjectCommand,
  GetBucketNotificationConfigurationCommand,
  GetBucketPolicyCommand,
  GetObjectCommand,
  HeadBucketCommand,
  ListBucketsCommand,
  ListMultipartUploadsCommand,
  ListObjectsCommand,
  ListObjectsV2Command,
  ListPartsCommand,
  PutBucketNotificationConfigurationCommand,
  PutBucketPolicyCommand,
  PutObjectCommand,
  BucketLocationConstraint,
  type CommonPrefix,
  type Event as BucketEvent,
  type FilterRule,
  type ListMultipartUploadsCommandOutput,
  type ListObjectsCommandOutput,
  type ListObjectsV2CommandOutput,
  type NotificationConfigurationFilter,
  type S3Client,
  type _Object,
} from '@aws-sdk/client-s3';
import { createPresignedPost, type PresignedPostOptions } from '@aws-sdk/s3-presigned-post';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type {
  BucketInfo,
  BucketNotification,
  IncompleteUploadInfo,
  ListenOptions,
  ListResult,
  NotificationInfo,
  NotificationTarget,
  ObjectInfo,
  PresignedPost,
  PresignedPostInput,
  StorageBackend,
  UploadInput,
} from '@/services/storage/backend';
import { backendErrorCode, InvalidArgumentError } from '@/services/storage/errors';
import type { NotificationStream } from '@/services/storage/notification-stream';
import { getLogger } from '@/telemetry';

const backendLogger = () => getLogger('S3Backend');

const DELIMITER = '/';
const DEFAULT_REGION = 'us-east-1';

export interface S3BackendOptions {
  /** Use ListObjectsV2 instead of the original listing API. */
  listObjectsV2: boolean;
  notifications: NotificationStream;
}

const toCopySource = (source: string): string => {
  const trimmed = source.startsWith('/') ? source.slice(1) : source;
  return `/${encodeURIComponent(trimmed).replace(/%2F/g, '/')}`;
};

const isBucketEvent = (value: string): value is BucketEvent => value.startsWith('s3:');

const filterOf = (filter: NotificationConfigurationFilter | undefined): { prefix?: string; suffix?: string } => {
  const result: { prefix?: string; suffix?: string } = {};
  for (const rule of filter?.Key?.FilterRules ?? []) {
    const name = rule.Name?.toLowerCase();
    if (name === 'prefix' && rule.Value !== undefined) {
      result.prefix = rule.Value;
    } else if (name === 'suffix' && rule.Value !== undefined) {
      result.suffix = rule.Value;
    }
  }
  return result;
};

const toFilter = (target: NotificationTarget): NotificationConfigurationFilter | undefined => {
  const rules: FilterRule[] = [];
  if (target.prefix) {
    rules.push({ Name: 'prefix', Value: target.prefix });
  }
  if (target.suffix) {
    rules.push({ Name: 'suffix', Value: target.suffix });
  }
  return rules.length > 0 ? { Key: { FilterRules: rules } } : undefined;
};

const toTarget = (
  arn: string | undefined,
  id: string | undefined,
  events: BucketEvent[] | undefined,
  filter: NotificationConfigurationFilter | undefined
): NotificationTarget => ({
  id,
  arn: arn ?? '',
  events: events ?? [],
  ...filterOf(filter),
});

function* pageResults(
  contents: _Object[] | undefined,
  prefixes: CommonPrefix[] | undefined
): Generator<ListResult<ObjectInfo>, void, undefined> {
  for (const item of contents ?? []) {
    if (item.Key) {
      yield {
        ok: true,
        value: {
          key: item.Key,
          size: item.Size ?? 0,
          lastModified: item.LastModified ?? new Date(0),
          storageClass: item.StorageClass,
        },
      };
    }
  }
  for (const common of prefixes ?? []) {
    if (common.Prefix) {
      yield { ok: true, value: { key: common.Prefix, size: 0, lastModified: new Date(0) } };
    }
  }
}

const isMissing = (error: unknown, codes: string[]): boolean => {
  const code = backendErrorCode(error);
  return code !== undefined && codes.includes(code);
};

/**
 * Storage backend over the AWS SDK. Listings are paged lazily: a page is only
 * requested once the previous one has been consumed.
 */
export class S3Backend implements StorageBackend {
  constructor(
    private readonly client: S3Client,
    private readonly options: S3BackendOptions
  ) {}

  async listBuckets(signal?: AbortSignal): Promise<BucketInfo[]> {
    const response = await this.client.send(new ListBucketsCommand({}), { abortSignal: signal });
    return (response.Buckets ?? [])
      .filter((bucket) => bucket.Name !== undefined && bucket.Name.length > 0)
      .map((bucket) => ({
        name: bucket.Name ?? '',
        creationDate: bucket.CreationDate ?? new Date(0),
      }));
  }

  listObjects(
    bucket: string,
    prefix: string,
    recursive: boolean,
    signal?: AbortSignal
  ): AsyncIterable<ListResult<ObjectInfo>> {
    return this.options.listObjectsV2
      ? this.listObjectsV2(bucket, prefix, recursive, signal)
      : this.listObjectsV1(bucket, prefix, recursive, signal);
  }

  private async *listObjectsV2(
    bucket: string,
    prefix: string,
    recursive: boolean,
    signal?: AbortSignal
  ): AsyncGenerator<ListResult<ObjectInfo>, void, undefined> {
    let continuationToken: string | undefined;
    do {
      let response: ListObjectsV2CommandOutput;
      try {
        response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            Delimiter: recursive ? undefined : DELIMITER,
            ContinuationToken: continuationToken,
          }),
          { abortSignal: signal }
        );
      } catch (error) {
        if (signal?.aborted) {
          return;
        }
        yield { ok: false, error };
        return;
      }

      yield* pageResults(response.Contents, response.CommonPrefixes);

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);
  }

  private async *listObjectsV1(
    bucket: string,
    prefix: string,
    recursive: boolean,
    signal?: AbortSignal
  ): AsyncGenerator<ListResult<ObjectInfo>, void, undefined> {
    let marker: string | undefined;
    do {
      let response: ListObjectsCommandOutput;
      try {
        response = await this.client.send(
          new ListObjectsCommand({
            Bucket: bucket,
            Prefix: prefix,
            Delimiter: recursive ? undefined : DELIMITER,
            Marker: marker,
          }),
          { abortSignal: signal }
        );
      } catch (error) {
        if (signal?.aborted) {
          return;
        }
        yield { ok: false, error };
        return;
      }

      const contents = response.Contents ?? [];
      yield* pageResults(contents, response.CommonPrefixes);

      marker = response.IsTruncated
        ? (response.NextMarker ?? contents[contents.length - 1]?.Key)
        : undefined;
    } while (marker);
  }

  async *listIncompleteUploads(
    bucket: string,
    prefix: string,
    recursive: boolean,
    signal?: AbortSignal
  ): AsyncGenerator<ListResult<IncompleteUploadInfo>, void, undefined> {
    let keyMarker: string | undefined;
    let uploadIdMarker: string | undefined;
    do {
      let response: ListMultipartUploadsCommandOutput;
      try {
        response = await this.client.send(
          new ListMultipartUploadsCommand({
            Bucket: bucket,
            Prefix: prefix,
            Delimiter: recursive ? undefined : DELIMITER,
            KeyMarker: keyMarker,
            UploadIdMarker: uploadIdMarker,
          }),
          { abortSignal: signal }
        );
      } catch (error) {
        if (signal?.aborted) {
          return;
        }
        yield { ok: false, error };
        return;
      }

      for (const upload of response.Uploads ?? []) {
        if (!upload.Key || !upload.UploadId) {
          continue;
        }
        let size: number;
        try {
          size = await this.uploadedSize(bucket, upload.Key, upload.UploadId, signal);
        } catch (error) {
          if (signal?.aborted) {
            return;
          }
          yield { ok: false, error };
          return;
        }
        yield {
          ok: true,
          value: {
            key: upload.Key,
            uploadId: upload.UploadId,
            size,
            initiated: upload.Initiated ?? new Date(0),
          },
        };
      }
      for (const common of response.CommonPrefixes ?? []) {
        if (common.Prefix) {
          yield { ok: true, value: { key: common.Prefix, uploadId: '', size: 0, initiated: new Date(0) } };
        }
      }

      if (response.IsTruncated) {
        keyMarker = response.NextKeyMarker;
        uploadIdMarker = response.NextUploadIdMarker;
      } else {
        keyMarker = undefined;
      }
    } while (keyMarker);
  }

  private async uploadedSize(
    bucket: string,
    key: string,
    uploadId: string,
    signal?: AbortSignal
  ): Promise<number> {
    let total = 0;
    let partMarker: string | undefined;
    do {
      const response = await this.client.send(
        new ListPartsCommand({
          Bucket: bucket,
          Key: key,
          UploadId: uploadId,
          PartNumberMarker: partMarker,
        }),
        { abortSignal: signal }
      );
      for (const part of response.Parts ?? []) {
        total += part.Size ?? 0;
      }
      partMarker = response.IsTruncated ? response.NextPartNumberMarker : undefined;
    } while (partMarker);
    return total;
  }

  async bucketExists(bucket: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (error) {
      if (isMissing(error, ['NotFound', 'NoSuchBucket'])) {
        return false;
      }
      throw error;
    }
  }

  /** Regions other than us-east-1 must be known to the SDK as a location constraint. */
  async makeBucket(bucket: string, region: string): Promise<void> {
    const location =
      region === DEFAULT_REGION
        ? undefined
        : Object.values(BucketLocationConstraint).find((constraint) => constraint === region);
    if (region !== DEFAULT_REGION && !location) {
      throw new InvalidArgumentError(`Unsupported bucket region '${region}'`);
    }
    await this.client.send(
      new CreateBucketCommand({
        Bucket: bucket,
        CreateBucketConfiguration: location ? { LocationConstraint: location } : undefined,
      })
    );
  }

  async removeBucket(bucket: string): Promise<void> {
    await this.client.send(new DeleteBucketCommand({ Bucket: bucket }));
  }

  async getObject(bucket: string, key: string): Promise<Readable> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (response.Body instanceof Readable) {
      return response.Body;
    }
    throw new Error(`Object body for '${bucket}/${key}' is not a readable stream`);
  }

  async putObject(input: UploadInput): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: input.bucket,
        Key: input.key,
        Body: input.body,
        ContentLength: input.size,
        ContentType: input.contentType,
      })
    );
  }

  async copyObject(bucket: string, key: string, source: string): Promise<void> {
    await this.client.send(
      new CopyObjectCommand({
        Bucket: bucket,
        Key: key,
        CopySource: toCopySource(source),
      })
    );
  }

  async removeObject(bucket: string, key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  }

  async removeIncompleteUpload(bucket: string, key: string): Promise<void> {
    for await (const result of this.listIncompleteUploads(bucket, key, true)) {
      if (!result.ok) {
        throw result.error;
      }
      if (result.value.key !== key) {
        continue;
      }
      await this.client.send(
        new AbortMultipartUploadCommand({ Bucket: bucket, Key: key, UploadId: result.value.uploadId })
      );
      backendLogger().debug({ bucket, key, uploadId: result.value.uploadId }, 'Aborted incomplete upload');
    }
  }

  async getBucketPolicy(bucket: string): Promise<string | null> {
    try {
      const response = await this.client.send(new GetBucketPolicyCommand({ Bucket: bucket }));
      return response.Policy ?? null;
    } catch (error) {
      if (isMissing(error, ['NoSuchBucketPolicy'])) {
        return null;
      }
      throw error;
    }
  }

  async setBucketPolicy(bucket: string, policy: string | null): Promise<void> {
    if (policy === null) {
      await this.client.send(new DeleteBucketPolicyCommand({ Bucket: bucket }));
      return;
    }
    await this.client.send(new PutBucketPolicyCommand({ Bucket: bucket, Policy: policy }));
  }

  async getBucketNotification(bucket: string): Promise<BucketNotification> {
    const response = await this.client.send(new GetBucketNotificationConfigurationCommand({ Bucket: bucket }));
    return {
      topics: (response.TopicConfigurations ?? []).map((config) =>
        toTarget(config.TopicArn, config.Id, config.Events, config.Filter)
      ),
      queues: (response.QueueConfigurations ?? []).map((config) =>
        toTarget(config.QueueArn, config.Id, config.Events, config.Filter)
      ),
      lambdas: (response.LambdaFunctionConfigurations ?? []).map((config) =>
        toTarget(config.LambdaFunctionArn, config.Id, config.Events, config.Filter)
      ),
    };
  }

  async setBucketNotification(bucket: string, notification: BucketNotification): Promise<void> {
    await this.client.send(
      new PutBucketNotificationConfigurationCommand({
        Bucket: bucket,
        NotificationConfiguration: {
          TopicConfigurations: notification.topics.map((target) => ({
            Id: target.id,
            TopicArn: target.arn,
            Events: target.events.filter(isBucketEvent),
            Filter: toFilter(target),
          })),
          QueueConfigurations: notification.queues.map((target) => ({
            Id: target.id,
            QueueArn: target.arn,
            Events: target.events.filter(isBucketEvent),
            Filter: toFilter(target),
          })),
          LambdaFunctionConfigurations: notification.lambdas.map((target) => ({
            Id: target.id,
            LambdaFunctionArn: target.arn,
            Events: target.events.filter(isBucketEvent),
            Filter: toFilter(target),
          })),
        },
      })
    );
  }

  async removeAllBucketNotification(bucket: string): Promise<void> {
    await this.client.send(
      new PutBucketNotificationConfigurationCommand({ Bucket: bucket, NotificationConfiguration: {} })
    );
  }

  listenBucketNotification(options: ListenOptions): AsyncIterable<NotificationInfo> {
    return this.options.notifications.listen(options);
  }

  async presignedGetObject(bucket: string, key: string, expiresInSeconds: number): Promise<string> {
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: bucket, Key: key }), {
      expiresIn: expiresInSeconds,
    });
  }

  async presignedPostPolicy(input: PresignedPostInput): Promise<PresignedPost> {
    const conditions: NonNullable<PresignedPostOptions['Conditions']> = [];
    const fields: Record<string, string> = {};

    if (input.keyStartsWith) {
      conditions.push(['starts-with', '$key', input.key]);
    }
    if (input.contentType) {
      conditions.push(['eq', '$Content-Type', input.contentType]);
      fields['Content-Type'] = input.contentType;
    }

    const post = await createPresignedPost(this.client, {
      Bucket: input.bucket,
      Key: input.key,
      Conditions: conditions,
      Fields: fields,
      Expires: input.expiresInSeconds,
    });
    return { url: post.url, fields: post.fields };
  }
}
