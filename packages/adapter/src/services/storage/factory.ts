import { Agent } from 'node:https';
import { S3Client } from '@aws-sdk/client-s3';
import { findStorageSource, type Config } from '@/config';
import { ResourceAddress } from '@/services/storage/address';
import type { StorageBackend } from '@/services/storage/backend';
import { StorageClient } from '@/services/storage/client';
import { NotificationStream } from '@/services/storage/notification-stream';
import { AMAZON_HOST_NAME, endpointHostFor } from '@/services/storage/resolver';
import { S3Backend } from '@/services/storage/s3-backend';
import { getLogger } from '@/telemetry';

const factoryLogger = () => getLogger('ClientFactory');

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export interface ClientSettings {
  url: string;
  accessKey: string;
  secretKey: string;
  region: string;
  /** Skip TLS certificate verification for https endpoints. */
  insecure: boolean;
  /** Log every SDK request and response. */
  debug: boolean;
  appName: string;
  appVersion: string;
}

export interface BackendSettings extends Omit<ClientSettings, 'url'> {
  /** Service endpoint: the target's scheme and normalized host, no path. */
  endpoint: ResourceAddress;
}

export type BackendBuilder = (settings: BackendSettings) => StorageBackend;

/** 32-bit FNV-1a over the UTF-8 bytes of `value`. */
export const fnv1a32 = (value: string): number => {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(value, 'utf-8')) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash >>> 0;
};

const sdkLogger = () => {
  const logger = getLogger('S3Sdk').child({}, { level: 'debug' });
  return {
    trace: (...content: unknown[]) => logger.trace({ content }, 'SDK trace'),
    debug: (...content: unknown[]) => logger.debug({ content }, 'SDK debug'),
    info: (...content: unknown[]) => logger.info({ content }, 'SDK info'),
    warn: (...content: unknown[]) => logger.warn({ content }, 'SDK warning'),
    error: (...content: unknown[]) => logger.error({ content }, 'SDK error'),
  };
};

export const createS3Backend: BackendBuilder = (settings) => {
  const { endpoint } = settings;
  const agent = settings.insecure && endpoint.isSecure ? new Agent({ rejectUnauthorized: false }) : undefined;
  const credentials = {
    accessKeyId: settings.accessKey,
    secretAccessKey: settings.secretKey,
  };

  const client = new S3Client({
    region: settings.region,
    endpoint: endpoint.toString(),
    credentials,
    forcePathStyle: true,
    tls: endpoint.isSecure,
    customUserAgent: [[settings.appName, settings.appVersion]],
    logger: settings.debug ? sdkLogger() : undefined,
    requestHandler: agent ? { httpsAgent: agent } : undefined,
  });

  return new S3Backend(client, {
    listObjectsV2: endpoint.host === AMAZON_HOST_NAME,
    notifications: new NotificationStream({
      endpoint,
      region: settings.region,
      credentials,
      agent,
      userAgent: `${settings.appName}/${settings.appVersion}`,
    }),
  });
};

/**
 * Builds clients for storage URLs. Backends are shared between clients that
 * talk to the same endpoint with the same credentials.
 */
export class ClientFactory {
  private readonly backends = new Map<number, StorageBackend>();

  constructor(private readonly buildBackend: BackendBuilder = createS3Backend) {}

  get cachedBackends(): number {
    return this.backends.size;
  }

  /**
   * Backend for a normalized endpoint and credential pair, built on first use.
   * Lookup and insertion run without yielding, so concurrent callers never
   * build the same backend twice.
   */
  getOrCreate(settings: BackendSettings): StorageBackend {
    const cacheKey = fnv1a32(`${settings.endpoint.host}${settings.accessKey}${settings.secretKey}`);

    const cached = this.backends.get(cacheKey);
    if (cached) {
      return cached;
    }

    const backend = this.buildBackend(settings);
    this.backends.set(cacheKey, backend);
    factoryLogger().debug({ endpoint: settings.endpoint.toString() }, 'Created storage backend');
    return backend;
  }

  create(settings: ClientSettings): StorageClient {
    const address = ResourceAddress.parse(settings.url);
    const backend = this.getOrCreate({
      endpoint: new ResourceAddress(address.scheme, endpointHostFor(address.host), ''),
      accessKey: settings.accessKey,
      secretKey: settings.secretKey,
      region: settings.region,
      insecure: settings.insecure,
      debug: settings.debug,
      appName: settings.appName,
      appVersion: settings.appVersion,
    });

    return new StorageClient({ address, backend });
  }

  /** Client for a configured storage source, the default one when no id is given. */
  fromConfig(config: Config, sourceId?: string): StorageClient {
    const source = findStorageSource(config, sourceId);
    return this.create({
      url: source.url,
      accessKey: source.accessKey,
      secretKey: source.secretKey,
      region: source.region,
      insecure: source.insecure,
      debug: source.debug,
      appName: config.app.name,
      appVersion: config.app.version,
    });
  }
}
