import { loadConfig, loadEnvFiles, type Config } from '@/config';
import { ClientFactory } from '@/services/storage/factory';
import type { StorageClient } from '@/services/storage/client';
import { getLogger, initTelemetry } from '@/telemetry';
import type { TelemetryStatus } from '@/telemetry/types';

export interface StorageRuntime {
  config: Config;
  telemetry: TelemetryStatus;
  factory: ClientFactory;
  /** Client for a configured source; the default source when no id is given. */
  client(sourceId?: string): StorageClient;
}

export interface StorageRuntimeOptions {
  /** Directory holding `.env` files. Skips them when null. */
  envDir?: string | null;
  env?: NodeJS.ProcessEnv;
  factory?: ClientFactory;
}

/**
 * Loads environment files and configuration, wires telemetry, and returns a
 * factory bound to the configured storage sources.
 */
export const createStorageRuntime = (options: StorageRuntimeOptions = {}): StorageRuntime => {
  const envFiles = options.envDir === null ? [] : loadEnvFiles(options.envDir);
  const config = loadConfig(options.env ?? process.env);
  const telemetry = initTelemetry(config);
  const factory = options.factory ?? new ClientFactory();

  getLogger('Runtime').info(
    {
      environment: config.nodeEnv,
      envFiles,
      sources: config.storage.sources.map((source) => source.id),
      defaultSource: config.storage.defaultSourceId,
      telemetry,
    },
    'Storage runtime ready'
  );

  return {
    config,
    telemetry,
    factory,
    client: (sourceId?: string) => factory.fromConfig(config, sourceId),
  };
};
