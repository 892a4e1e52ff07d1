import { z } from 'zod';

/**
 * Configuration schema with Zod validation
 * Provides type-safe, validated configuration from environment variables
 *
 * Note: call loadEnvFiles() before the first getConfig() when values live in .env files
 */

type Env = Record<string, string | undefined>;

const optionalEnv = (value: string | undefined): string | undefined => {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const parseBooleanEnv = (
  value: string | undefined,
  envName: string,
  defaultValue: boolean
): boolean => {
  const normalized = optionalEnv(value);
  if (normalized === undefined) {
    return defaultValue;
  }

  const lowered = normalized.toLowerCase();
  if (lowered === 'true') {
    return true;
  }
  if (lowered === 'false') {
    return false;
  }

  throw new Error(`${envName} must be either 'true' or 'false'`);
};

type MutableStorageSource = {
  id?: string;
  url?: string;
  accessKey?: string;
  secretKey?: string;
  region?: string;
  insecure?: string;
  debug?: string;
};

const SOURCE_ENV_PATTERN = /^STORAGE_SOURCE_(\d+)_(ID|URL|ACCESS_KEY|SECRET_KEY|REGION|INSECURE|DEBUG)$/;

const parseStorageSourcesEnv = (env: Env): unknown => {
  const sourceByIndex = new Map<number, MutableStorageSource>();

  for (const [envName, envValue] of Object.entries(env)) {
    const match = envName.match(SOURCE_ENV_PATTERN);
    if (!match) {
      continue;
    }

    const index = Number(match[1]);
    const field = match[2];
    const source = sourceByIndex.get(index) ?? {};

    if (field === 'ID') {
      source.id = envValue;
    } else if (field === 'URL') {
      source.url = envValue;
    } else if (field === 'ACCESS_KEY') {
      source.accessKey = envValue;
    } else if (field === 'SECRET_KEY') {
      source.secretKey = envValue;
    } else if (field === 'REGION') {
      source.region = envValue;
    } else if (field === 'INSECURE') {
      source.insecure = envValue;
    } else if (field === 'DEBUG') {
      source.debug = envValue;
    }

    sourceByIndex.set(index, source);
  }

  if (sourceByIndex.size === 0) {
    return undefined;
  }

  const sortedEntries = [...sourceByIndex.entries()].sort(([a], [b]) => a - b);

  return sortedEntries.map(([index, source]) => {
    const url = optionalEnv(source.url);
    const accessKey = optionalEnv(source.accessKey);
    const secretKey = optionalEnv(source.secretKey);

    if (!url || !accessKey || !secretKey) {
      throw new Error(
        `Storage source ${index} is missing required values. Set STORAGE_SOURCE_${index}_URL, STORAGE_SOURCE_${index}_ACCESS_KEY, and STORAGE_SOURCE_${index}_SECRET_KEY`
      );
    }

    return {
      id: optionalEnv(source.id) ?? `source${index}`,
      url,
      accessKey,
      secretKey,
      region: optionalEnv(source.region),
      insecure: parseBooleanEnv(source.insecure, `STORAGE_SOURCE_${index}_INSECURE`, false),
      debug: parseBooleanEnv(source.debug, `STORAGE_SOURCE_${index}_DEBUG`, false),
    };
  });
};

export const storageSourceSchema = z.object({
  id: z
    .string()
    .trim()
    .min(1)
    .regex(/^[a-z0-9][a-z0-9_-]*$/i, 'Storage source id must be alphanumeric, dash, or underscore'),
  url: z.string().url(),
  accessKey: z.string().min(1, 'Storage source accessKey must be set'),
  secretKey: z.string().min(1, 'Storage source secretKey must be set'),
  region: z.string().default('us-east-1'),
  insecure: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type StorageSourceConfig = z.infer<typeof storageSourceSchema>;

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  storage: z
    .object({
      sources: z
        .array(storageSourceSchema)
        .min(
          1,
          'Define at least one storage source using STORAGE_SOURCE_0_URL, STORAGE_SOURCE_0_ACCESS_KEY, and STORAGE_SOURCE_0_SECRET_KEY'
        ),
    })
    .transform((value, ctx) => {
      const uniqueIds = new Set<string>();
      for (const source of value.sources) {
        if (uniqueIds.has(source.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate storage source id '${source.id}' in STORAGE_SOURCE_<n>_ID values`,
          });
          return z.NEVER;
        }
        uniqueIds.add(source.id);
      }

      const [primary] = value.sources;
      return {
        defaultSourceId: primary ? primary.id : '',
        sources: value.sources,
      };
    }),

  // Reported to the backend in the user agent
  app: z.object({
    name: z.string().default('objectfs'),
    version: z.string().default('1.0.0'),
  }),

  telemetry: z.object({
    metricsEnabled: z.boolean().default(true),
    serviceName: z.string().default('objectfs'),
    serviceVersion: z.string().default('1.0.0'),
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    logFormat: z.enum(['pretty', 'json']).default('pretty'),
    redactPaths: z
      .array(z.string())
      .default([
        'secret',
        '*.secret',
        'secretKey',
        '*.secretKey',
        'accessKey',
        '*.accessKey',
        'credentials',
        '*.credentials',
        'authorization',
        '*.authorization',
        'headers.authorization',
        'storage.sources.*.accessKey',
        'storage.sources.*.secretKey',
      ]),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Load and validate configuration from environment variables
 */
export const loadConfig = (env: Env = process.env): Config => {
  try {
    return configSchema.parse({
      nodeEnv: optionalEnv(env.NODE_ENV),

      storage: {
        sources: parseStorageSourcesEnv(env),
      },

      app: {
        name: optionalEnv(env.APP_NAME),
        version: optionalEnv(env.APP_VERSION),
      },

      telemetry: {
        metricsEnabled: parseBooleanEnv(env.METRICS_ENABLED, 'METRICS_ENABLED', true),
        serviceName: optionalEnv(env.SERVICE_NAME),
        serviceVersion: optionalEnv(env.APP_VERSION),
        logLevel: optionalEnv(env.LOG_LEVEL),
        logFormat: optionalEnv(env.LOG_FORMAT),
      },
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      const details = error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ');
      throw new Error(`Invalid configuration: ${details}`);
    }
    throw error;
  }
};

// Singleton pattern - lazy load config on first access
let _config: Config | null = null;

export const getConfig = (): Config => {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
};

export const resetConfigForTests = (): void => {
  _config = null;
};

export const findStorageSource = (
  config: Config,
  sourceId = config.storage.defaultSourceId
): StorageSourceConfig => {
  const source = config.storage.sources.find((candidate) => candidate.id === sourceId);
  if (!source) {
    throw new Error(`Unknown storage source '${sourceId}'`);
  }
  return source;
};

export { loadEnvFiles } from './env';
