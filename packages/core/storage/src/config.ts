/**
 * Store configuration
 */

/**
 * Logger interface for internal error tracking
 */
export interface Logger {
  error(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  info(message: string, context?: object): void;
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = {
  error: (message: string, context?: object) => console.error(message, context),
  warn: (message: string, context?: object) => console.warn(message, context),
  info: (message: string, context?: object) => console.info(message, context),
};

/**
 * Configuration for ArtifactStore
 */
export interface StoreConfig {
  /** Root directory for payload files and the metadata snapshot */
  storagePath?: string;
  /** Time-to-live for every resource, in hours. Default: 24 */
  ttlHours?: number;
  /** URI scheme for generated resource URIs. Default: 'resource' */
  uriScheme?: string;
  /** Interval for the optional background sweep (ms). Off when unset */
  sweepIntervalMs?: number;
  logger?: Logger;
  /** Time source, overridable for tests */
  clock?: () => Date;
}

export type ResolvedStoreConfig = Required<Omit<StoreConfig, 'sweepIntervalMs'>> & {
  sweepIntervalMs: number | null;
};

export const DEFAULT_STORE_CONFIG = {
  storagePath: './data/resources',
  ttlHours: 24,
  uriScheme: 'resource',
} as const;

export const METADATA_FILENAME = 'metadata.json';

export function resolveStoreConfig(config: StoreConfig = {}): ResolvedStoreConfig {
  return {
    storagePath: config.storagePath ?? DEFAULT_STORE_CONFIG.storagePath,
    ttlHours: config.ttlHours ?? DEFAULT_STORE_CONFIG.ttlHours,
    uriScheme: config.uriScheme ?? DEFAULT_STORE_CONFIG.uriScheme,
    sweepIntervalMs: config.sweepIntervalMs ?? null,
    logger: config.logger ?? defaultLogger,
    clock: config.clock ?? (() => new Date()),
  };
}

/**
 * Read store settings from environment variables.
 * Malformed numbers fall back to the defaults.
 */
export function loadStoreConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = defaultLogger
): StoreConfig {
  const config: StoreConfig = { logger };

  if (env.RESOURCE_STORAGE_PATH) {
    config.storagePath = env.RESOURCE_STORAGE_PATH;
  }

  if (env.RESOURCE_EXPIRY_HOURS) {
    const hours = parseFloat(env.RESOURCE_EXPIRY_HOURS);
    if (Number.isFinite(hours) && hours > 0) {
      config.ttlHours = hours;
    } else {
      logger.warn('Ignoring invalid RESOURCE_EXPIRY_HOURS', { value: env.RESOURCE_EXPIRY_HOURS });
    }
  }

  if (env.RESOURCE_URI_SCHEME) {
    config.uriScheme = env.RESOURCE_URI_SCHEME;
  }

  if (env.RESOURCE_SWEEP_INTERVAL_MS) {
    const interval = parseInt(env.RESOURCE_SWEEP_INTERVAL_MS, 10);
    if (Number.isFinite(interval) && interval > 0) {
      config.sweepIntervalMs = interval;
    } else {
      logger.warn('Ignoring invalid RESOURCE_SWEEP_INTERVAL_MS', { value: env.RESOURCE_SWEEP_INTERVAL_MS });
    }
  }

  return config;
}
