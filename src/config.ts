import { isLogLevel, levelFromEnv, type LogLevel } from './logger.js';
import { MAX_CHUNK_SIZE } from './codec/types.js';

/** Exponential backoff parameters for reconnect attempts. */
export interface BackoffConfig {
  /** Delay before the first attempt (ms) */
  initial: number;
  /** Upper bound for any single delay (ms) */
  max: number;
  /** Growth factor per attempt */
  factor: number;
  /** Relative jitter in [0, 1] */
  jitter: number;
}

export interface ReconnectConfig {
  /** Failed attempts tolerated before the session closes */
  maxAttempts: number;
  backoff: BackoffConfig;
}

export interface LinkConfig {
  heartbeatIntervalMs: number;
  /** Silence after which the session is DEGRADED */
  degradedAfterMs: number;
  /** Silence after which the session reconnects */
  hardTimeoutMs: number;
  handshakeTimeoutMs: number;
  /** Bound on opening a stream while reconnecting, or on a client's first dial */
  connectTimeoutMs: number;
  /** Bound on the best-effort BYE write */
  closeTimeoutMs: number;
  reconnect: ReconnectConfig;
  /** Data bytes per DATA_CHUNK frame */
  chunkSize: number;
  /** Unacknowledged chunks allowed in flight per transfer */
  windowSize: number;
  /** Idle time after which a transfer is abandoned, in either direction */
  transferTimeoutMs: number;
  maxTransferSize: number;
  /** Cap on unacknowledged data plaintext; data sends wait above it */
  journalMaxBytes: number;
  logLevel: LogLevel;
}

export type LinkConfigOverrides = Partial<Omit<LinkConfig, 'reconnect'>> & {
  reconnect?: Partial<Omit<ReconnectConfig, 'backoff'>> & {
    backoff?: Partial<BackoffConfig>;
  };
};

export const DEFAULT_CONFIG: LinkConfig = {
  heartbeatIntervalMs: 5_000,
  degradedAfterMs: 15_000,
  hardTimeoutMs: 30_000,
  handshakeTimeoutMs: 5_000,
  connectTimeoutMs: 10_000,
  closeTimeoutMs: 1_000,
  reconnect: {
    maxAttempts: 5,
    backoff: { initial: 2_000, max: 30_000, factor: 2, jitter: 0.1 },
  },
  chunkSize: MAX_CHUNK_SIZE,
  windowSize: 4,
  transferTimeoutMs: 30_000,
  maxTransferSize: 10 * 1024 * 1024,
  journalMaxBytes: 4 * 1024 * 1024,
  logLevel: 'info',
};

/**
 * Merge overrides onto the defaults and validate the result.
 * Keys explicitly set to undefined fall back to the default.
 */
export function resolveConfig(overrides: LinkConfigOverrides = {}): LinkConfig {
  const d = DEFAULT_CONFIG;
  const backoff = overrides.reconnect?.backoff ?? {};
  const config: LinkConfig = {
    heartbeatIntervalMs: overrides.heartbeatIntervalMs ?? d.heartbeatIntervalMs,
    degradedAfterMs: overrides.degradedAfterMs ?? d.degradedAfterMs,
    hardTimeoutMs: overrides.hardTimeoutMs ?? d.hardTimeoutMs,
    handshakeTimeoutMs: overrides.handshakeTimeoutMs ?? d.handshakeTimeoutMs,
    connectTimeoutMs: overrides.connectTimeoutMs ?? d.connectTimeoutMs,
    closeTimeoutMs: overrides.closeTimeoutMs ?? d.closeTimeoutMs,
    reconnect: {
      maxAttempts: overrides.reconnect?.maxAttempts ?? d.reconnect.maxAttempts,
      backoff: {
        initial: backoff.initial ?? d.reconnect.backoff.initial,
        max: backoff.max ?? d.reconnect.backoff.max,
        factor: backoff.factor ?? d.reconnect.backoff.factor,
        jitter: backoff.jitter ?? d.reconnect.backoff.jitter,
      },
    },
    chunkSize: overrides.chunkSize ?? d.chunkSize,
    windowSize: overrides.windowSize ?? d.windowSize,
    transferTimeoutMs: overrides.transferTimeoutMs ?? d.transferTimeoutMs,
    maxTransferSize: overrides.maxTransferSize ?? d.maxTransferSize,
    journalMaxBytes: overrides.journalMaxBytes ?? d.journalMaxBytes,
    logLevel: overrides.logLevel ?? d.logLevel,
  };
  validateConfig(config);
  return config;
}

export function validateConfig(config: LinkConfig): void {
  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0 || config.chunkSize > MAX_CHUNK_SIZE) {
    throw new Error(`Invalid chunkSize: must be an integer in 1..${MAX_CHUNK_SIZE}`);
  }
  if (!Number.isInteger(config.windowSize) || config.windowSize < 1) {
    throw new Error('Invalid windowSize: must be a positive integer');
  }
  if (!Number.isInteger(config.journalMaxBytes) || config.journalMaxBytes < 1) {
    throw new Error('Invalid journalMaxBytes: must be a positive integer');
  }
  if (config.heartbeatIntervalMs <= 0) {
    throw new Error('Invalid heartbeatIntervalMs: must be positive');
  }
  if (config.degradedAfterMs >= config.hardTimeoutMs) {
    throw new Error('Invalid timeouts: degradedAfterMs must be less than hardTimeoutMs');
  }
  if (config.reconnect.maxAttempts < 0) {
    throw new Error('Invalid reconnect.maxAttempts: must not be negative');
  }
  const { jitter, factor } = config.reconnect.backoff;
  if (jitter < 0 || jitter > 1) {
    throw new Error('Invalid backoff jitter: must be within [0, 1]');
  }
  if (factor < 1) {
    throw new Error('Invalid backoff factor: must be at least 1');
  }
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid ${name}: expected an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Read LINK_* environment variables on top of the defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LinkConfig {
  const overrides: LinkConfigOverrides = {
    heartbeatIntervalMs: intFromEnv(env, 'LINK_HEARTBEAT_INTERVAL_MS'),
    degradedAfterMs: intFromEnv(env, 'LINK_DEGRADED_AFTER_MS'),
    hardTimeoutMs: intFromEnv(env, 'LINK_HARD_TIMEOUT_MS'),
    handshakeTimeoutMs: intFromEnv(env, 'LINK_HANDSHAKE_TIMEOUT_MS'),
    connectTimeoutMs: intFromEnv(env, 'LINK_CONNECT_TIMEOUT_MS'),
    chunkSize: intFromEnv(env, 'LINK_CHUNK_SIZE'),
    windowSize: intFromEnv(env, 'LINK_WINDOW_SIZE'),
    transferTimeoutMs: intFromEnv(env, 'LINK_TRANSFER_TIMEOUT_MS'),
    reconnect: {
      maxAttempts: intFromEnv(env, 'LINK_RECONNECT_MAX_ATTEMPTS'),
      backoff: {
        initial: intFromEnv(env, 'LINK_RECONNECT_INITIAL_MS'),
        max: intFromEnv(env, 'LINK_RECONNECT_MAX_MS'),
      },
    },
  };

  const level = env.LINK_LOG_LEVEL?.toLowerCase();
  if (level !== undefined && level !== '' && !isLogLevel(level)) {
    throw new Error(`Invalid LINK_LOG_LEVEL: ${env.LINK_LOG_LEVEL}`);
  }
  overrides.logLevel = levelFromEnv(env);

  return resolveConfig(overrides);
}
