/**
 * Leveled console logging with per-component scopes.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class Logger {
  constructor(
    private readonly scope: string,
    private level: LogLevel = 'info'
  ) {}

  /**
   * Create a logger for a sub-component sharing this logger's level
   */
  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.level);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, meta?: unknown): void {
    if (this.isEnabled('debug')) {
      console.log(this.format('DEBUG', message, meta));
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.isEnabled('info')) {
      console.log(this.format('INFO', message, meta));
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.isEnabled('warn')) {
      console.warn(this.format('WARN', message, meta));
    }
  }

  error(message: string, meta?: unknown): void {
    if (this.isEnabled('error')) {
      console.error(this.format('ERROR', message, meta));
    }
  }

  /**
   * Log a state transition (debug only)
   */
  transition(from: string, to: string, reason?: string): void {
    this.debug(`State: ${from} -> ${to}`, reason ? { reason } : undefined);
  }

  private format(label: string, message: string, meta?: unknown): string {
    const metaStr = meta === undefined ? '' : ` ${JSON.stringify(meta)}`;
    return `[${new Date().toISOString()}] [${label}] [${this.scope}] ${message}${metaStr}`;
  }
}

/**
 * Resolve the level from LINK_LOG_LEVEL, or debug when LINK_DEBUG=1
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LINK_LOG_LEVEL?.toLowerCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }
  return env.LINK_DEBUG === '1' ? 'debug' : 'info';
}

export function createLogger(scope: string, level: LogLevel = levelFromEnv()): Logger {
  return new Logger(scope, level);
}
