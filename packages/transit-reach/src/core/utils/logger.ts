/**
 * Structured logging utility for transit-reach
 *
 * Each module gets its own logger (`createLogger({ module })`). Run-level
 * context such as the origin or the query time is bound once with
 * `withContext` and repeated on every line of that run.
 *
 * Output goes to the console: JSON lines when `TRANSIT_REACH_LOG_FORMAT=json`
 * or in production, otherwise one `key=value` line per entry. The level comes
 * from `TRANSIT_REACH_LOG_LEVEL`, then `LOG_LEVEL`, then `info`.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Minimal logging surface accepted by the pipeline components
 */
export interface LoggerLike {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

/**
 * Destination for formatted lines
 */
export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly module: string;
  readonly format: LogFormat;
  /** Bound to every line */
  readonly context?: LogMetadata;
  readonly writer?: LogWriter;
  readonly clock?: () => Date;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleWriter: LogWriter = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

export class Logger implements LoggerLike {
  private readonly writer: LogWriter;
  private readonly clock: () => Date;
  private readonly context: LogMetadata;

  constructor(private readonly config: LoggerConfig) {
    this.writer = config.writer ?? consoleWriter;
    this.clock = config.clock ?? (() => new Date());
    this.context = config.context ?? {};
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.level];
  }

  /**
   * Same module and sinks, with extra bound context
   */
  child(context: LogMetadata): Logger {
    return new Logger({ ...this.config, context: { ...this.context, ...context } });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.emit('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.emit('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.emit('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.emit('error', message, metadata);
  }

  private emit(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled(level)) return;
    const fields = { ...this.context, ...metadata };
    const time = this.clock().toISOString();

    if (this.config.format === 'json') {
      this.writer(level, JSON.stringify({ time, level, module: this.config.module, msg: message, ...fields }));
      return;
    }

    const pairs = Object.entries(fields).map(([key, value]) => `${key}=${formatField(value)}`);
    const head = `${time.slice(11, 23)} ${level.toUpperCase().padEnd(5)} [${this.config.module}] ${message}`;
    this.writer(level, pairs.length > 0 ? `${head} ${pairs.join(' ')}` : head);
  }
}

/**
 * Pretty-line value: bare when it has no spaces, JSON otherwise
 */
function formatField(value: unknown): string {
  if (typeof value === 'number' || typeof value === 'boolean' || value === null || value === undefined) {
    return String(value);
  }
  if (typeof value === 'string') {
    return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  return JSON.stringify(value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = (env.TRANSIT_REACH_LOG_LEVEL ?? env.LOG_LEVEL)?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
}

export function resolveLogFormat(env: NodeJS.ProcessEnv = process.env): LogFormat {
  const format = env.TRANSIT_REACH_LOG_FORMAT?.toLowerCase();
  if (format === 'json' || format === 'pretty') {
    return format;
  }
  return env.NODE_ENV === 'production' ? 'json' : 'pretty';
}

/**
 * Create a logger scoped to a module
 */
export function createLogger(options: { readonly module: string; readonly context?: LogMetadata }): Logger {
  return new Logger({
    level: resolveLogLevel(),
    format: resolveLogFormat(),
    module: options.module,
    context: options.context,
  });
}

export const logger = createLogger({ module: 'transit-reach' });

/**
 * Bind context to any logger; a `Logger` keeps its own sinks via `child`
 */
export function withContext(target: LoggerLike, context: LogMetadata): LoggerLike {
  if (target instanceof Logger) {
    return target.child(context);
  }
  return {
    debug: (message, metadata) => target.debug(message, { ...context, ...metadata }),
    info: (message, metadata) => target.info(message, { ...context, ...metadata }),
    warn: (message, metadata) => target.warn(message, { ...context, ...metadata }),
    error: (message, metadata) => target.error(message, { ...context, ...metadata }),
  };
}

/**
 * Logger that drops everything (tests, library callers that log elsewhere)
 */
export const silentLogger: LoggerLike = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
