export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger that adds `context` to every line */
  child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** @default 'info' */
  level?: LogLevel;
  /** @default 'efaktur' */
  prefix?: string;
  context?: Record<string, unknown>;
}

type Severity = Exclude<LogLevel, 'silent'>;

const SEVERITY_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const SINKS: Record<Severity, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Console logger. Each call writes one line:
 *
 * ```text
 * 2024-05-01T08:00:00.000Z INFO [efaktur] Server listening {"port":3000}
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const prefix = options.prefix ?? 'efaktur';
  const bound = options.context ?? {};

  const emit = (severity: Severity, message: string, context?: Record<string, unknown>): void => {
    if (SEVERITY_RANK[severity] < SEVERITY_RANK[level]) {
      return;
    }
    const fields = context === undefined ? bound : { ...bound, ...context };
    const suffix = Object.keys(fields).length === 0 ? '' : ` ${JSON.stringify(fields)}`;
    SINKS[severity](
      `${new Date().toISOString()} ${severity.toUpperCase()} [${prefix}] ${message}${suffix}`,
    );
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
    child: (context) => createLogger({ level, prefix, context: { ...bound, ...context } }),
  };
}

export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}
