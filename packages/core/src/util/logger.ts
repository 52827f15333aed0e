/**
 * Minimal leveled logger writing `[schemock] level: message` lines to stderr.
 * Instances are passed through constructors; there is no process-wide logger.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  write?: (line: string) => void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value)
  );
}

function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const keys = Object.keys(fields);
  if (keys.length === 0) return '';
  return ` ${JSON.stringify(fields)}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'warn';
  const prefix = options.prefix ?? 'schemock';
  const write =
    options.write ?? ((line: string): void => void process.stderr.write(line));

  const emit =
    (at: Exclude<LogLevel, 'silent'>) =>
    (message: string, fields?: LogFields): void => {
      if (RANK[at] < RANK[level]) return;
      write(`[${prefix}] ${at}: ${message}${formatFields(fields)}\n`);
    };

  return {
    level,
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

export const silentLogger: Logger = createLogger({
  level: 'silent',
  write: () => undefined,
});
