import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.blue('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red('ERROR'),
};

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  // Defaults to stderr so that stdout stays free for the MCP stdio transport
  write?: (line: string) => void;
  clock?: () => Date;
}

export function formatFields(fields: LogFields | undefined): string {
  if (!fields) return '';

  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = typeof value === 'string' && /\s/.test(value)
      ? JSON.stringify(value)
      : String(value);
    parts.push(`${key}=${text}`);
  }

  return parts.length > 0 ? ' ' + chalk.dim(parts.join(' ')) : '';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  const clock = options.clock ?? (() => new Date());
  const scope = options.scope;

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < threshold) return;

    const time = clock().toISOString().slice(11, 19);
    const scopeText = scope ? ' ' + chalk.cyan(`[${scope}]`) : '';
    write(`${chalk.gray(time)} ${LEVEL_LABELS[level]}${scopeText} ${message}${formatFields(fields)}`);
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    child: (childScope) => createLogger({
      ...options,
      scope: scope ? `${scope}:${childScope}` : childScope,
    }),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
