import { redactSensitiveData } from './pii-redaction';

/**
 * Service logger.
 * Production: one JSON line per entry. Development: coloured lines with a meta box.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogType = 'system' | 'http' | 'catalog';

export interface LogMeta {
  type?: LogType;
  method?: string;
  duration?: number;
  context?: string;
  [key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const INDICATORS: Record<LogLevel | LogType, string> = {
  error: '[ERROR]',
  warn: '[WARN]',
  info: '[INFO]',
  debug: '[DEBUG]',
  http: '[HTTP]',
  catalog: '[CATALOG]',
  system: '[SYSTEM]',
};

const ANSI = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  bold: '\x1b[1m',
};

function printBanner(): void {
  console.log(
    `${ANSI.green}${ANSI.bold}CATALOG CACHE SERVICE${ANSI.reset}\n` +
      `${ANSI.gray}${'='.repeat(60)}${ANSI.reset}\n` +
      `${ANSI.cyan}> booting // ${new Date().toISOString()}${ANSI.reset}\n` +
      `${ANSI.gray}${'='.repeat(60)}${ANSI.reset}\n`,
  );
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function getLogLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug');
  if (raw === 'log') return 'info';
  return isLogLevel(raw) ? raw : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[getLogLevel()];
}

function getTimestamp(): string {
  const now = new Date();
  return `${now.toTimeString().split(' ')[0]}.${String(now.getMilliseconds()).padStart(3, '0')}`;
}

function sanitizeMeta(meta?: LogMeta): LogMeta | undefined {
  if (!meta) {
    return undefined;
  }

  const redacted = redactSensitiveData(meta);
  if (typeof redacted !== 'object' || redacted === null || Array.isArray(redacted)) {
    return undefined;
  }

  return redacted as LogMeta;
}

function formatMetaForDisplay(meta?: LogMeta): string {
  const safeMeta = sanitizeMeta(meta);
  if (!safeMeta) return '';

  const { type: _type, method: _method, ...rest } = safeMeta;
  if (Object.keys(rest).length === 0) return '';

  return '\n┌─[DATA]\n│ ' + JSON.stringify(rest, null, 2).split('\n').join('\n│ ') + '\n└────────';
}

function log(level: LogLevel, message: string, meta?: LogMeta, context?: string): void {
  if (!shouldLog(level)) return;

  const indicator = meta?.type ? INDICATORS[meta.type] : INDICATORS[level];

  if (process.env.NODE_ENV === 'production') {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && { context }),
      ...(sanitizeMeta(meta) ?? {}),
    });
    if (level === 'error') process.stderr.write(line + '\n');
    else process.stdout.write(line + '\n');
    return;
  }

  const levelStyle = level === 'error' ? ANSI.red : level === 'warn' ? ANSI.yellow : '';
  const ctx = context ? `[${context}] ` : '';
  const methodPrefix = meta?.method ? `[${meta.method}] ` : '';
  const out = `${ANSI.gray}[${getTimestamp()}]${ANSI.reset} ${indicator} ${levelStyle}${ctx}${methodPrefix}${message}${formatMetaForDisplay(meta)}${ANSI.reset}`;

  switch (level) {
    case 'error':
      console.error(out);
      break;
    case 'warn':
      console.warn(out);
      break;
    default:
      console.log(out);
  }
}

function createLogFn(level: LogLevel, context?: string) {
  return (message: string, meta?: LogMeta) => log(level, message, meta, context);
}

function createTypedLogFn(level: LogLevel, type: LogType, context?: string) {
  return (message: string, meta?: Omit<LogMeta, 'type'>) =>
    log(level, message, { ...meta, type }, context);
}

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, error?: Error, meta?: LogMeta) => void;
  http: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  catalog: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  performance: (operation: string, startTime: number, meta?: Omit<LogMeta, 'type' | 'duration'>) => void;
  boot: () => void;
  isDebugEnabled: () => boolean;
}

function createLoggerImpl(context?: string): Logger {
  const isDev = process.env.NODE_ENV !== 'production';

  return {
    debug: createLogFn('debug', context),
    info: createLogFn('info', context),
    warn: createLogFn('warn', context),
    error: (message: string, error?: Error, meta?: LogMeta) => {
      log(
        'error',
        message,
        {
          ...meta,
          errorName: error?.name,
          errorMessage: error?.message,
          ...(isDev && error?.stack && { stack: error.stack }),
        },
        context,
      );
    },
    http: createTypedLogFn('debug', 'http', context),
    catalog: createTypedLogFn('info', 'catalog', context),
    performance: (operation: string, startTime: number, meta?: Omit<LogMeta, 'type' | 'duration'>) => {
      if (!shouldLog('debug')) return;
      log('debug', `Performance: ${operation}`, { ...meta, duration: Date.now() - startTime, type: 'system' }, context);
    },
    boot: (): void => {
      if (process.env.NODE_ENV === 'production') return;
      printBanner();
    },
    isDebugEnabled: () => shouldLog('debug'),
  };
}

export const logger: Logger = createLoggerImpl();

export function createLogger(context: string): Logger {
  return createLoggerImpl(context);
}
