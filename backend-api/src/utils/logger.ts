type LogMode = 'dev' | 'prod';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown> | undefined;

type LogOptions = { critical?: boolean };

function getLogMode(): LogMode {
  const raw = String(process.env.TRIPSYNC_LOG_MODE ?? '').trim().toLowerCase();
  if (raw === 'dev' || raw === 'development') return 'dev';
  if (raw === 'prod' || raw === 'production') return 'prod';
  return process.env.NODE_ENV === 'development' ? 'dev' : 'prod';
}

function shouldLog(level: LogLevel, critical: boolean): boolean {
  if (critical || level === 'error') return true;
  if (getLogMode() === 'dev') return true;
  return level === 'warn';
}

export function formatLine(level: LogLevel, message: string, meta?: LogMeta): string {
  const ts = new Date().toISOString();
  const base = `[${ts}] [${level.toUpperCase()}] ${message}`;
  if (!meta || Object.keys(meta).length === 0) return base;
  return `${base} ${JSON.stringify(meta)}`;
}

function write(level: LogLevel, message: string, meta: LogMeta, critical: boolean) {
  if (!shouldLog(level, critical)) return;
  const line = formatLine(level, message, meta);
  // eslint-disable-next-line no-console
  if (level === 'error') console.error(line);
  // eslint-disable-next-line no-console
  else if (level === 'warn') console.warn(line);
  // eslint-disable-next-line no-console
  else console.log(line);
}

export function logInfo(message: string, meta?: LogMeta, opts?: LogOptions) {
  write('info', message, meta, opts?.critical === true);
}

export function logWarn(message: string, meta?: LogMeta, opts?: LogOptions) {
  write('warn', message, meta, opts?.critical === true);
}

export function logError(message: string, meta?: LogMeta) {
  write('error', message, meta, true);
}

export function logDebug(message: string, meta?: LogMeta) {
  write('debug', message, meta, false);
}

export type ScopedLogger = {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta, opts?: LogOptions): void;
  warn(message: string, meta?: LogMeta, opts?: LogOptions): void;
  error(message: string, meta?: LogMeta): void;
};

/** Prefixes every line with `[scope]` and merges `base` into its meta. */
export function createLogger(scope: string, base: Record<string, unknown> = {}): ScopedLogger {
  const tag = (message: string) => `[${scope}] ${message}`;
  const merge = (meta: LogMeta): LogMeta => (meta ? { ...base, ...meta } : { ...base });
  return {
    debug: (message, meta) => logDebug(tag(message), merge(meta)),
    info: (message, meta, opts) => logInfo(tag(message), merge(meta), opts),
    warn: (message, meta, opts) => logWarn(tag(message), merge(meta), opts),
    error: (message, meta) => logError(tag(message), merge(meta)),
  };
}
