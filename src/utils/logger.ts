import { logEnv } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// Graph and Supabase credentials must never reach the log.
const SECRET_KEY = /token|secret|service_?key|authorization/i;
const TOKEN_IN_URL = /(access_token=)[^&\s"]+/g;

function clean(value: unknown): unknown {
  if (value instanceof Error) return `${value.name}: ${value.message}`.replace(TOKEN_IN_URL, '$1***');
  if (typeof value === 'string') return value.replace(TOKEN_IN_URL, '$1***');
  return value;
}

export function redact(meta: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(meta).map(([k, v]) => [k, SECRET_KEY.test(k) ? '***' : clean(v)]),
  );
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[logEnv.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const fields = meta ? redact(meta) : undefined;
  const out = logEnv.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...fields })
    : fields ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(fields)}`
             : `[${ts}] [${level.toUpperCase()}] ${message}`;
  if (level === 'error') process.stderr.write(out + '\n');
  else process.stdout.write(out + '\n');
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log('debug', msg, meta),
  info:  (msg: string, meta?: Record<string, unknown>) => log('info',  msg, meta),
  warn:  (msg: string, meta?: Record<string, unknown>) => log('warn',  msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log('error', msg, meta),
};
