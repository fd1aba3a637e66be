export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel | 'SILENT', number> = { INFO: 0, WARN: 1, ERROR: 2, SILENT: 3 };

function parseThreshold(value: string | undefined): LogLevel | 'SILENT' {
  const upper = value?.trim().toUpperCase();
  if (upper === 'INFO' || upper === 'WARN' || upper === 'ERROR' || upper === 'SILENT') return upper;
  return 'INFO';
}

let threshold = parseThreshold(process.env.LOG_LEVEL);

export function setLogLevel(level: string): void {
  threshold = parseThreshold(level);
}

export function logServer(level: LogLevel, context: string, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const timestamp = new Date().toISOString();
  const dataStr = data ? ` | ${JSON.stringify(data)}` : '';
  const log = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
  log(`[${timestamp}] [${level}] [${context}] ${message}${dataStr}`);
}

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function createLogger(context: string): Logger {
  return {
    info: (message, data) => logServer('INFO', context, message, data),
    warn: (message, data) => logServer('WARN', context, message, data),
    error: (message, data) => logServer('ERROR', context, message, data),
  };
}
