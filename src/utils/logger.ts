export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

let minLevel: LogLevel = 'info';

export function setLogLevel(level: string): void {
  const normalized = level.toLowerCase();
  if (isLogLevel(normalized)) {
    minLevel = normalized;
  }
}

export function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
  const write = level === 'error' ? console.error : console.log;

  if (data) {
    write(`${prefix} ${message}`, JSON.stringify(data, null, 2));
  } else {
    write(`${prefix} ${message}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
