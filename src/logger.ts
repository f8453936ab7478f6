type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function minLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || 'info').toUpperCase();
  return isLogLevel(configured) ? configured : 'INFO';
}

function timestamp(): string {
  return new Date().toISOString();
}

function log(level: LogLevel, module: string, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel()]) return;

  const prefix = `[${timestamp()}] [${level}] [${module}]`;
  const write = level === 'WARN' || level === 'ERROR' ? console.error : console.log;
  if (data !== undefined) {
    write(`${prefix} ${message}`, data);
  } else {
    write(`${prefix} ${message}`);
  }
}

export function createLogger(module: string): Logger {
  return {
    debug: (msg, data) => log('DEBUG', module, msg, data),
    info: (msg, data) => log('INFO', module, msg, data),
    warn: (msg, data) => log('WARN', module, msg, data),
    error: (msg, data) => log('ERROR', module, msg, data),
  };
}
