import { randomUUID } from 'node:crypto';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (message: string, meta?: Record<string, JsonValue>) => void;
  info: (message: string, meta?: Record<string, JsonValue>) => void;
  warn: (message: string, meta?: Record<string, JsonValue>) => void;
  error: (message: string, meta?: Record<string, JsonValue>) => void;
}

export interface JsonLoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const createJsonLogger = (options: JsonLoggerOptions = {}): Logger => {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => process.stdout.write(line));

  const emit = (level: LogLevel, message: string, meta?: Record<string, JsonValue>) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const payload = {
      ts: new Date().toISOString(),
      level,
      message,
      ...(meta ? { meta } : {})
    };
    write(`${JSON.stringify(payload)}\n`);
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta)
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

export const ensureRequestId = (value?: string): string => value && value.length > 0 ? value : randomUUID();
