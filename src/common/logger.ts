import { dtm } from './dtm.js';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export type LogFields = Record<string, unknown>;

/**
 * Receives one serialized jsonl record per call. Must tolerate concurrent callers,
 * which `console.log` does since every call writes a whole line.
 */
export type LogSink = (line: string) => void;

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

function serialize(level: LogLevel, msg: string, fields: LogFields): string {
  const time = dtm();

  try {
    return JSON.stringify({ time, level, msg, ...fields });
  } catch (error) {
    return JSON.stringify({
      time,
      level,
      msg,
      error: `unserializable log fields: ${getErrorMessage(error)}`,
    });
  }
}

/**
 * Creates a logger that writes one jsonl record per entry. The record includes a timestamp,
 * the log level, the message and any additional fields provided.
 */
export function createLogger(sink: LogSink = (line) => console.log(line)): Logger {
  const write = (level: LogLevel, msg: string, fields: LogFields = {}): void => {
    sink(serialize(level, msg, fields));
  };

  return {
    info: (msg, fields) => write('INFO', msg, fields),
    warn: (msg, fields) => write('WARN', msg, fields),
    error: (msg, fields) => write('ERROR', msg, fields),
  };
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return undefined;
}
