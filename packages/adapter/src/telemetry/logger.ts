import { Writable } from 'node:stream';
import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { trace } from '@opentelemetry/api';
import type { Config } from '@/config';

type LogRecord = Record<string, unknown>;

const LEVEL_NAMES: Record<number, string> = {
  10: 'TRACE',
  20: 'DEBUG',
  30: 'INFO',
  40: 'WARN',
  50: 'ERROR',
  60: 'FATAL',
};

const LEVEL_COLORS: Record<string, string> = {
  TRACE: '\u001b[2m',
  DEBUG: '\u001b[36m',
  INFO: '\u001b[32m',
  WARN: '\u001b[33m',
  ERROR: '\u001b[31m',
  FATAL: '\u001b[35m',
};

const RESET = '\u001b[0m';
const MODULE_COLOR = '\u001b[34m';

const HEADER_KEYS = new Set(['level', 'time', 'msg', 'module', 'traceId', 'spanId']);

let rootLogger: PinoLogger | null = null;

const isRecord = (value: unknown): value is LogRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const paint = (text: string, color: string | undefined, enabled: boolean): string =>
  enabled && color ? `${color}${text}${RESET}` : text;

const indent = (text: string): string =>
  text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');

/**
 * Renders one pino JSON record as `[Module] [LEVEL] yyyy-mm-dd hh:mm:ss message`,
 * followed by the remaining fields and, for errors, the stack.
 */
export const formatLogLine = (record: LogRecord, useColor: boolean): string => {
  const moduleName = typeof record.module === 'string' ? record.module : 'App';
  const level = typeof record.level === 'number' ? (LEVEL_NAMES[record.level] ?? 'INFO') : 'INFO';
  const time = typeof record.time === 'number' ? new Date(record.time) : new Date();
  const message = typeof record.msg === 'string' && record.msg.length > 0 ? record.msg : '(no message)';

  const header = [
    paint(`[${moduleName}]`, MODULE_COLOR, useColor),
    paint(`[${level}]`, LEVEL_COLORS[level], useColor),
    paint(time.toISOString().slice(0, 19).replace('T', ' '), LEVEL_COLORS.TRACE, useColor),
    message,
  ].join(' ');

  const payload: LogRecord = {};
  let stack: string | null = null;
  for (const [key, value] of Object.entries(record)) {
    if (HEADER_KEYS.has(key)) {
      continue;
    }
    if (key === 'err' && isRecord(value) && typeof value.stack === 'string') {
      const { stack: errStack, ...rest } = value;
      stack = typeof errStack === 'string' ? errStack : null;
      payload[key] = rest;
      continue;
    }
    payload[key] = value;
  }

  const parts = [header];
  if (Object.keys(payload).length > 0) {
    parts.push(indent(JSON.stringify(payload, null, 2)));
  }
  if (stack) {
    parts.push(indent(stack));
  }
  return parts.join('\n');
};

class PrettyLogStream extends Writable {
  constructor(private readonly useColor: boolean) {
    super();
  }

  override _write(chunk: string | Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    for (const line of chunk.toString().split('\n')) {
      if (line.trim().length === 0) {
        continue;
      }
      let rendered = line;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isRecord(parsed)) {
          rendered = formatLogLine(parsed, this.useColor);
        }
      } catch {
        rendered = line;
      }
      process.stdout.write(`${rendered}\n`);
    }
    callback();
  }
}

export const initRootLogger = (config: Config): PinoLogger => {
  if (rootLogger) {
    return rootLogger;
  }

  const loggerOptions: LoggerOptions = {
    level: config.telemetry.logLevel,
    base: undefined,
    redact: {
      paths: config.telemetry.redactPaths,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    mixin() {
      const activeSpan = trace.getActiveSpan();
      if (!activeSpan) {
        return {};
      }
      const { traceId, spanId } = activeSpan.spanContext();
      return { traceId, spanId };
    },
  };

  rootLogger =
    config.telemetry.logFormat === 'pretty'
      ? pino(loggerOptions, new PrettyLogStream(process.stdout.isTTY === true))
      : pino(loggerOptions);
  return rootLogger;
};

export const getLogger = (moduleName: string): PinoLogger => {
  if (!rootLogger) {
    rootLogger = pino({
      level: process.env.LOG_LEVEL ?? 'info',
      base: undefined,
    });
  }
  return rootLogger.child({ module: moduleName });
};

export type { PinoLogger as Logger };
