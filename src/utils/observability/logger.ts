import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import config from '../../config.js';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = config.logging.level;
let sinkHooksInstalled = false;
let fileSink: { path: string; stream: WriteStream } | null = null;

/**
 * Override the minimum level for the rest of the process (`--verbose`).
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

function resolveLogFilePath(): string | undefined {
  return process.env.APP_LOG_FILE || config.logging.file;
}

function closeFileSink(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

function ensureFileSink(): WriteStream | null {
  const filePath = resolveLogFilePath();
  if (!filePath || filePath === 'off') return null;

  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeFileSink();

  const dir = dirname(filePath);
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', () => {
      // Never break command output due to logging issues.
    });
    fileSink = { path: filePath, stream };
    return stream;
  } catch {
    return null;
  }
}

function writeLineToFile(line: string): void {
  const sink = ensureFileSink();
  if (!sink) return;
  sink.write(`${line}\n`);
}

// stdout is reserved for the command's JSON result.
function writeToStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

function normalizeData(data?: LogData): LogData {
  if (!data) return {};
  return redactSecrets(data);
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  const context = getLogContext();
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...context,
    ...baseContext,
    ...normalizeData(data),
  };
}

function emitRecord(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  writeToStderr(line);
  writeLineToFile(line);
}

export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    if (!isEnabled(level)) return;
    emitRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event: string, data?: LogData) => log('debug', event, data),
    info: (event: string, data?: LogData) => log('info', event, data),
    warn: (event: string, data?: LogData) => log('warn', event, data),
    error: (event: string, data?: LogData) => log('error', event, data),
    child: (context: LogContext) => createLogger({ ...baseContext, ...context }),
  };
}

export function initObservability(options: { verbose?: boolean } = {}): void {
  if (options.verbose) {
    setLogLevel('debug');
  }

  if (!sinkHooksInstalled) {
    sinkHooksInstalled = true;
    process.once('exit', closeFileSink);
  }
}
