import fs from 'fs';
import path from 'path';
import envPaths from 'env-paths';
import { APP_NAME, LOG_FILE_NAME, MAX_LOG_FILE_SIZE, MAX_LOG_FILES } from '../config/constants';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Absolute path of the active log file
 *
 * The terminal belongs to the Ink UI, so log output goes to a file in the
 * platform log directory instead of stdout.
 */
export function getLogPath(): string {
  return path.join(envPaths(APP_NAME).log, LOG_FILE_NAME);
}

// exporter.log -> exporter.log.1 -> ... -> exporter.log.(MAX_LOG_FILES - 1), oldest dropped
function rotate(file: string): void {
  const oldest = `${file}.${MAX_LOG_FILES - 1}`;
  if (fs.existsSync(oldest)) {
    fs.unlinkSync(oldest);
  }
  for (let i = MAX_LOG_FILES - 2; i >= 1; i--) {
    const from = `${file}.${i}`;
    if (fs.existsSync(from)) {
      fs.renameSync(from, `${file}.${i + 1}`);
    }
  }
  fs.renameSync(file, `${file}.1`);
}

function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

class Logger {
  private level: LogLevel = 'info';
  private disabled = false;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (this.disabled || !this.isLevelEnabled(level)) return;

    const entry = {
      ...(context ?? {}),
      time: new Date().toISOString(),
      level,
      message,
    };
    const line = JSON.stringify(entry, (_key, value: unknown) => serialize(value));

    try {
      const file = getLogPath();
      fs.mkdirSync(path.dirname(file), { recursive: true });
      const stats = fs.statSync(file, { throwIfNoEntry: false });
      if (stats && stats.size >= MAX_LOG_FILE_SIZE) {
        rotate(file);
      }
      fs.appendFileSync(file, `${line}\n`, 'utf8');
    } catch (error) {
      // Stop retrying on every call once the log directory is unusable
      this.disabled = true;
      const reason = error instanceof Error ? error.message : String(error);
      process.stderr.write(`Logging disabled: ${reason}\n`);
    }
  }
}

export const logger = new Logger();
