import { Logger, LogLevel } from '../types';
import { LOG_LEVELS } from './constants';
import * as fs from 'fs';
import * as path from 'path';

const LOG_FILE_PREFIX = 'photo-renamer-';
const LEVEL_ORDER: LogLevel[] = Object.values(LOG_LEVELS);

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
  sessionId?: string;
  component?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableFileLogging: boolean;
  logDirectory: string;
  maxFileSize: number; // in bytes
  maxFiles: number;
  enableConsole: boolean;
  sessionId?: string;
  component?: string;
}

function isEnabled(configured: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(configured);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const upper = value?.toUpperCase();
  return LEVEL_ORDER.find((level) => level === upper) ?? fallback;
}

/**
 * Structured logger with optional JSON-lines file output.
 *
 * Console lines all go to stderr so that a naming plan printed on stdout
 * can be piped without log noise.
 */
export class EnhancedLogger implements Logger {
  private readonly config: LoggerConfig;
  private currentLogFile?: string;
  private logFileSize = 0;
  /** Owner of the log file when this is a child logger. */
  private parent?: EnhancedLogger;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: 'INFO',
      enableFileLogging: false,
      logDirectory: './logs',
      maxFileSize: 5 * 1024 * 1024, // 5MB
      maxFiles: 5,
      enableConsole: true,
      ...config,
    };

    if (this.config.enableFileLogging) {
      this.openLogFile();
    }
  }

  error(message: string, meta?: unknown): void {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.log('DEBUG', message, meta);
  }

  getLogFilePath(): string | undefined {
    return this.fileOwner().currentLogFile;
  }

  /**
   * A logger sharing this one's settings, tagged with a component. File
   * output goes through this logger, so both follow the same rotation.
   */
  createChildLogger(component: string): EnhancedLogger {
    const child = new EnhancedLogger({ ...this.config, component, enableFileLogging: false });
    child.parent = this.fileOwner();
    return child;
  }

  private fileOwner(): EnhancedLogger {
    return this.parent ?? this;
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!isEnabled(this.config.level, level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      meta,
      sessionId: this.config.sessionId,
      component: this.config.component,
    };

    if (this.config.enableConsole) {
      const component = entry.component ? ` [${entry.component}]` : '';
      const metaStr = entry.meta !== undefined ? ` ${JSON.stringify(entry.meta)}` : '';
      process.stderr.write(`[${level}] ${entry.timestamp}${component} ${message}${metaStr}\n`);
    }

    const owner = this.fileOwner();
    if (owner.config.enableFileLogging) {
      owner.writeToFile(entry);
    }
  }

  private writeToFile(entry: LogEntry): void {
    if (!this.currentLogFile) {
      return;
    }

    const line = JSON.stringify(entry) + '\n';
    try {
      fs.appendFileSync(this.currentLogFile, line);
      this.logFileSize += Buffer.byteLength(line);

      if (this.logFileSize > this.config.maxFileSize) {
        this.removeOldLogFiles();
        this.openLogFile();
      }
    } catch (error) {
      process.stderr.write(`Failed to write to log file: ${String(error)}\n`);
    }
  }

  private openLogFile(): void {
    try {
      fs.mkdirSync(this.config.logDirectory, { recursive: true });

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.currentLogFile = path.join(this.config.logDirectory, `${LOG_FILE_PREFIX}${timestamp}.log`);
      fs.writeFileSync(this.currentLogFile, '');
      this.logFileSize = 0;
    } catch (error) {
      process.stderr.write(`Failed to initialize file logging: ${String(error)}\n`);
      this.config.enableFileLogging = false;
    }
  }

  private removeOldLogFiles(): void {
    try {
      const files = fs
        .readdirSync(this.config.logDirectory)
        .filter((file) => file.startsWith(LOG_FILE_PREFIX) && file.endsWith('.log'))
        .map((file) => path.join(this.config.logDirectory, file))
        .sort((a, b) => fs.statSync(b).mtimeMs - fs.statSync(a).mtimeMs);

      // Keep room for the file about to be opened
      for (const file of files.slice(this.config.maxFiles - 1)) {
        fs.unlinkSync(file);
      }
    } catch (error) {
      process.stderr.write(`Failed to clean up old log files: ${String(error)}\n`);
    }
  }
}

/**
 * Plain console logger, used by tests and embedders that want no file output
 */
export class ConsoleLogger implements Logger {
  private readonly logLevel: LogLevel;

  constructor(logLevel: LogLevel = 'INFO') {
    this.logLevel = logLevel;
  }

  error(message: string, meta?: unknown): void {
    if (isEnabled(this.logLevel, 'ERROR')) {
      console.error(`[ERROR] ${message}`, formatMeta(meta));
    }
  }

  warn(message: string, meta?: unknown): void {
    if (isEnabled(this.logLevel, 'WARN')) {
      console.warn(`[WARN] ${message}`, formatMeta(meta));
    }
  }

  info(message: string, meta?: unknown): void {
    if (isEnabled(this.logLevel, 'INFO')) {
      console.info(`[INFO] ${message}`, formatMeta(meta));
    }
  }

  debug(message: string, meta?: unknown): void {
    if (isEnabled(this.logLevel, 'DEBUG')) {
      console.debug(`[DEBUG] ${message}`, formatMeta(meta));
    }
  }
}

function formatMeta(meta: unknown): string {
  return meta !== undefined ? JSON.stringify(meta, null, 2) : '';
}

// Default logger instance
export const logger = new EnhancedLogger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  sessionId: process.env.SESSION_ID,
});
