// Core interfaces and types for the photo renamer

export * from './utils';

/**
 * A photo as yielded by the archive-parsing step, before any processing
 */
export interface RawPhotoRecord {
  /** Address of the full-size photo */
  url: string;
  /** Description text exactly as it appeared in the archive */
  description: string;
  /** Upload date string, passed through untouched to the download step */
  date: string;
}

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

// Configuration validation
export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
}
