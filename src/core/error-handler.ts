// Error handling for the edges of the renamer: configuration and input files.
// Per-photo problems are statuses, never errors.

import { Logger } from '../types';

export enum ErrorCategory {
  CONFIGURATION = 'configuration',
  VALIDATION = 'validation',
  FILE_SYSTEM = 'file_system',
  PARSE = 'parse',
  UNKNOWN = 'unknown',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  operation: string;
  filePath?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface CategorizedError {
  originalError: Error;
  category: ErrorCategory;
  severity: ErrorSeverity;
  context: ErrorContext;
  message: string;
  userMessage: string;
}

export interface ErrorStatistics {
  totalErrors: number;
  errorsByCategory: Record<ErrorCategory, number>;
  errorsBySeverity: Record<ErrorSeverity, number>;
}

/**
 * Raised when the configuration cannot be loaded or fails validation
 */
export class ConfigurationError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

/**
 * Raised when a photo record source yields nothing usable
 */
export class PhotoSourceError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(message);
    this.name = 'PhotoSourceError';
    this.filePath = filePath;
  }
}

/**
 * Categorizes, logs and keeps a bounded history of errors
 */
export class ErrorHandler {
  private readonly logger: Logger;
  private readonly errorHistory: CategorizedError[] = [];
  private readonly maxHistorySize: number;
  private statistics: ErrorStatistics;

  constructor(logger: Logger, maxHistorySize = 100) {
    this.logger = logger;
    this.maxHistorySize = maxHistorySize;
    this.statistics = this.emptyStatistics();
  }

  handleError(error: Error, context: ErrorContext): CategorizedError {
    const categorized = this.categorizeError(error, context);

    this.statistics.totalErrors++;
    this.statistics.errorsByCategory[categorized.category]++;
    this.statistics.errorsBySeverity[categorized.severity]++;

    this.errorHistory.push(categorized);
    if (this.errorHistory.length > this.maxHistorySize) {
      this.errorHistory.shift();
    }

    this.logError(categorized);
    return categorized;
  }

  getStatistics(): ErrorStatistics {
    return {
      totalErrors: this.statistics.totalErrors,
      errorsByCategory: { ...this.statistics.errorsByCategory },
      errorsBySeverity: { ...this.statistics.errorsBySeverity },
    };
  }

  getErrorsByCategory(category: ErrorCategory): CategorizedError[] {
    return this.errorHistory.filter((error) => error.category === category);
  }

  clearHistory(): void {
    this.errorHistory.length = 0;
    this.statistics = this.emptyStatistics();
  }

  categorizeError(error: Error, context: ErrorContext): CategorizedError {
    const message = error.message.toLowerCase();
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;

    let category = ErrorCategory.UNKNOWN;
    let severity = ErrorSeverity.MEDIUM;

    if (error instanceof ConfigurationError) {
      category = ErrorCategory.CONFIGURATION;
      severity = ErrorSeverity.HIGH;
    } else if (error instanceof PhotoSourceError) {
      category = ErrorCategory.PARSE;
      severity = ErrorSeverity.HIGH;
    } else if (error instanceof SyntaxError) {
      category = ErrorCategory.PARSE;
      severity = ErrorSeverity.HIGH;
    } else if (
      (code !== undefined && ['ENOENT', 'EACCES', 'EISDIR', 'ENOTDIR', 'ENOSPC'].includes(code)) ||
      message.includes('no such file') ||
      message.includes('permission denied')
    ) {
      category = ErrorCategory.FILE_SYSTEM;
      severity = ErrorSeverity.HIGH;
    } else if (message.includes('invalid') || message.includes('must be')) {
      category = ErrorCategory.VALIDATION;
      severity = ErrorSeverity.LOW;
    }

    return {
      originalError: error,
      category,
      severity,
      context,
      message: error.message,
      userMessage: this.generateUserMessage(category, error, context),
    };
  }

  private generateUserMessage(category: ErrorCategory, error: Error, context: ErrorContext): string {
    const operation = context.operation.replace(/_/g, ' ');
    const file = context.filePath ? ` (${context.filePath})` : '';

    switch (category) {
      case ErrorCategory.CONFIGURATION:
        return error instanceof ConfigurationError && error.errors.length > 0
          ? `Configuration error: ${error.errors.join('; ')}`
          : `Configuration error: ${error.message}`;
      case ErrorCategory.PARSE:
        return `Could not read photo records during ${operation}${file}: ${error.message}`;
      case ErrorCategory.FILE_SYSTEM:
        return `File system error during ${operation}${file}. Check that the path exists and is readable.`;
      case ErrorCategory.VALIDATION:
        return `Invalid input during ${operation}: ${error.message}`;
      default:
        return `Unexpected error during ${operation}${file}: ${error.message}`;
    }
  }

  private logError(error: CategorizedError): void {
    const logMessage = `${error.category.toUpperCase()} error in ${error.context.operation}`;
    const logMeta = {
      severity: error.severity,
      filePath: error.context.filePath,
      message: error.message,
    };

    if (error.severity === ErrorSeverity.LOW) {
      this.logger.debug(logMessage, logMeta);
    } else if (error.severity === ErrorSeverity.MEDIUM) {
      this.logger.warn(logMessage, logMeta);
    } else {
      this.logger.error(logMessage, logMeta);
    }
  }

  private emptyStatistics(): ErrorStatistics {
    return {
      totalErrors: 0,
      errorsByCategory: {
        [ErrorCategory.CONFIGURATION]: 0,
        [ErrorCategory.VALIDATION]: 0,
        [ErrorCategory.FILE_SYSTEM]: 0,
        [ErrorCategory.PARSE]: 0,
        [ErrorCategory.UNKNOWN]: 0,
      },
      errorsBySeverity: {
        [ErrorSeverity.LOW]: 0,
        [ErrorSeverity.MEDIUM]: 0,
        [ErrorSeverity.HIGH]: 0,
        [ErrorSeverity.CRITICAL]: 0,
      },
    };
  }
}
