/**
 * Standardized error handling utilities for the question answering pipeline
 *
 * Provides consistent error logging, categorization, and result types across
 * graph construction, configuration and answer generation.
 */

/**
 * Error categories for better classification and handling
 */
export enum ErrorCategory {
  CONSTRUCTION = 'construction',
  CONFIGURATION = 'configuration',
  GENERATION = 'generation'
}

/**
 * Error severity levels for prioritization
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  originalError?: Error;
  context?: Record<string, unknown>;
  timestamp: Date;
  recoveryHint?: string;
}

/**
 * Error result for operations that can fail gracefully
 */
export interface ErrorResult<T = unknown> {
  success: false;
  error: ErrorInfo;
}

/**
 * Success result for operations
 */
export interface SuccessResult<T = unknown> {
  success: true;
  data: T;
}

/**
 * Combined result type for fallible operations
 */
export type OperationResult<T = unknown> = SuccessResult<T> | ErrorResult<T>;

/**
 * Seed data cannot form a valid graph. Fatal at startup.
 */
export class GraphConstructionError extends Error {
  constructor(message: string, public readonly details: string[] = []) {
    super(message);
    this.name = 'GraphConstructionError';
  }
}

/**
 * Environment configuration failed validation.
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The generation collaborator did not answer in time.
 */
export class GenerationTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Generation timed out after ${timeoutMs}ms`);
    this.name = 'GenerationTimeoutError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Standard error handler with categorization and recovery hints
 */
export class ErrorHandler {
  private static errorCounts = new Map<string, number>();

  /**
   * Handle an error with proper categorization and logging
   */
  static handle(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    recoveryHint?: string
  ): ErrorInfo {
    const errorInfo: ErrorInfo = {
      category,
      severity,
      message,
      originalError,
      context,
      timestamp: new Date(),
      recoveryHint
    };

    this.logError(errorInfo);
    this.trackErrorFrequency(category, message);

    return errorInfo;
  }

  /**
   * Create a standardized error result
   */
  static createErrorResult<T>(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    recoveryHint?: string
  ): ErrorResult<T> {
    const error = this.handle(category, severity, message, originalError, context, recoveryHint);

    return {
      success: false,
      error
    };
  }

  /**
   * Create a standardized success result
   */
  static createSuccessResult<T>(data: T): SuccessResult<T> {
    return {
      success: true,
      data
    };
  }

  /**
   * Wrap an operation with error handling
   */
  static async wrapOperation<T>(
    operation: () => Promise<T>,
    category: ErrorCategory,
    operationName: string,
    context?: Record<string, unknown>,
    recoveryHint: string = `Check ${category} configuration and retry`
  ): Promise<OperationResult<T>> {
    try {
      const result = await operation();
      return this.createSuccessResult(result);
    } catch (error) {
      return this.createErrorResult<T>(
        category,
        ErrorSeverity.MEDIUM,
        `Failed to ${operationName}`,
        toError(error),
        context,
        recoveryHint
      );
    }
  }

  /**
   * Log error with appropriate formatting
   */
  private static logError(errorInfo: ErrorInfo): void {
    const emoji = this.getSeverityEmoji(errorInfo.severity);
    const timestamp = errorInfo.timestamp.toISOString();

    const logMessage = [
      `${emoji} [${errorInfo.category.toUpperCase()}] ${errorInfo.message}`,
      `   Severity: ${errorInfo.severity}`,
      `   Time: ${timestamp}`,
      errorInfo.context ? `   Context: ${JSON.stringify(errorInfo.context)}` : '',
      errorInfo.recoveryHint ? `   💡 Hint: ${errorInfo.recoveryHint}` : '',
      errorInfo.originalError ? `   Original: ${errorInfo.originalError.message}` : ''
    ].filter(Boolean).join('\n');

    if (errorInfo.severity === ErrorSeverity.CRITICAL) {
      console.error(logMessage);
    } else if (errorInfo.severity === ErrorSeverity.HIGH) {
      console.warn(logMessage);
    } else {
      console.log(logMessage);
    }
  }

  /**
   * Track error frequency for monitoring
   */
  private static trackErrorFrequency(category: ErrorCategory, message: string): void {
    const key = `${category}:${message}`;
    const currentCount = this.errorCounts.get(key) || 0;
    this.errorCounts.set(key, currentCount + 1);

    if (currentCount > 5) {
      console.warn(`🔔 Frequent error detected: ${key} (${currentCount + 1} times)`);
    }
  }

  private static getSeverityEmoji(severity: ErrorSeverity): string {
    switch (severity) {
      case ErrorSeverity.CRITICAL: return '🚨';
      case ErrorSeverity.HIGH: return '⚠️';
      case ErrorSeverity.MEDIUM: return '⚡';
      case ErrorSeverity.LOW: return 'ℹ️';
      default: return '❓';
    }
  }

  /**
   * Occurrence counts keyed by `category:message`, reported by the health endpoint
   */
  static getErrorStats(): Record<string, number> {
    return Object.fromEntries(this.errorCounts.entries());
  }

  /**
   * Reset error statistics
   */
  static resetErrorStats(): void {
    this.errorCounts.clear();
  }
}
