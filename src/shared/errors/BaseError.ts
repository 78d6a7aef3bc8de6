export interface ErrorContext {
  correlationId?: string;
  characterId?: string;
  uploadId?: number;
  operation?: string;
  timestamp?: Date;
  metadata?: Record<string, unknown>;
}

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ErrorDetails {
  code: string;
  message: string;
  statusCode: number;
  userMessage?: string;
  context?: ErrorContext;
  cause?: Error;
  isRetryable?: boolean;
  severity: ErrorSeverity;
}

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    correlationId?: string;
    timestamp: string;
    isRetryable: boolean;
    [key: string]: unknown;
  };
}

export abstract class BaseError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly userMessage?: string;
  public context?: ErrorContext;
  public readonly cause?: Error;
  public readonly isRetryable: boolean;
  public readonly severity: ErrorSeverity;
  public readonly timestamp: Date;

  constructor(details: ErrorDetails) {
    super(details.message);

    this.name = this.constructor.name;
    this.code = details.code;
    this.statusCode = details.statusCode;
    this.userMessage = details.userMessage;
    this.context = details.context;
    this.cause = details.cause;
    this.isRetryable = details.isRetryable ?? false;
    this.severity = details.severity;
    this.timestamp = details.context?.timestamp ?? new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      statusCode: this.statusCode,
      isRetryable: this.isRetryable,
      severity: this.severity,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }

  /**
   * Get user-friendly error message
   */
  getUserMessage(): string {
    return this.userMessage ?? this.getDefaultUserMessage();
  }

  /**
   * Get error for API response (without sensitive data)
   */
  toApiResponse(): ApiErrorBody {
    return {
      error: {
        code: this.code,
        message: this.getUserMessage(),
        correlationId: this.context?.correlationId,
        timestamp: this.timestamp.toISOString(),
        isRetryable: this.isRetryable,
      },
    };
  }

  /**
   * Merge additional context into this error
   */
  withContext(additionalContext: Partial<ErrorContext>): this {
    this.context = {
      ...this.context,
      ...additionalContext,
      metadata: { ...this.context?.metadata, ...additionalContext.metadata },
    };
    return this;
  }

  /**
   * Check if error matches a specific code
   */
  is(code: string): boolean {
    return this.code === code;
  }

  /**
   * Log level matching the severity
   */
  getLogLevel(): 'info' | 'warn' | 'error' | 'fatal' {
    switch (this.severity) {
      case 'low':
        return 'info';
      case 'medium':
        return 'warn';
      case 'high':
        return 'error';
      case 'critical':
        return 'fatal';
    }
  }

  protected abstract getDefaultUserMessage(): string;
}
