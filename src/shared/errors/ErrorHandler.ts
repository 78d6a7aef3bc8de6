import { randomUUID } from 'crypto';
import { BaseError, ErrorContext } from './BaseError';
import { logger } from '../../lib/logger';

/**
 * Wraps anything that is not already a BaseError
 */
class UnexpectedError extends BaseError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super({
      code: 'UNKNOWN_ERROR',
      message,
      statusCode: 500,
      context,
      cause,
      isRetryable: false,
      severity: 'high',
    });
  }

  protected getDefaultUserMessage(): string {
    return 'An unexpected error occurred. Please try again later.';
  }
}

export interface ErrorHandlerOptions {
  logErrors?: boolean;
}

export class ErrorHandler {
  private static instance: ErrorHandler;
  private readonly defaultOptions: ErrorHandlerOptions = {
    logErrors: true,
  };

  private constructor() {}

  static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler();
    }
    return ErrorHandler.instance;
  }

  /**
   * Handle any error and convert it to a standardized BaseError
   */
  handleError(error: unknown, context?: Partial<ErrorContext>, options?: ErrorHandlerOptions): BaseError {
    const mergedOptions = { ...this.defaultOptions, ...options };
    // An error that already carries a correlation id keeps it
    const existingId = error instanceof BaseError ? error.context?.correlationId : undefined;
    const errorContext = this.createErrorContext({ correlationId: existingId, ...context });

    const baseError =
      error instanceof BaseError ? error.withContext(errorContext) : this.convertToBaseError(error, errorContext);

    if (mergedOptions.logErrors) {
      this.logError(baseError);
    }
    return baseError;
  }

  /**
   * Create a correlation ID for request tracking
   */
  createCorrelationId(): string {
    return randomUUID();
  }

  private createErrorContext(context?: Partial<ErrorContext>): ErrorContext {
    return {
      ...context,
      correlationId: context?.correlationId ?? this.createCorrelationId(),
      timestamp: context?.timestamp ?? new Date(),
    };
  }

  private convertToBaseError(error: unknown, context: ErrorContext): BaseError {
    if (error instanceof Error) {
      return new UnexpectedError(error.message, context, error);
    }
    return new UnexpectedError(String(error), context);
  }

  private logError(error: BaseError): void {
    const payload = { error: error.toJSON(), correlationId: error.context?.correlationId };
    logger[error.getLogLevel()](payload, error.message);
  }
}

export const errorHandler = ErrorHandler.getInstance();
