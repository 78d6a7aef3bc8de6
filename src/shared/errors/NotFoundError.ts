import { BaseError } from './BaseError';

export class NotFoundError extends BaseError {
  constructor(message: string = 'Resource not found', metadata?: Record<string, unknown>) {
    super({
      code: 'NOT_FOUND',
      message,
      statusCode: 404,
      isRetryable: false,
      severity: 'low',
      context: { metadata },
    });
  }

  protected getDefaultUserMessage(): string {
    return this.message;
  }
}
