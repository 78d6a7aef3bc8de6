import { BaseError, ErrorDetails } from './BaseError';

export type DatabaseOperation = 'create' | 'read' | 'update' | 'delete' | 'query' | 'transaction';

export class DatabaseError extends BaseError {
  public readonly operation?: DatabaseOperation;
  public readonly table?: string;

  constructor(
    message: string,
    operation?: DatabaseOperation,
    table?: string,
    context?: ErrorDetails['context'],
    cause?: Error
  ) {
    super({
      code: 'DATABASE_ERROR',
      message,
      statusCode: 500,
      userMessage: 'A database error occurred. Please try again later.',
      context,
      cause,
      isRetryable: false,
      severity: 'high',
    });

    this.operation = operation;
    this.table = table;
  }

  static recordNotFound(table: string, identifier: string, context?: ErrorDetails['context']): DatabaseError {
    return new DatabaseError(`Record not found in ${table}: ${identifier}`, 'read', table, context);
  }

  protected getDefaultUserMessage(): string {
    return 'A database error occurred. Please try again later.';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
      table: this.table,
    };
  }
}
