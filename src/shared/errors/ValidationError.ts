import { ZodError } from 'zod';
import { BaseError, ErrorDetails, ApiErrorBody } from './BaseError';

export interface ValidationIssue {
  field: string;
  value?: unknown;
  constraint: string;
  message: string;
}

export class ValidationError extends BaseError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], context?: ErrorDetails['context']) {
    super({
      code: 'VALIDATION_ERROR',
      message,
      statusCode: 400,
      context,
      isRetryable: false,
      severity: 'medium',
    });

    this.issues = issues;
  }

  static fromZodError(zodError: ZodError, context?: ErrorDetails['context']): ValidationError {
    const issues: ValidationIssue[] = zodError.issues.map(issue => ({
      field: issue.path.join('.'),
      constraint: issue.code,
      message: issue.message,
    }));

    const message = `Validation failed: ${issues.map(i => `${i.field}: ${i.message}`).join(', ')}`;

    return new ValidationError(message, issues, context);
  }

  static fieldRequired(field: string, context?: ErrorDetails['context']): ValidationError {
    return new ValidationError(
      `Required field '${field}' is missing`,
      [
        {
          field,
          constraint: 'required',
          message: `${field} is required`,
        },
      ],
      context
    );
  }

  static invalidFormat(
    field: string,
    expectedFormat: string,
    actualValue: unknown,
    context?: ErrorDetails['context']
  ): ValidationError {
    return new ValidationError(
      `Field '${field}' has invalid format`,
      [
        {
          field,
          value: actualValue,
          constraint: 'format',
          message: `${field} must be a valid ${expectedFormat}`,
        },
      ],
      context
    );
  }

  /**
   * Whole-message user text: validation messages are safe to show verbatim
   */
  protected getDefaultUserMessage(): string {
    return this.message;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      issues: this.issues,
    };
  }

  toApiResponse(): ApiErrorBody {
    const response = super.toApiResponse();
    response.error.validationIssues = this.issues.map(issue => ({
      field: issue.field,
      message: issue.message,
      constraint: issue.constraint,
    }));
    return response;
  }
}
