import { BaseError, ErrorDetails, ApiErrorBody } from './BaseError';
import { ValidationError, ValidationIssue } from './ValidationError';

export type UploadErrorKind = 'validation' | 'processing';

/**
 * Raised by the monthly upload pipeline. Validation failures carry their
 * issues; processing failures wrap the unexpected cause.
 */
export class UploadError extends BaseError {
  public readonly kind: UploadErrorKind;
  public readonly issues: ValidationIssue[];

  constructor(
    kind: UploadErrorKind,
    message: string,
    issues: ValidationIssue[] = [],
    context?: ErrorDetails['context'],
    cause?: Error
  ) {
    super({
      code: kind === 'validation' ? 'UPLOAD_VALIDATION_ERROR' : 'UPLOAD_PROCESSING_ERROR',
      message,
      statusCode: kind === 'validation' ? 400 : 500,
      context,
      cause,
      isRetryable: false,
      severity: kind === 'validation' ? 'medium' : 'high',
    });

    this.kind = kind;
    this.issues = issues;
  }

  static fromValidation(error: ValidationError): UploadError {
    return new UploadError('validation', error.message, error.issues, error.context, error);
  }

  static alreadyExists(year: number, month: number, context?: ErrorDetails['context']): UploadError {
    return new UploadError(
      'validation',
      `Data for ${year}-${String(month).padStart(2, '0')} already exists`,
      [{ field: 'overwrite', constraint: 'required', message: 'overwrite must be set to replace existing data' }],
      context
    );
  }

  static processingFailed(cause: Error, context?: ErrorDetails['context']): UploadError {
    return new UploadError('processing', `Error processing file: ${cause.message}`, [], context, cause);
  }

  protected getDefaultUserMessage(): string {
    return this.kind === 'validation' ? this.message : 'The upload could not be processed. No data was saved.';
  }

  toApiResponse(): ApiErrorBody {
    const response = super.toApiResponse();
    if (this.issues.length > 0) {
      response.error.validationIssues = this.issues.map(issue => ({
        field: issue.field,
        message: issue.message,
      }));
    }
    return response;
  }
}
