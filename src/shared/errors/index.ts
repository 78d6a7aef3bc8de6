export { BaseError } from './BaseError';
export type { ErrorContext, ErrorDetails, ErrorSeverity, ApiErrorBody } from './BaseError';

export { ValidationError } from './ValidationError';
export type { ValidationIssue } from './ValidationError';

export { DatabaseError } from './DatabaseError';
export type { DatabaseOperation } from './DatabaseError';

export { ExternalServiceError, RATE_LIMIT_STATUSES } from './ExternalServiceError';
export type { ExternalService } from './ExternalServiceError';

export { UploadError } from './UploadError';
export type { UploadErrorKind } from './UploadError';

export { ErrorHandler, errorHandler } from './ErrorHandler';
export type { ErrorHandlerOptions } from './ErrorHandler';

export { NotFoundError } from './NotFoundError';
