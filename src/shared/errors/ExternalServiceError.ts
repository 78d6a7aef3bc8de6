import { BaseError, ErrorDetails, ErrorSeverity, ApiErrorBody } from './BaseError';

export type ExternalService = 'ESI' | 'ZKILL' | 'IMAGES';

/** Status codes ESI and zKillboard use to signal throttling */
export const RATE_LIMIT_STATUSES: readonly number[] = [420, 429];

export class ExternalServiceError extends BaseError {
  public readonly service: ExternalService;
  public readonly endpoint?: string;
  public readonly responseStatus?: number;

  constructor(
    service: ExternalService,
    message: string,
    endpoint?: string,
    responseStatus?: number,
    context?: ErrorDetails['context'],
    cause?: Error,
    isRetryable: boolean = ExternalServiceError.isRetryableStatus(responseStatus)
  ) {
    super({
      code: `${service}_ERROR`,
      message,
      statusCode: 502,
      context,
      cause,
      isRetryable,
      severity: ExternalServiceError.getSeverityForStatus(responseStatus),
    });

    this.service = service;
    this.endpoint = endpoint;
    this.responseStatus = responseStatus;
  }

  get isRateLimited(): boolean {
    return this.responseStatus !== undefined && RATE_LIMIT_STATUSES.includes(this.responseStatus);
  }

  static httpError(
    service: ExternalService,
    endpoint: string,
    status: number | undefined,
    cause?: Error,
    context?: ErrorDetails['context']
  ): ExternalServiceError {
    const message = status
      ? `${service} request to ${endpoint} failed with status ${status}`
      : `${service} request to ${endpoint} failed: ${cause?.message ?? 'network error'}`;
    return new ExternalServiceError(service, message, endpoint, status, context, cause);
  }

  /**
   * Payload that failed validation; retried like a network failure
   */
  static invalidResponse(
    service: ExternalService,
    endpoint: string,
    detail: string,
    context?: ErrorDetails['context']
  ): ExternalServiceError {
    return new ExternalServiceError(
      service,
      `Invalid response from ${service} ${endpoint}: ${detail}`,
      endpoint,
      undefined,
      context,
      undefined,
      true
    );
  }

  protected getDefaultUserMessage(): string {
    switch (this.service) {
      case 'ESI':
        return 'EVE Online API is currently experiencing issues. Please try again later.';
      case 'ZKILL':
        return 'zKillboard service is temporarily unavailable. Please try again later.';
      case 'IMAGES':
        return 'The EVE image server is temporarily unavailable. Please try again later.';
    }
  }

  private static isRetryableStatus(status?: number): boolean {
    if (!status) return true; // Network errors are generally retryable

    return [408, 420, 429, 500, 502, 503, 504].includes(status);
  }

  private static getSeverityForStatus(status?: number): ErrorSeverity {
    if (!status) return 'high';
    if (status >= 500) return 'high';
    return 'medium';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      service: this.service,
      endpoint: this.endpoint,
      responseStatus: this.responseStatus,
    };
  }

  toApiResponse(): ApiErrorBody {
    const response = super.toApiResponse();
    response.error.service = this.service;
    return response;
  }
}
