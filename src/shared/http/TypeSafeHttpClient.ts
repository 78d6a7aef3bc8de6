/**
 * Type-safe HTTP client with Zod validation
 * Every attempt passes the client's rate limiter; failures come back as the
 * error side of a Result instead of being thrown.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { z } from 'zod';
import { createLogger } from '../../lib/logger';
import { ExternalService, ExternalServiceError } from '../errors';
import { RateLimiter, RetryDecision, RetryPolicy, Sleep, retry } from '../performance';
import { Result, err, ok } from '../types/result';

const logger = createLogger('http');

export interface HttpClientConfig {
  service: ExternalService;
  baseURL: string;
  timeout: number;
  userAgent: string;
  rateLimiter: RateLimiter;
  retryPolicy: RetryPolicy;
  sleep?: Sleep;
  /** Replaces the network transport; used by tests */
  adapter?: AxiosAdapter;
}

/**
 * Retry decision for errors raised by this client
 */
export function classifyHttpError(error: Error): RetryDecision {
  if (error instanceof ExternalServiceError) {
    if (error.isRateLimited) return 'rate-limited';
    return error.isRetryable ? 'retry' : 'fatal';
  }
  return 'retry';
}

export class TypeSafeHttpClient {
  private readonly client: AxiosInstance;

  constructor(private readonly config: HttpClientConfig) {
    this.client = axios.create({
      baseURL: config.baseURL,
      timeout: config.timeout,
      headers: {
        'User-Agent': config.userAgent,
        Accept: 'application/json',
      },
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });
  }

  get service(): ExternalService {
    return this.config.service;
  }

  /**
   * GET a JSON document and validate it
   */
  get<T>(
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    policy?: Partial<RetryPolicy>
  ): Promise<Result<T, ExternalServiceError>> {
    return this.request(endpoint, { method: 'GET' }, response => this.validate(endpoint, schema, response), policy);
  }

  /**
   * POST a JSON body and validate the JSON answer
   */
  post<T>(
    endpoint: string,
    body: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    policy?: Partial<RetryPolicy>
  ): Promise<Result<T, ExternalServiceError>> {
    return this.request(
      endpoint,
      { method: 'POST', data: body, headers: { 'Content-Type': 'application/json' } },
      response => this.validate(endpoint, schema, response),
      policy
    );
  }

  /**
   * GET a binary body
   */
  getBinary(endpoint: string, policy?: Partial<RetryPolicy>): Promise<Result<Buffer, ExternalServiceError>> {
    return this.request(
      endpoint,
      { method: 'GET', responseType: 'arraybuffer' },
      response => {
        const data: unknown = response.data;
        if (data instanceof ArrayBuffer) return Buffer.from(data);
        if (Buffer.isBuffer(data)) return data;
        if (typeof data === 'string') return Buffer.from(data, 'binary');
        throw ExternalServiceError.invalidResponse(this.config.service, endpoint, 'expected a binary body');
      },
      policy
    );
  }

  private async request<T>(
    endpoint: string,
    options: AxiosRequestConfig,
    parse: (response: AxiosResponse) => T,
    policyOverrides?: Partial<RetryPolicy>
  ): Promise<Result<T, ExternalServiceError>> {
    const url = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
    const policy: RetryPolicy = { ...this.config.retryPolicy, ...policyOverrides };

    const result = await retry(
      async () => {
        await this.config.rateLimiter.wait();
        logger.debug({ service: this.config.service, method: options.method, url }, 'Making HTTP request');

        let response: AxiosResponse;
        try {
          response = await this.client.request({ url, ...options });
        } catch (error) {
          throw this.toServiceError(url, error);
        }
        return parse(response);
      },
      policy,
      { serviceName: `${this.config.service} ${url}`, sleep: this.config.sleep }
    );

    if (result.ok) {
      return ok(result.value);
    }
    return err(this.toServiceError(url, result.error));
  }

  private validate<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, response: AxiosResponse): T {
    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join(', ');
      throw ExternalServiceError.invalidResponse(this.config.service, endpoint, detail);
    }
    return parsed.data;
  }

  private toServiceError(url: string, error: unknown): ExternalServiceError {
    if (error instanceof ExternalServiceError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      return ExternalServiceError.httpError(this.config.service, url, error.response?.status, error);
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    return ExternalServiceError.httpError(this.config.service, url, undefined, cause);
  }
}
