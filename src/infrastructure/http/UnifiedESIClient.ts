import { AxiosAdapter } from 'axios';
import { ValidatedConfiguration } from '../../config';
import { createLogger } from '../../lib/logger';
import { ExternalServiceError, errorHandler } from '../../shared/errors';
import { TypeSafeHttpClient, classifyHttpError } from '../../shared/http/TypeSafeHttpClient';
import { IntervalRateLimiter, RateLimiter, RetryPolicy, Sleep } from '../../shared/performance';
import {
  ESICharacterSchema,
  ESICorporationHistory,
  ESICorporationHistorySchema,
  ESICorporationSchema,
  ESIUniverseIdsSchema,
  ZkillKillmailListSchema,
} from '../../shared/schemas/api-responses';
import { Result, ok } from '../../shared/types/result';
import { DateTransformer } from '../../shared/utilities/DateTransformer';
import { CharacterDetails, IESIClient } from './ESIClient';

const logger = createLogger('esi-client');

/**
 * Configuration options for the ESI client
 */
export interface ESIClientConfig {
  esiBaseUrl?: string;
  imageBaseUrl?: string;
  zkillboardBaseUrl?: string;
  /** Default timeout in milliseconds */
  timeout?: number;
  userAgent?: string;
  /** Corporation whose join dates are looked up */
  corporationId?: number;
  maxAttempts?: number;
  killmailMaxAttempts?: number;
  initialRetryDelay?: number;
  maxRetryDelay?: number;
  rateLimitedWaitMs?: number;
  /** Shared by every request of this client; defaults to the configured requests per second */
  rateLimiter?: RateLimiter;
  sleep?: Sleep;
  adapter?: AxiosAdapter;
}

const KILLMAIL_MAX_ATTEMPTS = 5;

/**
 * Client for ESI, the EVE image server and zKillboard. All three share one
 * rate limiter owned by the client instance.
 */
export class UnifiedESIClient implements IESIClient {
  private readonly esi: TypeSafeHttpClient;
  private readonly images: TypeSafeHttpClient;
  private readonly zkill: TypeSafeHttpClient;
  private readonly corporationId: number;
  private readonly killmailMaxAttempts: number;
  readonly rateLimiter: RateLimiter;

  constructor(config: ESIClientConfig = {}) {
    const { apis, http, corporation } = ValidatedConfiguration;

    this.rateLimiter = config.rateLimiter ?? IntervalRateLimiter.perSecond(apis.esi.requestsPerSecond, 'ESI');
    this.corporationId = config.corporationId ?? corporation.corporationId;
    this.killmailMaxAttempts = config.killmailMaxAttempts ?? KILLMAIL_MAX_ATTEMPTS;

    const retryPolicy: RetryPolicy = {
      maxAttempts: config.maxAttempts ?? http.maxRetries,
      initialDelayMs: config.initialRetryDelay ?? http.initialRetryDelay,
      backoffFactor: 2,
      maxDelayMs: config.maxRetryDelay ?? http.maxRetryDelay,
      rateLimitedDelayMs: config.rateLimitedWaitMs ?? http.rateLimitedWaitMs,
      classify: classifyHttpError,
    };

    const shared = {
      timeout: config.timeout ?? http.timeout,
      userAgent: config.userAgent ?? apis.esi.userAgent,
      rateLimiter: this.rateLimiter,
      retryPolicy,
      sleep: config.sleep,
      adapter: config.adapter,
    };

    this.esi = new TypeSafeHttpClient({ ...shared, service: 'ESI', baseURL: config.esiBaseUrl ?? apis.esi.baseUrl });
    this.images = new TypeSafeHttpClient({
      ...shared,
      service: 'IMAGES',
      baseURL: config.imageBaseUrl ?? apis.images.baseUrl,
    });
    this.zkill = new TypeSafeHttpClient({
      ...shared,
      service: 'ZKILL',
      baseURL: config.zkillboardBaseUrl ?? apis.zkillboard.baseUrl,
    });
  }

  async searchCharacterId(name: string): Promise<Result<number | null, ExternalServiceError>> {
    const result = await this.esi.post('/universe/ids/', [name], ESIUniverseIdsSchema);
    if (!result.ok) {
      return result;
    }

    const match = result.value.characters?.[0];
    return ok(match ? match.id : null);
  }

  async lookupIdByName(name: string): Promise<number | null> {
    const result = await this.searchCharacterId(name);
    if (!result.ok) {
      this.logSoftFailure(result.error, 'lookupIdByName', { name });
      return null;
    }
    return result.value;
  }

  async fetchCharacter(characterId: number): Promise<CharacterDetails | null> {
    const result = await this.esi.get(`/characters/${characterId}/`, ESICharacterSchema);
    if (!result.ok) {
      this.logSoftFailure(result.error, 'fetchCharacter', { characterId });
      return null;
    }

    // Details without a readable history would carry a wrong join date
    const joinDate = await this.readJoinDate(characterId, this.corporationId);
    if (!joinDate.ok) {
      this.logSoftFailure(joinDate.error, 'fetchCharacter', { characterId });
      return null;
    }

    const title = result.value.title?.trim();
    return {
      id: characterId,
      name: result.value.name,
      title: title ? title : null,
      joinDate: joinDate.value,
    };
  }

  async fetchCorporationJoinDate(characterId: number, corporationId: number): Promise<Date | null> {
    const result = await this.readJoinDate(characterId, corporationId);
    if (!result.ok) {
      this.logSoftFailure(result.error, 'fetchCorporationJoinDate', { characterId, corporationId });
      return null;
    }
    return result.value;
  }

  private async readJoinDate(
    characterId: number,
    corporationId: number
  ): Promise<Result<Date | null, ExternalServiceError>> {
    const result = await this.esi.get(`/characters/${characterId}/corporationhistory/`, ESICorporationHistorySchema);
    if (!result.ok) {
      return result;
    }

    // record_id is monotonic; start_date strings are not reliably ordered
    const earliest = result.value
      .filter(entry => entry.corporation_id === corporationId)
      .reduce<ESICorporationHistory[number] | null>(
        (current, entry) => (current === null || entry.record_id < current.record_id ? entry : current),
        null
      );

    return ok(earliest ? DateTransformer.toDate(earliest.start_date) : null);
  }

  async lookupAllianceId(corporationId: number): Promise<number | null> {
    const result = await this.esi.get(`/corporations/${corporationId}/`, ESICorporationSchema);
    if (!result.ok) {
      this.logSoftFailure(result.error, 'lookupAllianceId', { corporationId });
      return null;
    }
    return result.value.alliance_id ?? 0;
  }

  async fetchCorporationLogo(corporationId: number, size: number = 128): Promise<Buffer | null> {
    const result = await this.images.getBinary(`/corporations/${corporationId}/logo?size=${size}`);
    if (!result.ok) {
      this.logSoftFailure(result.error, 'fetchCorporationLogo', { corporationId });
      return null;
    }
    return result.value;
  }

  async fetchKillmailValue(killmailId: number): Promise<number | null> {
    const result = await this.zkill.get(`/killID/${killmailId}/`, ZkillKillmailListSchema, {
      maxAttempts: this.killmailMaxAttempts,
    });
    if (!result.ok) {
      throw errorHandler.handleError(result.error, {
        operation: 'fetchKillmailValue',
        metadata: { killmailId },
      });
    }

    const [entry] = result.value;
    return entry ? entry.zkb.totalValue : null;
  }

  private logSoftFailure(error: ExternalServiceError, operation: string, metadata: Record<string, unknown>): void {
    logger.warn(
      { service: error.service, endpoint: error.endpoint, status: error.responseStatus, operation, ...metadata },
      `${operation} gave up: ${error.message}`
    );
  }
}
