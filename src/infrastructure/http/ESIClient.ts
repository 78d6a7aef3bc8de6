import { ExternalServiceError } from '../../shared/errors';
import { Result } from '../../shared/types/result';

/**
 * Character details as the reconciliation needs them
 */
export interface CharacterDetails {
  id: number;
  name: string;
  title: string | null;
  /** When the character joined the configured corporation, if it ever did */
  joinDate: Date | null;
}

/**
 * Interface for the EVE identity client
 */
export interface IESIClient {
  /**
   * Exact-name search. `ok(null)` means ESI answered and knows no such
   * character; `err` means the lookup itself failed.
   */
  searchCharacterId(name: string): Promise<Result<number | null, ExternalServiceError>>;

  /**
   * Character id for a name; null when unknown or when ESI cannot be reached
   */
  lookupIdByName(name: string): Promise<number | null>;

  /**
   * Public character details plus the join date at the configured corporation.
   * Null when either the details or the corporation history cannot be read.
   */
  fetchCharacter(characterId: number): Promise<CharacterDetails | null>;

  /**
   * Earliest membership of `corporationId` in the character's history
   */
  fetchCorporationJoinDate(characterId: number, corporationId: number): Promise<Date | null>;

  /**
   * Alliance of a corporation; 0 when it has none, null when unavailable
   */
  lookupAllianceId(corporationId: number): Promise<number | null>;

  fetchCorporationLogo(corporationId: number, size?: number): Promise<Buffer | null>;

  /**
   * Total ISK value zKillboard reports for a killmail; null when zKillboard
   * does not know the killmail. Throws when zKillboard cannot be read.
   */
  fetchKillmailValue(killmailId: number): Promise<number | null>;
}
