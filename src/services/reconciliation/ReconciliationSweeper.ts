import { Character } from '../../domain/character/Character';
import { createLogger } from '../../lib/logger';
import { CharacterDetails, IESIClient } from '../../infrastructure/http/ESIClient';
import { Executor } from '../../infrastructure/persistence/client';
import { PlaceholderReference, Repositories, createRepositories } from '../../infrastructure/repositories';
import { ReconcileOutcome } from '../../shared/enums';
import { errorHandler } from '../../shared/errors';
import { foldName } from '../../shared/utilities/names';
import { PlayerAggregator } from '../identity/PlayerAggregator';
import { ensureSentinel } from '../identity/sentinel';

const logger = createLogger('reconciliation');

/**
 * Records of one upload, or of every upload
 */
export type SweepScope = { uploadId: number } | 'all';

export interface SweepResult {
  /** Records that referenced a placeholder when the sweep started */
  checked: number;
  fixed: number;
  failed: number;
  deleted: number;
  /** Placeholder characters still referenced in scope afterwards */
  pending: number;
}

/**
 * What to do with one placeholder, decided before anything is written
 */
type Resolution =
  | { outcome: ReconcileOutcome.FIXED; via: 'merge' | 'existing'; targetId: number }
  | { outcome: ReconcileOutcome.FIXED; via: 'verify'; details: CharacterDetails }
  | { outcome: ReconcileOutcome.DELETED }
  | { outcome: ReconcileOutcome.FAILED; reason: string };

interface PlannedPlaceholder {
  placeholder: Character;
  reference: PlaceholderReference;
  resolution: Resolution;
}

export interface ISweeper {
  fixOrphans(scope: SweepScope): Promise<SweepResult>;
}

/**
 * Replaces placeholder characters with verified ones. Lookups happen first;
 * every write of a sweep is then applied in one transaction.
 */
export class ReconciliationSweeper implements ISweeper {
  constructor(
    private readonly db: Executor,
    private readonly esi: IESIClient
  ) {}

  async fixOrphans(scope: SweepScope): Promise<SweepResult> {
    const uploadId = scope === 'all' ? null : scope.uploadId;
    const correlationId = errorHandler.createCorrelationId();
    const repositories = createRepositories(this.db);

    const references = repositories.records.findPlaceholderReferences(uploadId);
    const checked = references.reduce((sum, reference) => sum + reference.records, 0);
    if (references.length > 0) {
      logger.info({ correlationId, uploadId, placeholders: references.length, records: checked }, 'Starting sweep');
    }

    const plans = await this.plan(repositories, references);

    try {
      const { removedPlaceholders, ...result } = this.db.transaction(tx =>
        this.apply(createRepositories(tx), plans, uploadId)
      );
      const pending = repositories.records.findPlaceholderReferences(uploadId).length;
      if (checked > 0 || removedPlaceholders > 0) {
        logger.info({ correlationId, uploadId, ...result, pending, removedPlaceholders }, 'Sweep finished');
      }
      return { checked, ...result, pending };
    } catch (error) {
      errorHandler.handleError(error, { correlationId, uploadId: uploadId ?? undefined, operation: 'fixOrphans' });
      return {
        checked,
        fixed: 0,
        failed: checked,
        deleted: 0,
        pending: repositories.records.findPlaceholderReferences(uploadId).length,
      };
    }
  }

  private async plan(repositories: Repositories, references: PlaceholderReference[]): Promise<PlannedPlaceholder[]> {
    const placeholders = new Map(
      repositories.characters.getByIds(references.map(reference => reference.characterId)).map(c => [c.id, c])
    );
    // Placeholders differing only in case share one lookup
    const byName = new Map<string, Resolution>();
    const plans: PlannedPlaceholder[] = [];

    for (const reference of references) {
      const placeholder = placeholders.get(reference.characterId);
      if (!placeholder) {
        continue;
      }

      const key = foldName(placeholder.name);
      let resolution = byName.get(key);
      if (!resolution) {
        resolution = await this.resolve(repositories, placeholder);
        byName.set(key, resolution);
      }
      plans.push({ placeholder, reference, resolution });
    }

    return plans;
  }

  private async resolve(repositories: Repositories, placeholder: Character): Promise<Resolution> {
    const verified = repositories.characters.findVerifiedByName(placeholder.name);
    if (verified) {
      return { outcome: ReconcileOutcome.FIXED, via: 'merge', targetId: verified.id };
    }

    try {
      const search = await this.esi.searchCharacterId(placeholder.name);
      if (!search.ok) {
        return { outcome: ReconcileOutcome.FAILED, reason: search.error.message };
      }
      if (search.value === null) {
        return { outcome: ReconcileOutcome.DELETED };
      }

      if (repositories.characters.getById(search.value)) {
        return { outcome: ReconcileOutcome.FIXED, via: 'existing', targetId: search.value };
      }

      const details = await this.esi.fetchCharacter(search.value);
      if (!details) {
        return { outcome: ReconcileOutcome.FAILED, reason: `character ${search.value} could not be fetched` };
      }
      return { outcome: ReconcileOutcome.FIXED, via: 'verify', details };
    } catch (error) {
      const handled = errorHandler.handleError(error, {
        operation: 'reconcilePlaceholder',
        characterId: String(placeholder.id),
        metadata: { name: placeholder.name },
      });
      return { outcome: ReconcileOutcome.FAILED, reason: handled.message };
    }
  }

  private apply(
    repositories: Repositories,
    plans: PlannedPlaceholder[],
    uploadId: number | null
  ): Omit<SweepResult, 'checked' | 'pending'> & { removedPlaceholders: number } {
    const aggregator = new PlayerAggregator(repositories.players, repositories.characters);
    const affectedPlayers = new Set<number>();
    let fixed = 0;
    let failed = 0;
    let deleted = 0;

    for (const { placeholder, reference, resolution } of plans) {
      switch (resolution.outcome) {
        case ReconcileOutcome.FIXED: {
          const target =
            resolution.via === 'verify'
              ? this.materialize(repositories, resolution.details)
              : repositories.characters.getById(resolution.targetId);
          if (!target) {
            failed += reference.records;
            logger.warn({ placeholderId: placeholder.id }, 'Resolved character disappeared before the write');
            continue;
          }
          repositories.records.repointCharacter(placeholder.id, target.id);
          fixed += reference.records;
          affectedPlayers.add(target.playerId);
          break;
        }

        case ReconcileOutcome.DELETED:
          deleted += repositories.records.deleteByCharacter(placeholder.id, uploadId);
          logger.info({ placeholderId: placeholder.id, name: placeholder.name }, 'Deleted records of an unknown name');
          break;

        case ReconcileOutcome.FAILED:
          failed += reference.records;
          logger.warn({ placeholderId: placeholder.id, name: placeholder.name, reason: resolution.reason }, 'Placeholder left unresolved');
          continue;
      }

      affectedPlayers.add(placeholder.playerId);
    }

    // Placeholders left without records, including those of deleted uploads
    const orphans = repositories.characters.getUnreferencedPlaceholders();
    for (const orphan of orphans) {
      repositories.characters.delete(orphan.id);
      affectedPlayers.add(orphan.playerId);
    }

    aggregator.recomputeMany(affectedPlayers);
    return { fixed, failed, deleted, removedPlaceholders: orphans.length };
  }

  /**
   * Verified character for fetched details, created on first sight
   */
  private materialize(repositories: Repositories, details: CharacterDetails): Character {
    const existing = repositories.characters.getById(details.id);
    if (existing) {
      return existing;
    }

    const player = details.title
      ? repositories.players.findOrCreateByTitle(details.title)
      : ensureSentinel(repositories.players);
    return repositories.characters.create({
      id: details.id,
      name: details.name,
      title: details.title,
      joinDate: details.joinDate,
      playerId: player.id,
    });
  }
}
