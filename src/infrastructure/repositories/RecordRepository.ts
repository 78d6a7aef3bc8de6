import { and, eq, lt, sql, SQL } from 'drizzle-orm';
import { SheetCounts } from '../../domain/upload/sheets';
import { Executor } from '../persistence/client';
import {
  activityRecords,
  bountyRecords,
  miningRecords,
  NewActivityRecord,
  NewBountyRecord,
  NewMiningRecord,
} from '../persistence/schema';
import { BaseRepository } from './BaseRepository';

/**
 * One placeholder reference found in a record
 */
export interface PlaceholderReference {
  characterId: number;
  records: number;
}

export interface CharacterTotals {
  characterId: number;
  points: number;
  strategicPoints: number;
  taxIsk: number;
  volumeM3: number;
}

/**
 * Repository for the activity, bounty and mining records of uploads
 */
export class RecordRepository extends BaseRepository {
  constructor(db: Executor) {
    super(db, 'records');
  }

  insertActivity(record: NewActivityRecord): void {
    this.executeQuery('create', () => this.db.insert(activityRecords).values(record).run(), 'insertActivity');
  }

  insertBounty(record: NewBountyRecord): void {
    this.executeQuery('create', () => this.db.insert(bountyRecords).values(record).run(), 'insertBounty');
  }

  insertMining(record: NewMiningRecord): void {
    this.executeQuery('create', () => this.db.insert(miningRecords).values(record).run(), 'insertMining');
  }

  countByUpload(uploadId: number): SheetCounts {
    return this.executeQuery(
      'read',
      () => ({
        activity: this.countWhere(activityRecords, eq(activityRecords.uploadId, uploadId)),
        bounty: this.countWhere(bountyRecords, eq(bountyRecords.uploadId, uploadId)),
        mining: this.countWhere(miningRecords, eq(miningRecords.uploadId, uploadId)),
      }),
      'countByUpload'
    );
  }

  /**
   * Remove every record of an upload, keeping the upload itself
   */
  deleteByUpload(uploadId: number): number {
    return this.executeQuery(
      'delete',
      () =>
        this.db.delete(activityRecords).where(eq(activityRecords.uploadId, uploadId)).run().changes +
        this.db.delete(bountyRecords).where(eq(bountyRecords.uploadId, uploadId)).run().changes +
        this.db.delete(miningRecords).where(eq(miningRecords.uploadId, uploadId)).run().changes,
      'deleteByUpload'
    );
  }

  /**
   * Placeholder characters referenced by records of one upload, or of every
   * upload when `uploadId` is null, with the number of referencing records
   */
  findPlaceholderReferences(uploadId: number | null): PlaceholderReference[] {
    return this.executeQuery(
      'read',
      () => {
        const counts = new Map<number, number>();
        const add = (rows: { characterId: number; records: number }[]) => {
          for (const row of rows) {
            counts.set(row.characterId, (counts.get(row.characterId) ?? 0) + row.records);
          }
        };

        add(
          this.db
            .select({ characterId: activityRecords.characterId, records: sql<number>`count(*)` })
            .from(activityRecords)
            .where(
              and(
                lt(activityRecords.characterId, 0),
                uploadId === null ? undefined : eq(activityRecords.uploadId, uploadId)
              )
            )
            .groupBy(activityRecords.characterId)
            .all()
        );
        add(
          this.db
            .select({ characterId: bountyRecords.characterId, records: sql<number>`count(*)` })
            .from(bountyRecords)
            .where(
              and(lt(bountyRecords.characterId, 0), uploadId === null ? undefined : eq(bountyRecords.uploadId, uploadId))
            )
            .groupBy(bountyRecords.characterId)
            .all()
        );
        add(
          this.db
            .select({ characterId: miningRecords.characterId, records: sql<number>`count(*)` })
            .from(miningRecords)
            .where(
              and(lt(miningRecords.characterId, 0), uploadId === null ? undefined : eq(miningRecords.uploadId, uploadId))
            )
            .groupBy(miningRecords.characterId)
            .all()
        );

        return [...counts.entries()]
          .map(([characterId, records]) => ({ characterId, records }))
          .sort((a, b) => b.characterId - a.characterId);
      },
      'findPlaceholderReferences'
    );
  }

  /**
   * Point every record of `fromCharacterId` at `toCharacterId`
   * @returns Number of records changed
   */
  repointCharacter(fromCharacterId: number, toCharacterId: number): number {
    return this.executeQuery(
      'update',
      () =>
        this.db
          .update(activityRecords)
          .set({ characterId: toCharacterId })
          .where(eq(activityRecords.characterId, fromCharacterId))
          .run().changes +
        this.db
          .update(bountyRecords)
          .set({ characterId: toCharacterId })
          .where(eq(bountyRecords.characterId, fromCharacterId))
          .run().changes +
        this.db
          .update(miningRecords)
          .set({ characterId: toCharacterId })
          .where(eq(miningRecords.characterId, fromCharacterId))
          .run().changes,
      'repointCharacter'
    );
  }

  /**
   * Delete the records of a character, within one upload or everywhere
   */
  deleteByCharacter(characterId: number, uploadId: number | null): number {
    return this.executeQuery(
      'delete',
      () =>
        this.db
          .delete(activityRecords)
          .where(
            and(
              eq(activityRecords.characterId, characterId),
              uploadId === null ? undefined : eq(activityRecords.uploadId, uploadId)
            )
          )
          .run().changes +
        this.db
          .delete(bountyRecords)
          .where(
            and(
              eq(bountyRecords.characterId, characterId),
              uploadId === null ? undefined : eq(bountyRecords.uploadId, uploadId)
            )
          )
          .run().changes +
        this.db
          .delete(miningRecords)
          .where(
            and(
              eq(miningRecords.characterId, characterId),
              uploadId === null ? undefined : eq(miningRecords.uploadId, uploadId)
            )
          )
          .run().changes,
      'deleteByCharacter'
    );
  }

  countByCharacter(characterId: number): number {
    return this.executeQuery(
      'read',
      () =>
        this.countWhere(activityRecords, eq(activityRecords.characterId, characterId)) +
        this.countWhere(bountyRecords, eq(bountyRecords.characterId, characterId)) +
        this.countWhere(miningRecords, eq(miningRecords.characterId, characterId)),
      'countByCharacter'
    );
  }

  /**
   * Summed amounts per character for one upload
   */
  getTotalsByCharacter(uploadId: number): CharacterTotals[] {
    return this.executeQuery(
      'read',
      () => {
        const totals = new Map<number, CharacterTotals>();
        const entry = (characterId: number): CharacterTotals => {
          let current = totals.get(characterId);
          if (!current) {
            current = { characterId, points: 0, strategicPoints: 0, taxIsk: 0, volumeM3: 0 };
            totals.set(characterId, current);
          }
          return current;
        };

        for (const row of this.db
          .select({
            characterId: activityRecords.characterId,
            points: sql<number>`coalesce(sum(${activityRecords.points}), 0)`,
            strategicPoints: sql<number>`coalesce(sum(${activityRecords.strategicPoints}), 0)`,
          })
          .from(activityRecords)
          .where(eq(activityRecords.uploadId, uploadId))
          .groupBy(activityRecords.characterId)
          .all()) {
          const current = entry(row.characterId);
          current.points += row.points;
          current.strategicPoints += row.strategicPoints;
        }

        for (const row of this.db
          .select({
            characterId: bountyRecords.characterId,
            taxIsk: sql<number>`coalesce(sum(${bountyRecords.taxIsk}), 0)`,
          })
          .from(bountyRecords)
          .where(eq(bountyRecords.uploadId, uploadId))
          .groupBy(bountyRecords.characterId)
          .all()) {
          entry(row.characterId).taxIsk += row.taxIsk;
        }

        for (const row of this.db
          .select({
            characterId: miningRecords.characterId,
            volumeM3: sql<number>`coalesce(sum(${miningRecords.volumeM3}), 0)`,
          })
          .from(miningRecords)
          .where(eq(miningRecords.uploadId, uploadId))
          .groupBy(miningRecords.characterId)
          .all()) {
          entry(row.characterId).volumeM3 += row.volumeM3;
        }

        return [...totals.values()];
      },
      'getTotalsByCharacter'
    );
  }

  private countWhere(
    table: typeof activityRecords | typeof bountyRecords | typeof miningRecords,
    condition: SQL
  ): number {
    const row = this.db.select({ count: sql<number>`count(*)` }).from(table).where(condition).get();
    return row?.count ?? 0;
  }
}
