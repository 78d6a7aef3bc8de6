import { and, asc, eq, gt, inArray, lt, notExists, sql } from 'drizzle-orm';
import { Character } from '../../domain/character/Character';
import { DatabaseError } from '../../shared/errors';
import { IdSequenceName } from '../../shared/enums';
import { foldName } from '../../shared/utilities/names';
import { RowMapper } from '../mapper/RowMapper';
import { Executor } from '../persistence/client';
import { activityRecords, bountyRecords, characters, idSequences, miningRecords } from '../persistence/schema';
import { BaseRepository } from './BaseRepository';

export interface NewCharacter {
  id: number;
  name: string;
  title: string | null;
  joinDate: Date | null;
  playerId: number;
}

/**
 * Repository for characters and the sequences that number them
 */
export class CharacterRepository extends BaseRepository {
  constructor(db: Executor) {
    super(db, 'characters');
  }

  getById(id: number): Character | null {
    return this.executeQuery(
      'read',
      () => RowMapper.mapOptional(this.db.select().from(characters).where(eq(characters.id, id)).get(), Character),
      'getById'
    );
  }

  getByIds(ids: readonly number[]): Character[] {
    if (ids.length === 0) return [];
    return this.executeQuery(
      'read',
      () =>
        RowMapper.mapArray(
          this.db
            .select()
            .from(characters)
            .where(inArray(characters.id, [...ids]))
            .orderBy(asc(characters.insertionSeq))
            .all(),
          Character
        ),
      'getByIds'
    );
  }

  /**
   * Characters with this name, ignoring case; verified characters first,
   * then in insertion order
   */
  findByName(name: string): Character[] {
    return this.executeQuery(
      'read',
      () =>
        RowMapper.mapArray(
          this.db
            .select()
            .from(characters)
            .where(eq(characters.nameKey, foldName(name)))
            .orderBy(sql`CASE WHEN ${characters.id} > 0 THEN 0 ELSE 1 END`, asc(characters.insertionSeq))
            .all(),
          Character
        ),
      'findByName'
    );
  }

  /**
   * Preferred character for a name: a verified one when it exists
   */
  findPreferredByName(name: string): Character | null {
    return this.findByName(name)[0] ?? null;
  }

  findVerifiedByName(name: string): Character | null {
    return this.executeQuery(
      'read',
      () =>
        RowMapper.mapOptional(
          this.db
            .select()
            .from(characters)
            .where(and(gt(characters.id, 0), eq(characters.nameKey, foldName(name))))
            .orderBy(asc(characters.insertionSeq))
            .get(),
          Character
        ),
      'findVerifiedByName'
    );
  }

  getByPlayer(playerId: number): Character[] {
    return this.executeQuery(
      'read',
      () =>
        RowMapper.mapArray(
          this.db
            .select()
            .from(characters)
            .where(eq(characters.playerId, playerId))
            .orderBy(asc(characters.insertionSeq))
            .all(),
          Character
        ),
      'getByPlayer'
    );
  }

  getPlaceholders(): Character[] {
    return this.executeQuery(
      'read',
      () =>
        RowMapper.mapArray(
          this.db.select().from(characters).where(lt(characters.id, 0)).orderBy(asc(characters.insertionSeq)).all(),
          Character
        ),
      'getPlaceholders'
    );
  }

  /**
   * Placeholders no activity, bounty or mining record refers to
   */
  getUnreferencedPlaceholders(): Character[] {
    return this.executeQuery(
      'read',
      () =>
        RowMapper.mapArray(
          this.db
            .select()
            .from(characters)
            .where(
              and(
                lt(characters.id, 0),
                notExists(
                  this.db
                    .select({ one: sql`1` })
                    .from(activityRecords)
                    .where(eq(activityRecords.characterId, characters.id))
                ),
                notExists(
                  this.db.select({ one: sql`1` }).from(bountyRecords).where(eq(bountyRecords.characterId, characters.id))
                ),
                notExists(
                  this.db.select({ one: sql`1` }).from(miningRecords).where(eq(miningRecords.characterId, characters.id))
                )
              )
            )
            .orderBy(asc(characters.insertionSeq))
            .all(),
          Character
        ),
      'getUnreferencedPlaceholders'
    );
  }

  create(character: NewCharacter): Character {
    return this.executeQuery(
      'create',
      () => {
        const insertionSeq = this.nextSequenceValue(IdSequenceName.CHARACTER_INSERTION, 1);
        return RowMapper.map(
          this.db
            .insert(characters)
            .values({ ...character, nameKey: foldName(character.name), insertionSeq })
            .returning()
            .get(),
          Character
        );
      },
      'create'
    );
  }

  /**
   * Create an unverified character with a freshly allocated negative id
   */
  createPlaceholder(name: string, title: string | null, playerId: number): Character {
    const id = this.allocatePlaceholderId();
    this.logger.debug({ id, name, playerId }, 'Creating placeholder character');
    return this.create({ id, name, title, joinDate: null, playerId });
  }

  /**
   * Next placeholder id. Ids only ever decrease, so no two placeholders
   * share one even after deletions.
   */
  allocatePlaceholderId(): number {
    return this.executeQuery(
      'update',
      () => this.nextSequenceValue(IdSequenceName.PLACEHOLDER_CHARACTER, -1),
      'allocatePlaceholderId'
    );
  }

  moveToPlayer(id: number, playerId: number, title: string | null): void {
    this.executeQuery(
      'update',
      () => this.db.update(characters).set({ playerId, title }).where(eq(characters.id, id)).run(),
      'moveToPlayer'
    );
  }

  delete(id: number): boolean {
    return this.executeQuery(
      'delete',
      () => this.db.delete(characters).where(eq(characters.id, id)).run().changes > 0,
      'delete'
    );
  }

  private nextSequenceValue(name: IdSequenceName, step: 1 | -1): number {
    const row = this.db
      .update(idSequences)
      .set({ value: sql`${idSequences.value} + ${step}` })
      .where(eq(idSequences.name, name))
      .returning({ value: idSequences.value })
      .get();

    if (!row) {
      throw DatabaseError.recordNotFound('id_sequences', name);
    }
    return row.value;
  }
}
