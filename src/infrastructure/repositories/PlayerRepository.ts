import { and, asc, eq, notExists } from 'drizzle-orm';
import { Player } from '../../domain/player/Player';
import { PlayerKind } from '../../shared/enums';
import { RowMapper } from '../mapper/RowMapper';
import { Executor } from '../persistence/client';
import { characters, players } from '../persistence/schema';
import { BaseRepository } from './BaseRepository';

export interface PlayerDerivedFields {
  joinDate: Date | null;
  mainCharacterId: number | null;
}

/**
 * Repository for players, including the single sentinel player
 */
export class PlayerRepository extends BaseRepository {
  constructor(db: Executor) {
    super(db, 'players');
  }

  getById(id: number): Player | null {
    return this.executeQuery(
      'read',
      () => RowMapper.mapOptional(this.db.select().from(players).where(eq(players.id, id)).get(), Player),
      'getById'
    );
  }

  /**
   * Regular player with exactly this title
   */
  getByTitle(title: string): Player | null {
    return this.executeQuery(
      'read',
      () =>
        RowMapper.mapOptional(
          this.db
            .select()
            .from(players)
            .where(and(eq(players.kind, PlayerKind.REGULAR), eq(players.title, title)))
            .get(),
          Player
        ),
      'getByTitle'
    );
  }

  getSentinel(): Player | null {
    return this.executeQuery(
      'read',
      () =>
        RowMapper.mapOptional(
          this.db.select().from(players).where(eq(players.kind, PlayerKind.SENTINEL)).get(),
          Player
        ),
      'getSentinel'
    );
  }

  createSentinel(title: string): Player {
    return this.executeQuery(
      'create',
      () =>
        RowMapper.map(
          this.db.insert(players).values({ title, kind: PlayerKind.SENTINEL }).returning().get(),
          Player
        ),
      'createSentinel'
    );
  }

  create(title: string): Player {
    return this.executeQuery(
      'create',
      () => RowMapper.map(this.db.insert(players).values({ title, kind: PlayerKind.REGULAR }).returning().get(), Player),
      'create'
    );
  }

  /**
   * Regular player with this title, created when missing
   */
  findOrCreateByTitle(title: string): Player {
    const existing = this.getByTitle(title);
    if (existing) {
      return existing;
    }
    this.logger.debug({ title }, 'Creating player');
    return this.create(title);
  }

  getAll(): Player[] {
    return this.executeQuery(
      'read',
      () => RowMapper.mapArray(this.db.select().from(players).orderBy(asc(players.id)).all(), Player),
      'getAll'
    );
  }

  updateDerivedFields(id: number, fields: PlayerDerivedFields): void {
    this.executeQuery(
      'update',
      () =>
        this.db
          .update(players)
          .set({ joinDate: fields.joinDate, mainCharacterId: fields.mainCharacterId })
          .where(eq(players.id, id))
          .run(),
      'updateDerivedFields'
    );
  }

  /**
   * Delete regular players that own no characters
   * @returns Number of players deleted
   */
  deleteWithoutCharacters(): number {
    return this.executeQuery(
      'delete',
      () =>
        this.db
          .delete(players)
          .where(
            and(
              eq(players.kind, PlayerKind.REGULAR),
              notExists(this.db.select({ id: characters.id }).from(characters).where(eq(characters.playerId, players.id)))
            )
          )
          .run().changes,
      'deleteWithoutCharacters'
    );
  }
}
