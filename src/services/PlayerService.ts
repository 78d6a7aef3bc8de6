import { Character } from '../domain/character/Character';
import { Player } from '../domain/player/Player';
import { createLogger } from '../lib/logger';
import { Executor } from '../infrastructure/persistence/client';
import { createRepositories } from '../infrastructure/repositories';
import { NotFoundError, ValidationError, errorHandler } from '../shared/errors';
import { PlayerAggregator } from './identity/PlayerAggregator';
import { ensureSentinel } from './identity/sentinel';

const logger = createLogger('player-service');

export interface AssignmentResult {
  character: Character;
  player: Player;
  previousPlayerId: number;
}

/**
 * Service for player maintenance: the sentinel, manual title assignment
 * and removal of empty players
 */
export class PlayerService {
  constructor(private readonly db: Executor) {}

  ensureSentinel(): Player {
    return ensureSentinel(createRepositories(this.db).players);
  }

  /**
   * Move a character to the player with the given title, or with the
   * character's stored title when none is given
   */
  assignCharacterToTitle(name: string, title?: string): AssignmentResult {
    const correlationId = errorHandler.createCorrelationId();
    const trimmedName = name.trim();
    if (!trimmedName) {
      throw ValidationError.fieldRequired('name', { correlationId });
    }

    return this.db.transaction(tx => {
      const repositories = createRepositories(tx);
      const character = repositories.characters.findPreferredByName(trimmedName);
      if (!character) {
        throw new NotFoundError(`Character ${trimmedName} not found`, { name: trimmedName });
      }

      const targetTitle = title?.trim() || character.title;
      if (!targetTitle) {
        throw new ValidationError(
          `No title given and character ${character.name} has no title`,
          [{ field: 'title', constraint: 'required', message: 'title is required when the character has none' }],
          { correlationId }
        );
      }

      const player = repositories.players.findOrCreateByTitle(targetTitle);
      repositories.characters.moveToPlayer(character.id, player.id, targetTitle);

      const aggregator = new PlayerAggregator(repositories.players, repositories.characters);
      aggregator.recompute(character.playerId, { clearJoinDateWhenEmpty: true });
      aggregator.recompute(player.id);

      logger.info(
        { correlationId, characterId: character.id, from: character.playerId, to: player.id },
        `Assigned ${character.name} to ${targetTitle}`
      );

      return {
        character: repositories.characters.getById(character.id) ?? character,
        player: repositories.players.getById(player.id) ?? player,
        previousPlayerId: character.playerId,
      };
    });
  }

  listPlayers(): Player[] {
    return createRepositories(this.db).players.getAll();
  }

  /**
   * Characters still waiting for reconciliation, oldest first
   */
  listPlaceholders(): Character[] {
    return createRepositories(this.db).characters.getPlaceholders();
  }

  /**
   * Delete regular players without characters
   * @returns Number of players deleted
   */
  cleanupDummyPlayers(): number {
    const deleted = createRepositories(this.db).players.deleteWithoutCharacters();
    logger.info({ deleted }, 'Removed players without characters');
    return deleted;
  }
}
