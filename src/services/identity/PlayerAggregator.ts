import { Character } from '../../domain/character/Character';
import { createLogger } from '../../lib/logger';
import { CharacterRepository, PlayerRepository } from '../../infrastructure/repositories';
import { DateTransformer } from '../../shared/utilities/DateTransformer';

const logger = createLogger('player-aggregator');

export interface RecomputeOptions {
  /** Clear the player's join date when none of its characters has one */
  clearJoinDateWhenEmpty?: boolean;
}

/**
 * Earliest-joined character, else the first one inserted
 */
export function pickMainCharacter(characters: readonly Character[]): Character | null {
  let main: Character | null = null;
  for (const character of characters) {
    if (character.joinDate && (!main?.joinDate || character.joinDate.getTime() < main.joinDate.getTime())) {
      main = character;
    }
  }
  return main ?? characters[0] ?? null;
}

/**
 * Keeps a player's join date and main character in line with its characters
 */
export class PlayerAggregator {
  constructor(
    private readonly players: PlayerRepository,
    private readonly characters: CharacterRepository
  ) {}

  /**
   * @returns Whether anything was written
   */
  recompute(playerId: number, options: RecomputeOptions = {}): boolean {
    const player = this.players.getById(playerId);
    if (!player) {
      return false;
    }

    const characters = this.characters.getByPlayer(playerId);
    const earliest = DateTransformer.earliest(characters.map(character => character.joinDate));
    const joinDate = earliest ?? (options.clearJoinDateWhenEmpty ? null : player.joinDate);
    const mainCharacterId = pickMainCharacter(characters)?.id ?? null;

    const joinDateChanged = (joinDate?.getTime() ?? null) !== (player.joinDate?.getTime() ?? null);
    const mainChanged = mainCharacterId !== player.mainCharacterId;
    if (!joinDateChanged && !mainChanged) {
      return false;
    }

    this.players.updateDerivedFields(playerId, { joinDate, mainCharacterId });
    logger.debug({ playerId, joinDate, mainCharacterId }, 'Recomputed player');
    return true;
  }

  recomputeMany(playerIds: Iterable<number>, options: RecomputeOptions = {}): number {
    let changed = 0;
    for (const playerId of new Set(playerIds)) {
      if (this.recompute(playerId, options)) {
        changed++;
      }
    }
    return changed;
  }
}
