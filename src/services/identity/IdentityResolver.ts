import { Character } from '../../domain/character/Character';
import { Player } from '../../domain/player/Player';
import { CharacterRepository, PlayerRepository } from '../../infrastructure/repositories';
import { ensureSentinel } from './sentinel';

/**
 * Maps spreadsheet names to characters without touching the network.
 * Unknown names become placeholder characters.
 */
export class IdentityResolver {
  private sentinel: Player | null = null;

  constructor(
    private readonly characters: CharacterRepository,
    private readonly players: PlayerRepository
  ) {}

  /**
   * Existing character for `name` (verified preferred), else a new placeholder
   * owned by the player titled `hintTitle`, or by the sentinel when no title is given
   */
  resolve(name: string, hintTitle?: string | null): Character {
    const existing = this.characters.findPreferredByName(name);
    if (existing) {
      return existing;
    }

    const title = hintTitle?.trim() ? hintTitle.trim() : null;
    const player = title ? this.players.findOrCreateByTitle(title) : this.getSentinel();
    return this.characters.createPlaceholder(name, title, player.id);
  }

  /**
   * Like `resolve`, but the owner comes from the named main character when it exists
   */
  resolveWithMainCharacter(name: string, mainCharacterName: string | null): Character {
    const existing = this.characters.findPreferredByName(name);
    if (existing) {
      return existing;
    }

    const main = mainCharacterName ? this.characters.findPreferredByName(mainCharacterName) : null;
    const owner = main ? this.players.getById(main.playerId) : null;
    if (!owner) {
      return this.characters.createPlaceholder(name, null, this.getSentinel().id);
    }

    return this.characters.createPlaceholder(name, owner.isSentinel ? null : owner.title, owner.id);
  }

  private getSentinel(): Player {
    if (!this.sentinel) {
      this.sentinel = ensureSentinel(this.players);
    }
    return this.sentinel;
  }
}
