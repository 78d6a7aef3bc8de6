import { Player } from '../../domain/player/Player';
import { createLogger } from '../../lib/logger';
import { PlayerRepository } from '../../infrastructure/repositories';

const logger = createLogger('sentinel');

/** Display title of the sentinel player; it is looked up by kind, never by this title */
export const SENTINEL_TITLE = '__查无此人__';

/**
 * The sentinel player, provisioned on first use
 */
export function ensureSentinel(players: PlayerRepository): Player {
  const existing = players.getSentinel();
  if (existing) {
    return existing;
  }

  const sentinel = players.createSentinel(SENTINEL_TITLE);
  logger.info({ playerId: sentinel.id }, 'Provisioned sentinel player');
  return sentinel;
}
