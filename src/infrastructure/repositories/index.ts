import { Executor } from '../persistence/client';
import { CharacterRepository } from './CharacterRepository';
import { PlayerRepository } from './PlayerRepository';
import { RecordRepository } from './RecordRepository';
import { SystemStateRepository } from './SystemStateRepository';
import { UploadRepository } from './UploadRepository';

export { BaseRepository } from './BaseRepository';
export { CharacterRepository } from './CharacterRepository';
export type { NewCharacter } from './CharacterRepository';
export { PlayerRepository } from './PlayerRepository';
export type { PlayerDerivedFields } from './PlayerRepository';
export { RecordRepository } from './RecordRepository';
export type { CharacterTotals, PlaceholderReference } from './RecordRepository';
export { SystemStateRepository } from './SystemStateRepository';
export { UploadRepository } from './UploadRepository';
export type { NewMonthlyUpload } from './UploadRepository';

/**
 * Every repository bound to the same executor
 */
export interface Repositories {
  characters: CharacterRepository;
  players: PlayerRepository;
  records: RecordRepository;
  uploads: UploadRepository;
  systemState: SystemStateRepository;
}

export function createRepositories(db: Executor): Repositories {
  return {
    characters: new CharacterRepository(db),
    players: new PlayerRepository(db),
    records: new RecordRepository(db),
    uploads: new UploadRepository(db),
    systemState: new SystemStateRepository(db),
  };
}
