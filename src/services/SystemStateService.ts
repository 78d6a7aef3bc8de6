import { createLogger } from '../lib/logger';
import { Executor } from '../infrastructure/persistence/client';
import { SystemStateRepository } from '../infrastructure/repositories';
import { SystemStateKey } from '../shared/enums';
import { ValidationError } from '../shared/errors';
import { DateTransformer } from '../shared/utilities/DateTransformer';

const logger = createLogger('system-state');

/**
 * Latest processed feed date and reference data version
 */
export class SystemStateService {
  private readonly repository: SystemStateRepository;

  constructor(db: Executor) {
    this.repository = new SystemStateRepository(db);
  }

  getLatestUpdate(): Date | null {
    return this.read(SystemStateKey.LATEST_UPDATE);
  }

  setLatestUpdate(date: Date | string): string {
    return this.write(SystemStateKey.LATEST_UPDATE, date);
  }

  getSdeVersion(): Date | null {
    return this.read(SystemStateKey.SDE_VERSION);
  }

  setSdeVersion(date: Date | string): string {
    return this.write(SystemStateKey.SDE_VERSION, date);
  }

  private read(key: SystemStateKey): Date | null {
    const value = this.repository.get(key);
    return value === null ? null : DateTransformer.parseCalendarDate(value);
  }

  private write(key: SystemStateKey, date: Date | string): string {
    const parsed = typeof date === 'string' ? DateTransformer.parseCalendarDate(date) : DateTransformer.toDate(date);
    if (!parsed) {
      throw ValidationError.invalidFormat(key, 'yyyy-MM-dd date', date);
    }

    const value = DateTransformer.toCalendarDate(parsed);
    this.repository.set(key, value);
    logger.info({ key, value }, 'Updated system state');
    return value;
  }
}
