import { eq } from 'drizzle-orm';
import { SystemStateKey } from '../../shared/enums';
import { Executor } from '../persistence/client';
import { systemState } from '../persistence/schema';
import { BaseRepository } from './BaseRepository';

/**
 * Durable key/value state; values are `yyyy-MM-dd` calendar dates
 */
export class SystemStateRepository extends BaseRepository {
  constructor(db: Executor) {
    super(db, 'system_state');
  }

  get(key: SystemStateKey): string | null {
    return this.executeQuery(
      'read',
      () => this.db.select().from(systemState).where(eq(systemState.key, key)).get()?.dateValue ?? null,
      'get'
    );
  }

  set(key: SystemStateKey, dateValue: string): void {
    this.executeQuery(
      'update',
      () =>
        this.db
          .insert(systemState)
          .values({ key, dateValue })
          .onConflictDoUpdate({ target: systemState.key, set: { dateValue } })
          .run(),
      'set'
    );
  }
}
