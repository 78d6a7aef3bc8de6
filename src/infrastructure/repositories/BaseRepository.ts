import { createLogger, Logger } from '../../lib/logger';
import { DatabaseError, DatabaseOperation } from '../../shared/errors';
import { Executor } from '../persistence/client';

/**
 * Base repository class that all specific repositories extend.
 * A repository is bound to one executor: a session's database or an open
 * transaction, so the same queries run inside and outside transactions.
 */
export abstract class BaseRepository {
  protected readonly logger: Logger;

  constructor(
    protected readonly db: Executor,
    protected readonly tableName: string
  ) {
    this.logger = createLogger(`${tableName}-repository`);
  }

  /**
   * Execute a query, converting driver failures to DatabaseError
   */
  protected executeQuery<R>(operation: DatabaseOperation, queryFn: () => R, description?: string): R {
    try {
      return queryFn();
    } catch (error) {
      if (error instanceof DatabaseError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new DatabaseError(
        `${this.tableName}.${description ?? operation} failed: ${cause.message}`,
        operation,
        this.tableName,
        { operation: `${this.tableName}.${description ?? operation}` },
        cause
      );
    }
  }
}
