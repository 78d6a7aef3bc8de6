import { ClassConstructor, plainToInstance } from 'class-transformer';

/**
 * Maps drizzle rows (already camelCase) to domain entities
 */
export class RowMapper {
  /**
   * Maps a row to a domain entity, dropping columns the entity does not expose
   */
  static map<T, R extends object>(row: R, EntityClass: ClassConstructor<T>): T {
    return plainToInstance(EntityClass, row, { excludeExtraneousValues: true });
  }

  static mapArray<T, R extends object>(rows: readonly R[], EntityClass: ClassConstructor<T>): T[] {
    return rows.map(row => this.map(row, EntityClass));
  }

  /**
   * Maps a row that may be missing
   */
  static mapOptional<T, R extends object>(row: R | undefined, EntityClass: ClassConstructor<T>): T | null {
    return row ? this.map(row, EntityClass) : null;
  }
}
