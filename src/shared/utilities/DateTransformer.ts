import { Transform } from 'class-transformer';
import { format, isValid, parseISO } from 'date-fns';

/**
 * Date conversion helpers shared by the domain entities and the services
 */
export class DateTransformer {
  /**
   * Convert a stored or parsed value to a Date; anything unusable becomes null
   */
  static toDate(value: unknown): Date | null {
    if (value === null || value === undefined || value === '') {
      return null;
    }

    if (value instanceof Date) {
      return isValid(value) ? value : null;
    }

    if (typeof value === 'number') {
      const date = new Date(value);
      return isValid(date) ? date : null;
    }

    if (typeof value === 'string') {
      const date = parseISO(value.trim());
      return isValid(date) ? date : null;
    }

    return null;
  }

  /**
   * Calendar date in `yyyy-MM-dd` form
   */
  static toCalendarDate(value: Date): string {
    return format(value, 'yyyy-MM-dd');
  }

  /**
   * Parse a `yyyy-MM-dd` calendar date, or null when it is not one
   */
  static parseCalendarDate(value: string): Date | null {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value.trim())) {
      return null;
    }
    return this.toDate(value);
  }

  /**
   * Earliest of the given dates, ignoring nulls
   */
  static earliest(values: readonly (Date | null)[]): Date | null {
    let result: Date | null = null;
    for (const value of values) {
      if (value && (!result || value.getTime() < result.getTime())) {
        result = value;
      }
    }
    return result;
  }

  static get dateTransform() {
    return Transform(({ value }: { value: unknown }) => this.toDate(value));
  }
}
