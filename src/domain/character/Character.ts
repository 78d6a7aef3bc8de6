import { Exclude, Expose } from 'class-transformer';
import { DateTransformer } from '../../shared/utilities/DateTransformer';

/**
 * Character domain entity
 * A positive id is the character's ESI id; a negative id marks a placeholder
 * created from a spreadsheet name that has not been verified yet.
 */
@Exclude()
export class Character {
  @Expose()
  readonly id!: number;

  @Expose()
  readonly name!: string;

  @Expose()
  readonly title!: string | null;

  @Expose()
  @DateTransformer.dateTransform
  readonly joinDate!: Date | null;

  @Expose()
  readonly playerId!: number;

  @Expose()
  readonly insertionSeq!: number;

  get isPlaceholder(): boolean {
    return this.id < 0;
  }

  get isVerified(): boolean {
    return this.id > 0;
  }

  constructor(data?: Partial<Character>) {
    if (data) {
      Object.assign(this, data);
    }
  }
}
