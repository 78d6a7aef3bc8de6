import { Exclude, Expose } from 'class-transformer';
import { PlayerKind } from '../../shared/enums';
import { DateTransformer } from '../../shared/utilities/DateTransformer';

/**
 * Player domain entity
 * The person behind one or more characters. The single sentinel player
 * collects characters whose owner is not known yet.
 */
@Exclude()
export class Player {
  @Expose()
  readonly id!: number;

  @Expose()
  readonly title!: string;

  @Expose()
  readonly kind!: PlayerKind;

  @Expose()
  @DateTransformer.dateTransform
  readonly joinDate!: Date | null;

  @Expose()
  readonly mainCharacterId!: number | null;

  get isSentinel(): boolean {
    return this.kind === PlayerKind.SENTINEL;
  }

  constructor(data?: Partial<Player>) {
    if (data) {
      Object.assign(this, data);
    }
  }
}
