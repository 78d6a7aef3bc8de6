import { Exclude, Expose } from 'class-transformer';
import { DateTransformer } from '../../shared/utilities/DateTransformer';

/**
 * One calendar month of uploaded activity, bounty and mining data
 */
@Exclude()
export class MonthlyUpload {
  @Expose()
  readonly id!: number;

  @Expose()
  readonly year!: number;

  @Expose()
  readonly month!: number;

  @Expose()
  @DateTransformer.dateTransform
  readonly uploadedAt!: Date;

  @Expose()
  readonly taxRate!: number;

  @Expose()
  readonly oreConvertRate!: number;

  @Expose()
  readonly uploadedBy!: string;

  /** `YYYY-MM` */
  get period(): string {
    return `${this.year}-${String(this.month).padStart(2, '0')}`;
  }

  constructor(data?: Partial<MonthlyUpload>) {
    if (data) {
      Object.assign(this, data);
    }
  }
}
