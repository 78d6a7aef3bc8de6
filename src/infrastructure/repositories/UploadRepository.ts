import { and, desc, eq } from 'drizzle-orm';
import { MonthlyUpload } from '../../domain/upload/MonthlyUpload';
import { RowMapper } from '../mapper/RowMapper';
import { Executor } from '../persistence/client';
import { monthlyUploads } from '../persistence/schema';
import { BaseRepository } from './BaseRepository';

export interface NewMonthlyUpload {
  year: number;
  month: number;
  taxRate: number;
  oreConvertRate: number;
  uploadedBy: string;
  uploadedAt?: Date;
}

/**
 * Repository for monthly uploads. Deleting an upload cascades to its records.
 */
export class UploadRepository extends BaseRepository {
  constructor(db: Executor) {
    super(db, 'monthly_uploads');
  }

  getById(id: number): MonthlyUpload | null {
    return this.executeQuery(
      'read',
      () =>
        RowMapper.mapOptional(this.db.select().from(monthlyUploads).where(eq(monthlyUploads.id, id)).get(), MonthlyUpload),
      'getById'
    );
  }

  getByPeriod(year: number, month: number): MonthlyUpload | null {
    return this.executeQuery(
      'read',
      () =>
        RowMapper.mapOptional(
          this.db
            .select()
            .from(monthlyUploads)
            .where(and(eq(monthlyUploads.year, year), eq(monthlyUploads.month, month)))
            .get(),
          MonthlyUpload
        ),
      'getByPeriod'
    );
  }

  exists(year: number, month: number): boolean {
    return this.getByPeriod(year, month) !== null;
  }

  getAll(): MonthlyUpload[] {
    return this.executeQuery(
      'read',
      () =>
        RowMapper.mapArray(
          this.db.select().from(monthlyUploads).orderBy(desc(monthlyUploads.year), desc(monthlyUploads.month)).all(),
          MonthlyUpload
        ),
      'getAll'
    );
  }

  create(upload: NewMonthlyUpload): MonthlyUpload {
    return this.executeQuery(
      'create',
      () =>
        RowMapper.map(
          this.db
            .insert(monthlyUploads)
            .values({ ...upload, uploadedAt: upload.uploadedAt ?? new Date() })
            .returning()
            .get(),
          MonthlyUpload
        ),
      'create'
    );
  }

  delete(id: number): boolean {
    return this.executeQuery(
      'delete',
      () => this.db.delete(monthlyUploads).where(eq(monthlyUploads.id, id)).run().changes > 0,
      'delete'
    );
  }
}
