import { z } from 'zod';
import { MonthlyUpload } from '../../domain/upload/MonthlyUpload';
import { ParsedWorkbook, SheetCounts } from '../../domain/upload/sheets';
import { createLogger } from '../../lib/logger';
import { DatabaseClient } from '../../infrastructure/persistence/client';
import { createRepositories } from '../../infrastructure/repositories';
import { SheetKind } from '../../shared/enums';
import { BaseError, UploadError, ValidationError, errorHandler } from '../../shared/errors';
import { ensureSentinel } from '../identity/sentinel';
import { ReconciliationScheduler } from '../reconciliation/ReconciliationScheduler';
import { ISweeper, SweepResult } from '../reconciliation/ReconciliationSweeper';
import { SpreadsheetIngestor } from './SpreadsheetIngestor';

const logger = createLogger('monthly-upload');

const SHEET_ORDER = [SheetKind.ACTIVITY, SheetKind.BOUNTY, SheetKind.MINING] as const;

export const UploadParametersSchema = z.object({
  year: z.number().int().min(2000).max(9999),
  month: z.number().int().min(1).max(12),
  taxRate: z.number().finite().nonnegative(),
  oreConvertRate: z.number().finite().nonnegative(),
  uploadedBy: z.string().trim().min(1),
  overwrite: z.boolean().default(false),
});

export type UploadParameters = z.input<typeof UploadParametersSchema>;

export interface UploadRequest extends UploadParameters {
  workbook: Buffer;
}

export interface UploadResult {
  uploadId: number;
  year: number;
  month: number;
  counts: SheetCounts;
  /** Result of the inline sweep; null when it could not run */
  reconciliation: SweepResult | null;
  /** A follow-up sweep is still needed */
  reconciliationPending: boolean;
}

export interface MonthlyUploadServiceOptions {
  /** Run one sweep before returning */
  reconcileInline?: boolean;
}

/**
 * Orchestrates a monthly upload: checks, sheet imports, rollback on failure
 * and the reconciliation that follows
 */
export class MonthlyUploadService {
  private readonly reconcileInline: boolean;

  constructor(
    private readonly database: DatabaseClient,
    private readonly sweeper: ISweeper,
    private readonly scheduler: ReconciliationScheduler | null = null,
    private readonly ingestor: SpreadsheetIngestor = new SpreadsheetIngestor(),
    options: MonthlyUploadServiceOptions = {}
  ) {
    this.reconcileInline = options.reconcileInline ?? true;
  }

  async processUpload(request: UploadRequest): Promise<UploadResult> {
    const correlationId = errorHandler.createCorrelationId();
    const parsed = UploadParametersSchema.safeParse(request);
    if (!parsed.success) {
      throw UploadError.fromValidation(ValidationError.fromZodError(parsed.error, { correlationId }));
    }
    const { year, month, taxRate, oreConvertRate, uploadedBy, overwrite } = parsed.data;

    const repositories = createRepositories(this.database.db);
    const existing = repositories.uploads.getByPeriod(year, month);
    if (existing && !overwrite) {
      throw UploadError.alreadyExists(year, month, { correlationId });
    }

    const workbook = this.ingestor.parse(request.workbook);

    if (existing) {
      this.scheduler?.cancel(existing.id);
      repositories.uploads.delete(existing.id);
      logger.info({ correlationId, year, month, uploadId: existing.id }, 'Deleted existing upload before overwrite');
    }

    ensureSentinel(repositories.players);
    const upload = repositories.uploads.create({ year, month, taxRate, oreConvertRate, uploadedBy });

    let counts: SheetCounts;
    try {
      counts = await this.importSheets(upload.id, workbook, correlationId);
    } catch (error) {
      this.rollback(upload.id, correlationId);
      if (error instanceof UploadError) {
        throw error.withContext({ correlationId, uploadId: upload.id });
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw errorHandler.handleError(UploadError.processingFailed(cause), {
        correlationId,
        uploadId: upload.id,
        operation: 'processUpload',
      });
    }

    logger.info(
      { correlationId, uploadId: upload.id, ...counts },
      `Uploaded ${upload.period}: ${counts.activity} PAP records, ${counts.bounty} bounty records, ${counts.mining} mining records`
    );

    const { reconciliation, reconciliationPending } = this.reconcileInline
      ? await this.reconcile(upload.id, correlationId)
      : { reconciliation: null, reconciliationPending: this.scheduleFollowUp(upload.id) };

    return { uploadId: upload.id, year, month, counts, reconciliation, reconciliationPending };
  }

  /**
   * @returns Whether an upload existed
   */
  deleteUpload(year: number, month: number): boolean {
    const uploads = createRepositories(this.database.db).uploads;
    const upload = uploads.getByPeriod(year, month);
    if (!upload) {
      return false;
    }

    this.scheduler?.cancel(upload.id);
    uploads.delete(upload.id);
    logger.info({ year, month, uploadId: upload.id }, 'Deleted upload');
    return true;
  }

  /**
   * Every upload, newest month first
   */
  listUploads(): MonthlyUpload[] {
    return createRepositories(this.database.db).uploads.getAll();
  }

  uploadExists(year: number, month: number): boolean {
    return createRepositories(this.database.db).uploads.exists(year, month);
  }

  findUpload(year: number, month: number): MonthlyUpload | null {
    return createRepositories(this.database.db).uploads.getByPeriod(year, month);
  }

  /**
   * Import the sheets concurrently, each on its own session. When any import
   * fails, start over from no records and import them one by one.
   */
  private async importSheets(uploadId: number, workbook: ParsedWorkbook, correlationId: string): Promise<SheetCounts> {
    const results = await Promise.allSettled(
      SHEET_ORDER.map(kind =>
        this.database.withSession(session => this.ingestor.importSheet(session.db, kind, uploadId, workbook))
      )
    );

    const counts = this.collectCounts(results);
    if (counts) {
      return counts;
    }

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const handled = errorHandler.handleError(result.reason, {
          correlationId,
          uploadId,
          operation: `import.${SHEET_ORDER[index]}`,
        });
        logger.warn({ correlationId, uploadId, sheet: SHEET_ORDER[index] }, `Concurrent import failed: ${handled.message}`);
      }
    });

    const db = this.database.db;
    const removed = db.transaction(tx => createRepositories(tx).records.deleteByUpload(uploadId));
    logger.warn({ correlationId, uploadId, removed }, 'Falling back to sequential import');

    return {
      activity: this.ingestor.importSheet(db, SheetKind.ACTIVITY, uploadId, workbook),
      bounty: this.ingestor.importSheet(db, SheetKind.BOUNTY, uploadId, workbook),
      mining: this.ingestor.importSheet(db, SheetKind.MINING, uploadId, workbook),
    };
  }

  private collectCounts(results: PromiseSettledResult<number>[]): SheetCounts | null {
    const [activity, bounty, mining] = results;
    if (activity?.status === 'fulfilled' && bounty?.status === 'fulfilled' && mining?.status === 'fulfilled') {
      return { activity: activity.value, bounty: bounty.value, mining: mining.value };
    }
    return null;
  }

  private rollback(uploadId: number, correlationId: string): void {
    try {
      createRepositories(this.database.db).uploads.delete(uploadId);
      logger.warn({ correlationId, uploadId }, 'Rolled back upload');
    } catch (error) {
      errorHandler.handleError(error, { correlationId, uploadId, operation: 'rollbackUpload' });
    }
  }

  private async reconcile(
    uploadId: number,
    correlationId: string
  ): Promise<{ reconciliation: SweepResult | null; reconciliationPending: boolean }> {
    try {
      const reconciliation = await this.sweeper.fixOrphans({ uploadId });
      const needsFollowUp = reconciliation.failed > 0 || reconciliation.pending > 0;
      return { reconciliation, reconciliationPending: needsFollowUp ? this.scheduleFollowUp(uploadId) : false };
    } catch (error) {
      const handled: BaseError = errorHandler.handleError(error, { correlationId, uploadId, operation: 'inlineSweep' });
      logger.warn({ correlationId, uploadId }, `Inline sweep failed: ${handled.message}`);
      return { reconciliation: null, reconciliationPending: this.scheduleFollowUp(uploadId) };
    }
  }

  /**
   * @returns Whether a follow-up sweep is waiting for this upload
   */
  private scheduleFollowUp(uploadId: number): boolean {
    if (!this.scheduler) {
      return true;
    }
    this.scheduler.schedule(uploadId);
    return this.scheduler.isScheduled(uploadId);
  }
}
