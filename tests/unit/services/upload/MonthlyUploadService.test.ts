import { MockProxy, mock } from 'jest-mock-extended';
import { ParsedWorkbook } from '../../../../src/domain/upload/sheets';
import { DatabaseClient, Executor } from '../../../../src/infrastructure/persistence/client';
import { Repositories } from '../../../../src/infrastructure/repositories';
import { ReconciliationScheduler, ReconciliationSweeper } from '../../../../src/services/reconciliation';
import { MonthlyUploadService } from '../../../../src/services/upload/MonthlyUploadService';
import { SpreadsheetIngestor } from '../../../../src/services/upload/SpreadsheetIngestor';
import { SheetKind } from '../../../../src/shared/enums';
import { UploadError } from '../../../../src/shared/errors';
import { FakeESIClient } from '../../../helpers/FakeESIClient';
import { createTestDatabase } from '../../../helpers/database';
import { buildWorkbook } from '../../../helpers/workbook';

/**
 * Ingestor whose imports of the listed sheets throw a set number of times
 */
class FlakyIngestor extends SpreadsheetIngestor {
  constructor(private readonly failures: Map<SheetKind, number>) {
    super();
  }

  importSheet(db: Executor, kind: SheetKind, uploadId: number, workbook: ParsedWorkbook): number {
    const remaining = this.failures.get(kind) ?? 0;
    if (remaining > 0) {
      this.failures.set(kind, remaining - 1);
      throw new Error(`${kind} import failed`);
    }
    return super.importSheet(db, kind, uploadId, workbook);
  }
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

describe('MonthlyUploadService', () => {
  let client: DatabaseClient;
  let repositories: Repositories;
  let esi: FakeESIClient;
  let scheduler: MockProxy<ReconciliationScheduler>;

  const request = {
    year: 2025,
    month: 7,
    taxRate: 0.1,
    oreConvertRate: 100,
    uploadedBy: 'tester',
  };

  const aliceWorkbook = () =>
    buildWorkbook({
      activity: [['Alice', 'Wing Commander', 5, 1]],
      bounty: [['Alice', 250]],
    });

  const createService = (ingestor?: SpreadsheetIngestor) =>
    new MonthlyUploadService(client, new ReconciliationSweeper(client.db, esi), scheduler, ingestor);

  beforeEach(() => {
    ({ client, repositories } = createTestDatabase());
    esi = new FakeESIClient();
    scheduler = mock<ReconciliationScheduler>();
    scheduler.isScheduled.mockReturnValue(true);
  });

  afterEach(() => {
    client.close();
  });

  it('should import the workbook and reconcile its names', async () => {
    esi.addCharacter({ id: 12345, name: 'Alice', title: 'Wing Commander', joinDate: new Date(2023, 0, 15) });

    const result = await createService().processUpload({ ...request, workbook: aliceWorkbook() });

    expect(result).toEqual({
      uploadId: expect.any(Number),
      year: 2025,
      month: 7,
      counts: { activity: 1, bounty: 1, mining: 0 },
      reconciliation: { checked: 2, fixed: 2, failed: 0, deleted: 0, pending: 0 },
      reconciliationPending: false,
    });
    expect(scheduler.schedule).not.toHaveBeenCalled();

    const alice = repositories.characters.getById(12345);
    const player = repositories.players.getByTitle('Wing Commander');
    expect(alice?.playerId).toBe(player?.id);
    expect(player?.mainCharacterId).toBe(12345);
    expect(repositories.characters.getPlaceholders()).toEqual([]);
    expect(repositories.records.getTotalsByCharacter(result.uploadId)).toEqual([
      { characterId: 12345, points: 5, strategicPoints: 1, taxIsk: 250, volumeM3: 0 },
    ]);
  });

  it('should hold unknown names as placeholders until reconciled', async () => {
    const service = new MonthlyUploadService(client, new ReconciliationSweeper(client.db, esi), null, undefined, {
      reconcileInline: false,
    });

    const result = await service.processUpload({
      ...request,
      workbook: buildWorkbook({
        activity: [['Alice', 'Wing Commander', 5, 1]],
        bounty: [['Alice', null]],
      }),
    });

    expect(result.counts).toEqual({ activity: 1, bounty: 0, mining: 0 });
    expect(result.reconciliation).toBeNull();
    expect(result.reconciliationPending).toBe(true);
    expect(esi.searches).toEqual([]);

    const player = repositories.players.getByTitle('Wing Commander');
    const alice = repositories.characters.findPreferredByName('Alice');
    expect(alice).toMatchObject({ id: -1, title: 'Wing Commander', playerId: player?.id, joinDate: null });
    expect(repositories.records.getTotalsByCharacter(result.uploadId)).toEqual([
      { characterId: -1, points: 5, strategicPoints: 1, taxIsk: 0, volumeM3: 0 },
    ]);
  });

  it('should schedule a follow-up sweep when lookups fail', async () => {
    esi.failingNames.add('Alice');
    const service = createService();

    const result = await service.processUpload({ ...request, workbook: aliceWorkbook() });

    expect(result.reconciliation).toEqual({ checked: 2, fixed: 0, failed: 2, deleted: 0, pending: 1 });
    expect(result.reconciliationPending).toBe(true);
    expect(scheduler.schedule).toHaveBeenCalledWith(result.uploadId);
  });

  it('should refuse a month that already has data', async () => {
    esi.addCharacter({ id: 12345, name: 'Alice', title: 'Wing Commander', joinDate: null });
    const service = createService();
    const first = await service.processUpload({ ...request, workbook: aliceWorkbook() });

    const error = await captureError(service.processUpload({ ...request, workbook: aliceWorkbook() }));

    expect(error).toBeInstanceOf(UploadError);
    expect(error).toMatchObject({ kind: 'validation', message: 'Data for 2025-07 already exists' });
    expect(repositories.records.countByUpload(first.uploadId)).toEqual({ activity: 1, bounty: 1, mining: 0 });
    expect(repositories.uploads.getAll()).toHaveLength(1);
  });

  it('should replace the month when overwriting', async () => {
    const service = createService();
    const first = await service.processUpload({ ...request, workbook: aliceWorkbook() });

    const second = await service.processUpload({
      ...request,
      overwrite: true,
      workbook: buildWorkbook({ bounty: [['Alice', 10], ['Bob', 20]] }),
    });

    expect(second.uploadId).not.toBe(first.uploadId);
    expect(repositories.uploads.getById(first.uploadId)).toBeNull();
    expect(second.counts).toEqual({ activity: 0, bounty: 2, mining: 0 });
    expect(scheduler.cancel).toHaveBeenCalledWith(first.uploadId);
  });

  it('should keep the existing month when the replacement workbook is invalid', async () => {
    const service = createService();
    const first = await service.processUpload({ ...request, workbook: aliceWorkbook() });

    const error = await captureError(
      service.processUpload({ ...request, overwrite: true, workbook: buildWorkbook({ omit: ['PAP'] }) })
    );

    expect(error).toMatchObject({ kind: 'validation', message: 'Missing required sheets: PAP' });
    expect(service.findUpload(2025, 7)?.id).toBe(first.uploadId);
  });

  it('should reject invalid parameters before reading the workbook', async () => {
    const error = await captureError(
      createService().processUpload({ ...request, month: 13, uploadedBy: ' ', workbook: Buffer.alloc(0) })
    );

    expect(error).toBeInstanceOf(UploadError);
    expect(error).toMatchObject({ kind: 'validation' });
    expect(error instanceof UploadError ? error.issues.map(issue => issue.field) : []).toEqual(['month', 'uploadedBy']);
    expect(repositories.uploads.getAll()).toEqual([]);
  });

  it('should fall back to a sequential import when a concurrent one fails', async () => {
    esi.addCharacter({ id: 12345, name: 'Alice', title: 'Wing Commander', joinDate: null });
    const ingestor = new FlakyIngestor(new Map([[SheetKind.BOUNTY, 1]]));

    const result = await createService(ingestor).processUpload({ ...request, workbook: aliceWorkbook() });

    expect(result.counts).toEqual({ activity: 1, bounty: 1, mining: 0 });
    expect(repositories.records.countByUpload(result.uploadId)).toEqual({ activity: 1, bounty: 1, mining: 0 });
  });

  it('should roll the upload back when the sequential import fails too', async () => {
    const ingestor = new FlakyIngestor(new Map([[SheetKind.MINING, 2]]));
    const service = createService(ingestor);

    const error = await captureError(
      service.processUpload({ ...request, workbook: buildWorkbook({ mining: [['Alt', null, 5]] }) })
    );

    expect(error).toBeInstanceOf(UploadError);
    expect(error).toMatchObject({ kind: 'processing', message: 'Error processing file: mining import failed' });
    expect(service.uploadExists(2025, 7)).toBe(false);
  });

  it('should delete an upload and cancel its follow-up', async () => {
    const service = createService();
    const { uploadId } = await service.processUpload({ ...request, workbook: aliceWorkbook() });

    expect(service.listUploads().map(u => u.period)).toEqual(['2025-07']);
    expect(service.deleteUpload(2025, 7)).toBe(true);
    expect(service.deleteUpload(2025, 7)).toBe(false);
    expect(scheduler.cancel).toHaveBeenCalledWith(uploadId);
    expect(repositories.records.countByUpload(uploadId)).toEqual({ activity: 0, bounty: 0, mining: 0 });
  });
});
