import { ServiceContainer } from '../../src/application/ServiceContainer';
import { TimerManager } from '../../src/shared/performance';
import { FakeESIClient } from '../helpers/FakeESIClient';
import { buildWorkbook } from '../helpers/workbook';

const RETRY_DELAY_MS = 30_000;

describe('Monthly upload flow', () => {
  let esi: FakeESIClient;
  let container: ServiceContainer;

  beforeEach(() => {
    jest.useFakeTimers({ doNotFake: ['nextTick', 'queueMicrotask', 'setImmediate'] });
    esi = new FakeESIClient();
    container = ServiceContainer.create({
      database: { path: ':memory:', sessionPoolSize: 3 },
      esi,
      retryDelayMs: RETRY_DELAY_MS,
      timerManager: TimerManager.getInstance(),
    });
  });

  afterEach(async () => {
    await container.close();
    jest.useRealTimers();
  });

  it('should resolve names in a follow-up sweep once ESI answers', async () => {
    esi.failingNames.add('Alice');
    esi.failingNames.add('Alice Alt');

    const result = await container.uploads.processUpload({
      year: 2025,
      month: 7,
      taxRate: 0.1,
      oreConvertRate: 100,
      uploadedBy: 'tester',
      workbook: buildWorkbook({
        activity: [['Alice', 'Wing Commander', 5, 1]],
        mining: [['Alice Alt', 'Alice', 1000]],
      }),
    });

    expect(result.reconciliation).toEqual({ checked: 2, fixed: 0, failed: 2, deleted: 0, pending: 2 });
    expect(result.reconciliationPending).toBe(true);
    expect(container.scheduler.isScheduled(result.uploadId)).toBe(true);

    esi.failingNames.clear();
    esi.addCharacter({ id: 12345, name: 'Alice', title: 'Wing Commander', joinDate: new Date('2023-01-15T00:00:00Z') });
    esi.addCharacter({ id: 12346, name: 'Alice Alt', title: 'Wing Commander', joinDate: new Date('2024-02-01T00:00:00Z') });

    jest.advanceTimersByTime(RETRY_DELAY_MS);
    await container.scheduler.drain();

    const summary = container.summaries.getUploadSummary(2025, 7);
    expect(summary.players).toHaveLength(1);
    expect(summary.players[0]).toMatchObject({
      titleText: 'Wing Commander',
      mainCharacter: 'Alice',
      totalPap: 5,
      strategicPap: 1,
      totalMiningVolume: 1000,
      totalIncome: 100_000,
      status: '合格',
    });
    expect(container.scheduler.size).toBe(0);
  });

  it('should not schedule anything once every name is known', async () => {
    esi.addCharacter({ id: 12345, name: 'Alice', title: 'Wing Commander', joinDate: null });

    const result = await container.uploads.processUpload({
      year: 2025,
      month: 8,
      taxRate: 0.1,
      oreConvertRate: 100,
      uploadedBy: 'tester',
      workbook: buildWorkbook({ bounty: [['Alice', 100]] }),
    });

    expect(result.reconciliation).toEqual({ checked: 1, fixed: 1, failed: 0, deleted: 0, pending: 0 });
    expect(result.reconciliationPending).toBe(false);
    expect(container.scheduler.size).toBe(0);
  });
});
