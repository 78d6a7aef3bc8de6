import request from 'supertest';
import { Application } from 'express';
import { ServiceContainer } from '../../src/application/ServiceContainer';
import { createServer } from '../../src/interfaces/rest';
import { FakeESIClient } from '../helpers/FakeESIClient';
import { buildWorkbook } from '../helpers/workbook';

const UPLOAD_URL = '/api/uploads/2025/7?taxRate=0.1&oreRate=100&by=tester';

describe('REST API', () => {
  let esi: FakeESIClient;
  let container: ServiceContainer;
  let app: Application;

  const upload = (url: string = UPLOAD_URL) =>
    request(app)
      .post(url)
      .set('Content-Type', 'application/octet-stream')
      .send(buildWorkbook({ activity: [['Alice', 'Wing Commander', 5, 1]] }));

  beforeEach(() => {
    esi = new FakeESIClient();
    esi.addCharacter({ id: 12345, name: 'Alice', title: 'Wing Commander', joinDate: null });
    container = ServiceContainer.create({ database: { path: ':memory:' }, esi, retryDelayMs: 60_000 });
    app = createServer(container);
  });

  afterEach(async () => {
    await container.close();
  });

  it('should report health', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', pendingSweeps: 0 });
  });

  describe('uploads', () => {
    it('should accept a workbook', async () => {
      const response = await upload();

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        year: 2025,
        month: 7,
        counts: { activity: 1, bounty: 0, mining: 0 },
        reconciliation: { checked: 1, fixed: 1, failed: 0, deleted: 0, pending: 0 },
        reconciliationPending: false,
      });
    });

    it('should refuse a second upload of the same month', async () => {
      await upload();

      const response = await upload();

      expect(response.status).toBe(400);
      expect(response.body.error).toMatchObject({
        code: 'UPLOAD_VALIDATION_ERROR',
        message: 'Data for 2025-07 already exists',
      });
    });

    it('should replace a month with overwrite', async () => {
      await upload();

      const response = await upload(`${UPLOAD_URL}&overwrite=true`);

      expect(response.status).toBe(201);
    });

    it('should require a workbook body', async () => {
      const response = await request(app).post(UPLOAD_URL);

      expect(response.status).toBe(400);
      expect(response.body.error).toMatchObject({ code: 'VALIDATION_ERROR', message: "Required field 'workbook' is missing" });
    });

    it('should require the rates and the uploader', async () => {
      const response = await upload('/api/uploads/2025/7?taxRate=0.1');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('should reject a month outside 1 to 12', async () => {
      const response = await request(app).get('/api/uploads/2025/13/summary');

      expect(response.status).toBe(400);
    });

    it('should list uploaded months', async () => {
      await upload();

      const response = await request(app).get('/api/uploads');

      expect(response.status).toBe(200);
      expect(response.body).toEqual([
        expect.objectContaining({ period: '2025-07', year: 2025, month: 7, uploadedBy: 'tester', taxRate: 0.1 }),
      ]);
    });

    it('should summarise an uploaded month', async () => {
      await upload();

      const response = await request(app).get('/api/uploads/2025/7/summary');

      expect(response.status).toBe(200);
      expect(response.body.uploadedBy).toBe('tester');
      expect(response.body.players).toEqual([
        expect.objectContaining({ titleText: 'Wing Commander', mainCharacter: 'Alice', totalPap: 5, status: '合格' }),
      ]);
    });

    it('should answer 404 for a month without data', async () => {
      const response = await request(app).get('/api/uploads/2025/8/summary');

      expect(response.status).toBe(404);
      expect(response.body.error).toMatchObject({ code: 'NOT_FOUND', message: 'No upload for 2025-08' });
    });

    it('should delete a month once', async () => {
      await upload();

      expect((await request(app).delete('/api/uploads/2025/7')).status).toBe(204);
      expect((await request(app).delete('/api/uploads/2025/7')).status).toBe(404);
    });
  });

  describe('reconciliation', () => {
    it('should sweep every upload without a body', async () => {
      const response = await request(app).post('/api/reconciliation/fix-orphans');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ checked: 0, fixed: 0, failed: 0, deleted: 0, pending: 0 });
    });

    it('should sweep one upload', async () => {
      esi.failingNames.add('Alice');
      await upload();
      esi.failingNames.clear();

      const response = await request(app).post('/api/reconciliation/fix-orphans').send({ upload: '2025-07' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ checked: 1, fixed: 1, failed: 0, deleted: 0, pending: 0 });
    });

    it('should validate the upload period', async () => {
      const invalid = await request(app).post('/api/reconciliation/fix-orphans').send({ upload: '2025-13' });
      const missing = await request(app).post('/api/reconciliation/fix-orphans').send({ upload: '2025-08' });

      expect(invalid.status).toBe(400);
      expect(missing.status).toBe(404);
    });
  });
});
