import express, { Request, Response, Router } from 'express';
import { z } from 'zod';
import { ServiceContainer } from '../../../application/ServiceContainer';
import { NotFoundError, ValidationError } from '../../../shared/errors';
import { formatPeriod } from '../../../shared/utilities/period';
import { asyncHandler } from '../middleware/error-handler';

const MAX_WORKBOOK_SIZE = '20mb';

const PeriodParamsSchema = z.object({
  year: z.coerce.number().int().min(2000).max(9999),
  month: z.coerce.number().int().min(1).max(12),
});

const UploadQuerySchema = z.object({
  taxRate: z.coerce.number().nonnegative(),
  oreRate: z.coerce.number().nonnegative(),
  by: z.string().trim().min(1),
  overwrite: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform(value => value === 'true' || value === '1'),
});

function periodParams(req: Request): z.infer<typeof PeriodParamsSchema> {
  const parsed = PeriodParamsSchema.safeParse(req.params);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }
  return parsed.data;
}

export function uploadRoutes(container: ServiceContainer): Router {
  const router = Router();

  /**
   * GET /api/uploads
   */
  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(
        container.uploads.listUploads().map(upload => ({
          id: upload.id,
          period: upload.period,
          year: upload.year,
          month: upload.month,
          uploadedAt: upload.uploadedAt,
          uploadedBy: upload.uploadedBy,
          taxRate: upload.taxRate,
          oreConvertRate: upload.oreConvertRate,
        }))
      );
    })
  );

  /**
   * POST /api/uploads/:year/:month
   * Body is the raw workbook
   */
  router.post(
    '/:year/:month',
    express.raw({ type: () => true, limit: MAX_WORKBOOK_SIZE }),
    asyncHandler(async (req: Request, res: Response) => {
      const { year, month } = periodParams(req);
      const query = UploadQuerySchema.safeParse(req.query);
      if (!query.success) {
        throw ValidationError.fromZodError(query.error);
      }

      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        throw ValidationError.fieldRequired('workbook');
      }

      const result = await container.uploads.processUpload({
        workbook: body,
        year,
        month,
        taxRate: query.data.taxRate,
        oreConvertRate: query.data.oreRate,
        uploadedBy: query.data.by,
        overwrite: query.data.overwrite,
      });

      res.status(201).json(result);
    })
  );

  /**
   * GET /api/uploads/:year/:month/summary
   */
  router.get(
    '/:year/:month/summary',
    asyncHandler(async (req: Request, res: Response) => {
      const { year, month } = periodParams(req);
      res.json(container.summaries.getUploadSummary(year, month));
    })
  );

  /**
   * DELETE /api/uploads/:year/:month
   */
  router.delete(
    '/:year/:month',
    asyncHandler(async (req: Request, res: Response) => {
      const { year, month } = periodParams(req);
      if (!container.uploads.deleteUpload(year, month)) {
        throw new NotFoundError(`No upload for ${formatPeriod({ year, month })}`, { year, month });
      }
      res.status(204).end();
    })
  );

  return router;
}
