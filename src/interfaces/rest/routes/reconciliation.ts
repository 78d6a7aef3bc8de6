import express, { Request, Response, Router } from 'express';
import { z } from 'zod';
import { ServiceContainer } from '../../../application/ServiceContainer';
import { SweepScope } from '../../../services/reconciliation';
import { NotFoundError, ValidationError } from '../../../shared/errors';
import { formatPeriod, parsePeriod } from '../../../shared/utilities/period';
import { asyncHandler } from '../middleware/error-handler';

const FixOrphansBodySchema = z
  .object({
    /** `YYYY-MM`; every upload when absent */
    upload: z.string().optional(),
  })
  .default({});

export function reconciliationRoutes(container: ServiceContainer): Router {
  const router = Router();

  /**
   * POST /api/reconciliation/fix-orphans
   * Sweep placeholders of one upload, or of all uploads
   */
  router.post(
    '/fix-orphans',
    express.json(),
    asyncHandler(async (req: Request, res: Response) => {
      const body = FixOrphansBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        throw ValidationError.fromZodError(body.error);
      }

      let scope: SweepScope = 'all';
      if (body.data.upload !== undefined) {
        const period = parsePeriod(body.data.upload);
        if (!period) {
          throw ValidationError.invalidFormat('upload', 'YYYY-MM month', body.data.upload);
        }
        const upload = container.uploads.findUpload(period.year, period.month);
        if (!upload) {
          throw new NotFoundError(`No upload for ${formatPeriod(period)}`, { ...period });
        }
        scope = { uploadId: upload.id };
      }

      res.json(await container.sweeper.fixOrphans(scope));
    })
  );

  return router;
}
