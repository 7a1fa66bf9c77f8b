import { Router } from 'express';
import { ExtractRequestSchema } from '@template-extract/shared/schemas/extractionResult.zod';
import { asyncHandler } from '../middleware/errorHandler';
import type { EngineServices } from '../../services/EngineServices';
import type { FingerprintRecord } from '../../services/duplicates/FingerprintStore';

export function createExtractRouter(services: EngineServices): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = ExtractRequestSchema.parse(req.body);

      const processed = services.processor.process({
        text: body.text,
        locale: body.locale ?? null,
        templateId: body.template_id ?? null,
      });

      let duplicates: FingerprintRecord[] = [];
      if (processed.result && processed.fingerprint?.status === 'complete') {
        const recorded = await services.fingerprintStore.record(
          processed.fingerprint,
          processed.result.template_id,
          body.document_ref ?? null
        );
        duplicates = recorded.duplicates;
      }

      res.json({ ...processed, duplicates });
    })
  );

  return router;
}
