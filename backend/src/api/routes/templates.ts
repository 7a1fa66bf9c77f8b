import { Router } from 'express';
import { MatchRequestSchema } from '@template-extract/shared/schemas/extractionResult.zod';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import { summarizeTemplate } from '../../models/Template';
import type { EngineServices } from '../../services/EngineServices';
import { StoreEmptyError } from '../../utils/errors';

const HTTP_STATUS_NOT_FOUND = 404;
const HTTP_STATUS_UNPROCESSABLE_ENTITY = 422;

export function createTemplatesRouter(services: EngineServices): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const store = services.registry.current();
      const locale = typeof req.query.locale === 'string' ? req.query.locale : null;
      const genericOnly = req.query.generic === 'true';
      const templates = genericOnly
        ? store.getGenericTemplates(locale)
        : locale
          ? store.getCandidates(locale)
          : store.getAll();

      res.json({
        version: store.version,
        locales: store.getLocales(),
        templates: templates.map(summarizeTemplate),
        load_errors: services.registry.getLastErrors(),
      });
    })
  );

  // Template ids may contain slashes, e.g. locales/pl/invoice
  router.get(
    '/*',
    asyncHandler(async (req, res) => {
      const id = req.params[0];
      const template = services.registry.current().getTemplate(id);
      if (!template) {
        throw new AppError(HTTP_STATUS_NOT_FOUND, `Template not found: ${id}`);
      }
      res.json(summarizeTemplate(template));
    })
  );

  router.post(
    '/match',
    asyncHandler(async (req, res) => {
      const body = MatchRequestSchema.parse(req.body);
      const store = services.registry.current();
      const ranking = services.matcher.rank(body.text, body.locale ?? null, store);

      res.json({
        store_version: store.version,
        winner: services.matcher.match(body.text, body.locale ?? null, store),
        ranking: ranking.map((entry) => entry.candidate),
      });
    })
  );

  router.post(
    '/reload',
    asyncHandler(async (req, res) => {
      try {
        const summary = await services.registry.reload();
        res.json(summary);
      } catch (err) {
        if (err instanceof StoreEmptyError) {
          res.status(HTTP_STATUS_UNPROCESSABLE_ENTITY).json({
            error: 'Reload failed',
            message: err.message,
            details: err.errors,
            active_version: services.registry.hasStore() ? services.registry.current().version : null,
          });
          return;
        }
        throw err;
      }
    })
  );

  return router;
}
