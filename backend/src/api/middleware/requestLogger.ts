import { Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger';

const HTTP_CLIENT_ERROR = 400;
const HTTP_SERVER_ERROR = 500;
const QUIET_PATHS = new Set(['/api/health']);

/**
 * One line per finished request. Health checks go to debug, client errors to
 * warn and server errors to error.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();
  const route = `${req.method} ${req.originalUrl}`;

  res.on('finish', () => {
    const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    const line = `${route} ${res.statusCode} ${elapsedMs.toFixed(1)}ms`;

    if (res.statusCode >= HTTP_SERVER_ERROR) {
      logger.error(line);
    } else if (res.statusCode >= HTTP_CLIENT_ERROR) {
      logger.warn(line);
    } else if (QUIET_PATHS.has(req.path)) {
      logger.debug(line);
    } else {
      logger.info(line);
    }
  });

  next();
}
