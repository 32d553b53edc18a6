import { logger as getLogger } from '../../shared/logger.js';
import { CreationFailedError, PreviewError, ValidationError } from '../preview/errors.js';
import type { Response } from 'express';

const logger = getLogger();

/**
 * Map an error raised by the orchestrator onto its HTTP response
 */
export function sendError(res: Response, err: unknown, action: string): void {
  if (err instanceof ValidationError) {
    res.status(err.httpStatus).json(
      err.details.length > 0 ? { error: err.message, details: err.details } : { error: err.message },
    );
    return;
  }

  if (err instanceof CreationFailedError) {
    logger.error(`Failed to ${action}`, { previewId: err.previewId, rolledBack: err.rolledBack, err: err.message });
    res.status(err.httpStatus).json({
      error: err.message,
      preview_id: err.previewId,
      rolled_back: err.rolledBack,
    });
    return;
  }

  if (err instanceof PreviewError && err.httpStatus < 500) {
    res.status(err.httpStatus).json({ error: err.message });
    return;
  }

  logger.error(`Failed to ${action}`, { err: err instanceof Error ? err.message : String(err) });
  res.status(500).json({ error: `Failed to ${action}` });
}
