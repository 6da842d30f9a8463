import { Request, Response, NextFunction } from 'express';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';

/**
 * Guards operator endpoints with `VISUALIZATION_API_KEY`. An unset key locks the endpoints.
 */
export function apiKeyAuth(req: Request, res: Response, next: NextFunction): void {
  const expected = (getEnvironment().VISUALIZATION_API_KEY ?? '').trim();
  const provided = (req.header('x-api-key') ?? '').trim();

  if (expected && provided === expected) {
    next();
    return;
  }

  logger.warn('Rejected internal request', {
    path: req.originalUrl,
    reason: expected ? (provided ? 'key mismatch' : 'key missing') : 'no key configured',
  });
  res.status(401).json({ success: false, error: 'Unauthorized' });
}

export default apiKeyAuth;
