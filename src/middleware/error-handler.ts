import { NextFunction, Request, Response } from 'express';
import { ConfigError, ResourceError } from '../models/errors';

/**
 * ConfigError -> 400, ResourceError -> 422, anything else -> 500
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ConfigError) {
    console.warn(`[ClockRoutes] ${req.method} ${req.path} rejected: ${err.message}`);
    res.status(400).json({ error: 'Invalid configuration', message: err.message });
    return;
  }

  if (err instanceof ResourceError) {
    console.warn(`[ClockRoutes] ${req.method} ${req.path} missing resource: ${err.path}`);
    res.status(422).json({ error: 'Missing resource', message: err.message, path: err.path });
    return;
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Invalid JSON', message: err.message });
    return;
  }

  console.error('[Server] Error occurred:', err);
  res.status(500).json({
    error: 'Internal Server Error',
    message: err instanceof Error ? err.message : String(err),
  });
}
