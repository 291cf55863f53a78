/**
 * Health check route.
 */

import type { Request, Response } from 'express';

const startedAt = Date.now();

export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
    timestamp: new Date().toISOString(),
  });
}
