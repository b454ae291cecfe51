/**
 * Health Check Controller
 */
import type { Request, Response } from 'express';

export function healthCheck(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  });
}
