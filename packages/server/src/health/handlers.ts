import type { Request, Response } from 'express';

export function handleRoot(_req: Request, res: Response): void {
  res.status(200).json({ status: 'OMP reference server running' });
}

export function handleHealth(_req: Request, res: Response): void {
  res.status(200).json({
    status: 'ok',
    timestamp: new Date().toISOString(),
  });
}
