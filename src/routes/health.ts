import { Router, Request, Response } from 'express';
import { HealthResponse } from '../types';

export function createHealthRouter(serviceName: string): Router {
  const router = Router();

  /**
   * GET /health
   * Health check endpoint
   */
  router.get('/health', (_req: Request, res: Response) => {
    const response: HealthResponse = {
      status: 'ok',
      service: serviceName,
      timestamp: new Date().toISOString()
    };
    res.json(response);
  });

  return router;
}
