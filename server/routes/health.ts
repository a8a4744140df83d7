import { Router } from 'express';

export interface HealthInfo {
  integration: string;
  queueDriver: string;
}

export function createHealthRouter(info: HealthInfo): Router {
  const health = Router();

  health.get('/health', (_req, res) => {
    res.json({
      success: true,
      app: {
        status: 'pass',
        build: process.env.GIT_SHA || 'dev',
        integration: info.integration,
        queue: info.queueDriver,
      },
    });
  });

  return health;
}
