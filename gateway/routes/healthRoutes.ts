/**
 * Liveness probe do gateway.
 */

import { FastifyPluginAsync } from 'fastify';

interface HealthResponse {
  status: 'ok';
  timestamp: string;
  uptime: number;
}

const startTime = Date.now();

export const healthRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /health
   * Sempre 200 enquanto o processo responde
   */
  app.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Date.now() - startTime
    };
  });
};
