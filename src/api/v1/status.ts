import type { FastifyPluginAsync } from 'fastify';
import type { StatusSnapshot } from '../../types/contribution.js';

export interface StatusSource {
  readonly status: StatusSnapshot;
}

export interface StatusRouteOptions {
  service: StatusSource;
}

/**
 * Diagnostic API routes.
 *
 * GET /api/v1/status - Diagnostic snapshot
 * GET /api/v1/status/health - 200 when contributing with a healthy registration
 */
export const statusRoutes: FastifyPluginAsync<StatusRouteOptions> = async (fastify, opts) => {
  fastify.get('/', async () => {
    return opts.service.status;
  });

  /**
   * GET /api/v1/status/health
   *
   * Returns 503 while the service is not running, or has no healthy
   * registration yet.
   */
  fastify.get('/health', async (_request, reply) => {
    const snapshot = opts.service.status;
    const healthy =
      snapshot.lifecycle === 'running' && snapshot.registrationHealth === 'healthy';

    return reply.status(healthy ? 200 : 503).send({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      checks: {
        lifecycle: snapshot.lifecycle,
        registration: snapshot.registrationHealth,
        consecutiveFailures: snapshot.consecutiveFailures,
      },
    });
  });
};
