import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { statusRoutes } from './api/v1/status.js';
import { createContributionService } from './services/contribution/index.js';
import { redisShutdown, redisHealthCheck } from './db/redis.js';

const fastify = Fastify({
  logger: {
    level: config.LOG_LEVEL,
    transport: config.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
          },
        }
      : undefined,
  },
});

const contribution = createContributionService();

contribution.coordinator.subscribe((snapshot) => {
  logger.debug(
    {
      lifecycle: snapshot.lifecycle,
      outcome: snapshot.lastOutcome,
      depth: snapshot.currentDepth,
      registration: snapshot.registrationHealth,
    },
    'Contribution status updated'
  );
});

async function start() {
  try {
    // Register plugins
    await fastify.register(cors, {
      origin: config.NODE_ENV === 'development' ? true : false,
      methods: ['GET'],
    });

    await fastify.register(rateLimit, {
      max: config.RATE_LIMIT_MAX,
      timeWindow: config.RATE_LIMIT_WINDOW_MS,
    });

    // Register routes
    await fastify.register(statusRoutes, { prefix: '/api/v1/status', service: contribution });

    // Root health check
    fastify.get('/health', async () => {
      const redisOk = await redisHealthCheck();
      const lifecycle = contribution.status.lifecycle;

      return {
        status: redisOk && lifecycle === 'running' ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        checks: {
          redis: redisOk,
          contribution: lifecycle,
        },
      };
    });

    // Ready check (for k8s probes)
    fastify.get('/ready', async () => {
      return { ready: contribution.status.lifecycle === 'running' };
    });

    await contribution.setup();

    const address = await fastify.listen({
      port: config.PORT,
      host: config.HOST,
    });

    logger.info({ address, env: config.NODE_ENV }, 'Trixel contributor started');
  } catch (error) {
    logger.error({ error }, 'Server startup failed');
    process.exit(1);
  }
}

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info({ signal }, 'Shutdown signal received');

  try {
    contribution.unload();
    await fastify.close();
    await redisShutdown();
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during shutdown');
    process.exit(1);
  }
}

// Integration removal: retire the station at the measurement service and exit
async function removeStation() {
  try {
    await contribution.remove();
    await redisShutdown();
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Station removal failed');
    process.exit(1);
  }
}

if (process.argv.includes('--remove')) {
  void removeStation();
} else {
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  void start();
}
