import { FastifyPluginAsync } from 'fastify';
import { RedisService } from '../db/redis';

const SERVICE_NAME = 'sender-sweep-service';

export const healthRoutes: FastifyPluginAsync = async (fastify) => {
  // Basic health check
  fastify.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: process.env.npm_package_version || '1.0.0'
    };
  });

  // Detailed health check
  fastify.get('/detailed', async (_, reply) => {
    const redisHealth = await RedisService.getInstance().healthCheck();

    const health = {
      status: redisHealth ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: process.env.npm_package_version || '1.0.0',
      dependencies: {
        redis: redisHealth ? 'ok' : 'error',
      },
      environment: process.env.NODE_ENV || 'development',
    };

    const statusCode = health.status === 'ok' ? 200 : 503;
    return reply.status(statusCode).send(health);
  });

  // Readiness check
  fastify.get('/ready', async (_, reply) => {
    try {
      if (await RedisService.getInstance().healthCheck()) {
        return { status: 'ready' };
      }
      return reply.status(503).send({ status: 'not_ready' });
    } catch (error) {
      fastify.log.error({ error }, 'Readiness check failed');
      return reply.status(503).send({ status: 'not_ready', error: 'Health check failed' });
    }
  });

  // Liveness check
  fastify.get('/live', async () => {
    return { status: 'alive', timestamp: new Date().toISOString() };
  });
};
