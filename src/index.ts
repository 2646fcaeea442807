import dotenv from 'dotenv';
dotenv.config();

import Fastify from 'fastify';
import cors from '@fastify/cors';
import jwt from '@fastify/jwt';
import pino from 'pino';
import { envSchema, Environment } from './utils/validation';
import { authenticate } from './utils/auth';
import { setupRateLimit } from './middleware/rate-limit';

// Import route handlers
import { authRoutes } from './api/auth';
import { scanRoutes } from './api/scans';
import { healthRoutes } from './api/health';

// Import services
import { RedisService } from './db/redis';
import { GoogleOAuthService } from './auth/google-oauth';

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true
    }
  }
});

const fastify = Fastify({
  logger: true,
  trustProxy: true,
});

const redisService = RedisService.getInstance();
// One token cache for every route that talks to Gmail
const googleOAuth = new GoogleOAuthService(redisService);

async function start() {
  // Validate environment variables
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    logger.error({ issues: result.error.errors }, '❌ Invalid environment variables');
    process.exit(1);
  }
  const env: Environment = result.data;
  logger.info('✅ Environment variables validated');

  try {
    await fastify.register(cors, {
      origin: true,
      credentials: true,
    });

    await fastify.register(jwt, {
      secret: env.JWT_SECRET,
    });
    fastify.decorate('authenticate', authenticate);

    await setupRateLimit(fastify);

    await redisService.connect();

    // Register route handlers
    await fastify.register(healthRoutes, { prefix: '/health' });
    await fastify.register(authRoutes, { prefix: '/auth', googleOAuth });
    await fastify.register(scanRoutes, { prefix: '/api/scans', googleOAuth });

    // Start the server
    const host = env.NODE_ENV === 'production' ? '0.0.0.0' : 'localhost';

    await fastify.listen({ port: env.PORT, host });

    logger.info(`🚀 Sender sweep service running on http://${host}:${env.PORT}`);
    logger.info(`📊 Health check available at http://${host}:${env.PORT}/health`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

// Handle graceful shutdown
async function gracefulShutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down gracefully`);

  try {
    // Close server first to stop accepting new requests
    await fastify.close();
    await redisService.disconnect();

    logger.info('✅ Graceful shutdown complete');
    process.exit(0);
  } catch (err) {
    logger.error({ err }, '❌ Error during shutdown');
    process.exit(1);
  }
}

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

void start();
