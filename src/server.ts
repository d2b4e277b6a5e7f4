/**
 * =============================================================================
 * HOME SERVICES MARKETPLACE BACKEND - MAIN SERVER
 * =============================================================================
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ PROVIDER   │ Categories, provider profiles, offerings, availability    │
 * │ ADDRESS    │ Customer/provider addresses, geocoding                    │
 * │ MATCHING   │ Ranked providers for a category request                   │
 * │ BOOKING    │ Booking lifecycle: create, confirm+pay, cancel, complete  │
 * │ RATING     │ One rating per completed booking, provider averages       │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * SECURITY:
 * - JWT authentication (tokens issued by the account service)
 * - Role-based access control (CUSTOMER, PROVIDER)
 * - Input validation using Zod schemas
 * - Rate limiting per IP, plus per customer on ratings
 * - Helmet security headers
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';

import { config } from './config/environment';
import { logger } from './shared/services/logger.service';
import { redisService } from './shared/services/redis.service';
import { db } from './shared/database/db';
import { API_PREFIX } from './core/constants';

// Middleware
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { rateLimiter } from './shared/middleware/rate-limiter.middleware';
import { requestIdMiddleware, securityHeaders } from './shared/middleware/security.middleware';

// Routes
import { healthRoutes } from './shared/routes/health.routes';
import { providerRouter } from './modules/provider/provider.routes';
import { addressRouter } from './modules/address/address.routes';
import { matchingRouter } from './modules/matching/matching.routes';
import { bookingRouter } from './modules/booking/booking.routes';
import { ratingRouter } from './modules/rating/rating.routes';

/**
 * Build the Express app (no listening, no connections)
 */
export function createApp(): Express {
  const app = express();

  // Required for per-IP rate limiting behind a load balancer
  app.set('trust proxy', 1);

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({ threshold: 1024 }));
  app.use(securityHeaders);
  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST', 'PATCH', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    maxAge: 86400
  }));

  app.use(express.json({ limit: '100kb' }));
  app.use(requestLogger);

  // Health (no auth, not rate limited)
  app.use('/', healthRoutes);

  app.use('/api', rateLimiter);

  app.use(`${API_PREFIX}/matching`, matchingRouter);
  app.use(`${API_PREFIX}/addresses`, addressRouter);
  app.use(`${API_PREFIX}/bookings`, bookingRouter);
  app.use(API_PREFIX, ratingRouter);
  app.use(API_PREFIX, providerRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Connect dependencies and listen
 */
export async function startServer(): Promise<void> {
  await redisService.initialize({
    enabled: config.redis.enabled,
    url: config.redis.url,
    isProduction: config.isProduction
  });

  const app = createApp();
  const server = app.listen(config.port, config.host, () => {
    logger.info(`Server started on http://${config.host}:${config.port}`, {
      environment: config.nodeEnv,
      redis: redisService.isRedisEnabled() ? 'redis' : 'memory',
      ...db.getStats()
    });
  });

  server.keepAliveTimeout = 65000;
  server.headersTimeout = 66000;

  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received. Starting graceful shutdown...`);

    server.close(() => {
      db.flush();
      redisService.disconnect()
        .then(() => logger.info('Redis connection closed'))
        .catch((err: unknown) => logger.error('Error closing Redis connection', {
          error: err instanceof Error ? err.message : String(err)
        }))
        .finally(() => {
          logger.info('Graceful shutdown complete');
          process.exit(0);
        });
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
    process.exit(1);
  });

  startServer().catch((error: unknown) => {
    logger.error('Server failed to start', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
