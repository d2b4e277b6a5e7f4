/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * - GET /health       - Quick health check (for load balancers)
 * - GET /health/ready - Readiness: key/value layer reachable, store counts
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { db } from '../database/db';
import { redisService } from '../services/redis.service';
import { config } from '../../config/environment';
import { HTTP_STATUS } from '../../core/constants';

const router = Router();

// Track server start time
const startTime = Date.now();

/**
 * Basic health check - for load balancers
 */
router.get('/health', (_req: Request, res: Response) => {
  res.status(HTTP_STATUS.OK).json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: Math.floor((Date.now() - startTime) / 1000)
  });
});

/**
 * Readiness probe - can it accept traffic?
 */
router.get('/health/ready', (_req: Request, res: Response) => {
  const redisConnected = redisService.isConnected();

  res.status(redisConnected ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE).json({
    status: redisConnected ? 'ready' : 'degraded',
    environment: config.nodeEnv,
    database: db.getStats(),
    redis: {
      connected: redisConnected,
      mode: redisService.isRedisEnabled() ? 'redis' : 'memory'
    }
  });
});

export { router as healthRoutes };
