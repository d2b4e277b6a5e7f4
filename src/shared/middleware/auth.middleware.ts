/**
 * =============================================================================
 * AUTH MIDDLEWARE
 * =============================================================================
 *
 * Authentication and authorization middleware.
 *
 * Tokens are issued by the account service; this layer only verifies them and
 * turns their claims into an explicit CallerContext that every booking and
 * matching call receives.
 *
 * SECURITY:
 * - Token validation on every request
 * - Role-based access control
 * - No trust by default
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import jwt, { SignOptions } from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../../config/environment';
import { CallerRole, ErrorCode } from '../../core/constants';
import { AppError, ForbiddenError, UnauthorizedError } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';

/**
 * Who is calling, and in which role
 */
export interface CallerContext {
  role: CallerRole;
  id: string;
}

const tokenClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.nativeEnum(CallerRole)
});

/**
 * Extended Request type with caller info
 */
declare global {
  namespace Express {
    interface Request {
      caller?: CallerContext;
    }
  }
}

/**
 * Sign a caller token (seed script, tests)
 */
export function signCallerToken(caller: CallerContext, expiresIn: SignOptions['expiresIn'] = '1h'): string {
  return jwt.sign({ role: caller.role }, config.jwt.secret, { subject: caller.id, expiresIn });
}

/**
 * Verify a bearer token and return its caller
 */
export function verifyCallerToken(token: string): CallerContext {
  const decoded = jwt.verify(token, config.jwt.secret);
  const claims = tokenClaimsSchema.safeParse(decoded);
  if (!claims.success) {
    throw new UnauthorizedError('Token is missing caller claims', ErrorCode.AUTH_TOKEN_INVALID);
  }
  return { id: claims.data.sub, role: claims.data.role };
}

/**
 * Auth middleware - validates JWT token
 * Must be applied to all protected routes
 */
export function authMiddleware(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new UnauthorizedError();
    }

    req.caller = verifyCallerToken(authHeader.substring(7));
    next();
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      next(new UnauthorizedError('Token has expired', ErrorCode.AUTH_TOKEN_EXPIRED));
    } else if (error instanceof jwt.JsonWebTokenError) {
      next(new UnauthorizedError('Invalid token', ErrorCode.AUTH_TOKEN_INVALID));
    } else if (error instanceof AppError) {
      next(error);
    } else {
      logger.error('Auth middleware error', { error: error instanceof Error ? error.message : String(error) });
      next(new UnauthorizedError('Authentication failed'));
    }
  }
}

/**
 * Role guard - restricts access to specific roles
 * Must be used after authMiddleware
 *
 * @param allowedRoles - Roles that can access the route
 */
export function roleGuard(allowedRoles: CallerRole[]) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.caller) {
      next(new UnauthorizedError());
      return;
    }

    if (!allowedRoles.includes(req.caller.role)) {
      logger.warn('Access denied - insufficient role', {
        callerId: req.caller.id,
        role: req.caller.role,
        requiredRoles: allowedRoles,
        path: req.path
      });
      next(new ForbiddenError());
      return;
    }

    next();
  };
}

/**
 * Caller of an authenticated request
 */
export function requireCaller(req: Request): CallerContext {
  if (!req.caller) {
    throw new UnauthorizedError();
  }
  return req.caller;
}
