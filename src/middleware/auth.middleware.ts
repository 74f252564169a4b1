import { Request, Response, NextFunction } from 'express';
import type { DataSource } from 'typeorm';
import { AppDataSource } from '../data-source.js';
import { UserEntity } from '../entities/UserEntity.js';
import { AuthService } from '../services/auth.service.js';
import { unauthorized } from '../utils/errors.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import type { Actor } from '../types/access.js';

// Extend Express Request to include the authenticated user
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: Actor;
    }
  }
}

export interface AuthMiddlewareDeps {
  dataSource?: Pick<DataSource, 'getRepository'>;
  authService?: Pick<AuthService, 'verifyToken'>;
  logger?: LoggerLike;
}

type Middleware = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Middleware to validate a bearer token from the Authorization header.
 * The token's user must still exist and be active.
 */
export function createAuthenticateMiddleware(deps: AuthMiddlewareDeps = {}): Middleware {
  const dataSource = deps.dataSource ?? AppDataSource;
  const authService = deps.authService ?? new AuthService();
  const log: LoggerLike = deps.logger ?? logger;

  return async function authenticate(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const header = req.headers.authorization;

      if (!header || !header.startsWith('Bearer ')) {
        log.warn({ path: req.path }, 'Missing bearer token');
        res.status(401).json({ error: 'Authentication required. Provide a Bearer token.' });
        return;
      }

      const claims = authService.verifyToken(header.slice('Bearer '.length).trim());
      if (!claims) {
        log.warn({ path: req.path }, 'Invalid or expired token');
        res.status(401).json({ error: 'Invalid or expired token' });
        return;
      }

      const userRepo = dataSource.getRepository(UserEntity);
      const user = await userRepo.findOne({ where: { id: claims.userId } });

      if (!user || !user.isActive) {
        log.warn({ path: req.path, userId: claims.userId }, 'Token for unknown or inactive user');
        res.status(401).json({ error: 'Account is not active' });
        return;
      }

      req.user = { id: user.id, username: user.username, role: user.role };
      next();
    } catch (error) {
      log.error({ error }, 'Error validating token');
      res.status(500).json({ error: 'Authentication error' });
    }
  };
}

/** Must run after the authenticate middleware. */
export function requireAdmin(req: Request, res: Response, next: NextFunction): void {
  if (req.user?.role !== 'Admin') {
    res.status(403).json({ error: 'Administrator role required' });
    return;
  }
  next();
}

/**
 * The user attached by the authenticate middleware.
 * @throws AppError Unauthorized when the middleware did not run or failed
 */
export function currentUser(req: Request): Actor {
  if (!req.user) {
    throw unauthorized('Authentication required');
  }
  return req.user;
}
