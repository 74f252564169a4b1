import { Router, Request, Response, RequestHandler } from 'express';
import { AuthService } from '../services/auth.service.js';
import { QuotaService } from '../services/quota.service.js';
import { registerSchema, loginSchema } from '../utils/validate.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import { createAuthenticateMiddleware, currentUser } from '../middleware/auth.middleware.js';
import { sendError } from '../middleware/error.middleware.js';

export interface AuthRouterDeps {
  authService?: AuthService;
  quotaService?: QuotaService;
  logger?: LoggerLike;
  authenticateMiddleware?: RequestHandler;
}

export function createAuthRouter({
  authService = new AuthService(),
  quotaService = new QuotaService(),
  logger: loggerLike = logger,
  authenticateMiddleware = createAuthenticateMiddleware({ authService }),
}: AuthRouterDeps = {}): Router {
  const router = Router();
  const log = loggerLike;

  // POST /auth/register
  router.post('/register', async (req: Request, res: Response): Promise<void> => {
    try {
      const validation = registerSchema.safeParse(req.body);
      if (!validation.success) {
        res.status(400).json({ error: validation.error.errors });
        return;
      }

      const { username, password } = validation.data;
      const user = await authService.register(username, password);

      res.status(201).json({
        message: user.isActive
          ? 'User registered successfully'
          : 'User registered successfully. An administrator must activate the account.',
        user,
      });
    } catch (error) {
      sendError(res, error, log, 'Failed to register user');
    }
  });

  // POST /auth/login
  router.post('/login', async (req: Request, res: Response): Promise<void> => {
    try {
      const validation = loginSchema.safeParse(req.body);
      if (!validation.success) {
        res.status(400).json({ error: validation.error.errors });
        return;
      }

      const { username, password } = validation.data;
      res.json(await authService.login(username, password));
    } catch (error) {
      sendError(res, error, log, 'Failed to log in');
    }
  });

  // GET /auth/me
  router.get('/me', authenticateMiddleware, async (req: Request, res: Response): Promise<void> => {
    try {
      const user = currentUser(req);
      const usage = await quotaService.getUsage(user.id);
      res.json({ ...user, ...usage });
    } catch (error) {
      sendError(res, error, log, 'Failed to load profile');
    }
  });

  return router;
}
