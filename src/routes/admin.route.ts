import { Router, Request, Response, RequestHandler } from 'express';
import { AdminService } from '../services/admin.service.js';
import { idParamSchema, updateStorageSchema, resetPasswordSchema } from '../utils/validate.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import { createAuthenticateMiddleware, requireAdmin } from '../middleware/auth.middleware.js';
import { sendError } from '../middleware/error.middleware.js';

export interface AdminRouterDeps {
  adminService: AdminService;
  logger?: LoggerLike;
  authenticateMiddleware?: RequestHandler;
}

export function createAdminRouter({
  adminService,
  logger: loggerLike = logger,
  authenticateMiddleware = createAuthenticateMiddleware(),
}: AdminRouterDeps): Router {
  const router = Router();
  const log = loggerLike;

  router.use(authenticateMiddleware, requireAdmin);

  // GET /admin/users
  router.get('/users', async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json(await adminService.listUsers());
    } catch (error) {
      sendError(res, error, log, 'Failed to list users');
    }
  });

  // PUT /admin/users/:id/activate
  router.put('/users/:id/activate', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      res.json(await adminService.activateUser(params.data.id));
    } catch (error) {
      sendError(res, error, log, 'Failed to activate user');
    }
  });

  // PUT /admin/users/:id/lock
  router.put('/users/:id/lock', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      res.json(await adminService.lockUser(params.data.id));
    } catch (error) {
      sendError(res, error, log, 'Failed to lock user');
    }
  });

  // PUT /admin/users/:id/storage
  router.put('/users/:id/storage', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      const validation = updateStorageSchema.safeParse(req.body);
      if (!params.success || !validation.success) {
        res.status(400).json({
          error: [...(params.error?.errors ?? []), ...(validation.error?.errors ?? [])],
        });
        return;
      }

      res.json(await adminService.updateStorageLimit(params.data.id, validation.data.newLimit));
    } catch (error) {
      sendError(res, error, log, 'Failed to update storage limit');
    }
  });

  // PUT /admin/users/:id/reset-password
  router.put('/users/:id/reset-password', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      const validation = resetPasswordSchema.safeParse(req.body);
      if (!params.success || !validation.success) {
        res.status(400).json({
          error: [...(params.error?.errors ?? []), ...(validation.error?.errors ?? [])],
        });
        return;
      }

      await adminService.resetPassword(params.data.id, validation.data.newPassword);
      res.json({ message: 'Password reset' });
    } catch (error) {
      sendError(res, error, log, 'Failed to reset password');
    }
  });

  // POST /admin/users/:id/reconcile-storage
  router.post('/users/:id/reconcile-storage', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      res.json(await adminService.reconcileStorage(params.data.id));
    } catch (error) {
      sendError(res, error, log, 'Failed to reconcile storage');
    }
  });

  return router;
}
