import { Router, Request, Response, RequestHandler } from 'express';
import { SharingService } from '../services/sharing.service.js';
import { idParamSchema, grantPermissionSchema, targetQuerySchema } from '../utils/validate.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import { createAuthenticateMiddleware, currentUser } from '../middleware/auth.middleware.js';
import { sendError } from '../middleware/error.middleware.js';

export interface PermissionsRouterDeps {
  sharingService: SharingService;
  logger?: LoggerLike;
  authenticateMiddleware?: RequestHandler;
}

export function createPermissionsRouter({
  sharingService,
  logger: loggerLike = logger,
  authenticateMiddleware = createAuthenticateMiddleware(),
}: PermissionsRouterDeps): Router {
  const router = Router();
  const log = loggerLike;

  router.use(authenticateMiddleware);

  // POST /permissions/grant
  router.post('/grant', async (req: Request, res: Response): Promise<void> => {
    try {
      const validation = grantPermissionSchema.safeParse(req.body);
      if (!validation.success) {
        res.status(400).json({ error: validation.error.errors });
        return;
      }

      const user = currentUser(req);
      const { userId, accessLevel, target } = validation.data;
      const grant = await sharingService.grantPermission(user.id, userId, target, accessLevel);
      res.status(201).json(grant);
    } catch (error) {
      sendError(res, error, log, 'Failed to grant permission');
    }
  });

  // GET /permissions/shared-with-me
  router.get('/shared-with-me', async (req: Request, res: Response): Promise<void> => {
    try {
      const user = currentUser(req);
      res.json(await sharingService.listSharedWithMe(user.id));
    } catch (error) {
      sendError(res, error, log, 'Failed to list shared items');
    }
  });

  // GET /permissions?fileId= | ?folderId=
  router.get('/', async (req: Request, res: Response): Promise<void> => {
    try {
      const validation = targetQuerySchema.safeParse(req.query);
      if (!validation.success) {
        res.status(400).json({ error: validation.error.errors });
        return;
      }

      const user = currentUser(req);
      res.json(await sharingService.listGrants(user.id, validation.data));
    } catch (error) {
      sendError(res, error, log, 'Failed to list permissions');
    }
  });

  // DELETE /permissions/:id
  router.delete('/:id', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      const user = currentUser(req);
      await sharingService.revokePermission(user.id, params.data.id);
      res.json({ message: 'Permission revoked' });
    } catch (error) {
      sendError(res, error, log, 'Failed to revoke permission');
    }
  });

  return router;
}
