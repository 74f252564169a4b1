import { Router, Request, Response, RequestHandler } from 'express';
import { TreeService } from '../services/tree.service.js';
import { searchQuerySchema } from '../utils/validate.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import { createAuthenticateMiddleware, currentUser } from '../middleware/auth.middleware.js';
import { sendError } from '../middleware/error.middleware.js';

export interface DriveRouterDeps {
  treeService: TreeService;
  logger?: LoggerLike;
  authenticateMiddleware?: RequestHandler;
}

export function createDriveRouter({
  treeService,
  logger: loggerLike = logger,
  authenticateMiddleware = createAuthenticateMiddleware(),
}: DriveRouterDeps): Router {
  const router = Router();
  const log = loggerLike;

  router.use(authenticateMiddleware);

  // GET /drive/search?q=
  router.get('/search', async (req: Request, res: Response): Promise<void> => {
    try {
      const validation = searchQuerySchema.safeParse(req.query);
      if (!validation.success) {
        res.status(400).json({ error: validation.error.errors });
        return;
      }

      const user = currentUser(req);
      res.json(await treeService.search(user.id, validation.data.q));
    } catch (error) {
      sendError(res, error, log, 'Failed to search');
    }
  });

  // GET /drive/trash
  router.get('/trash', async (req: Request, res: Response): Promise<void> => {
    try {
      const user = currentUser(req);
      res.json(await treeService.listTrash(user.id));
    } catch (error) {
      sendError(res, error, log, 'Failed to list trash');
    }
  });

  return router;
}
