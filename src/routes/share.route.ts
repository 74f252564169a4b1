import { Router, Request, Response, RequestHandler } from 'express';
import { SharingService } from '../services/sharing.service.js';
import { idParamSchema, createShareLinkSchema, shareTokenSchema } from '../utils/validate.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import { createAuthenticateMiddleware, currentUser } from '../middleware/auth.middleware.js';
import { sendError } from '../middleware/error.middleware.js';
import { sendFileStream } from './download.js';

export interface ShareRouterDeps {
  sharingService: SharingService;
  logger?: LoggerLike;
  authenticateMiddleware?: RequestHandler;
}

export function createShareRouter({
  sharingService,
  logger: loggerLike = logger,
  authenticateMiddleware = createAuthenticateMiddleware(),
}: ShareRouterDeps): Router {
  const router = Router();
  const log = loggerLike;

  // POST /share/links - Create a public link (requires auth)
  router.post('/links', authenticateMiddleware, async (req: Request, res: Response): Promise<void> => {
    try {
      const validation = createShareLinkSchema.safeParse(req.body);
      if (!validation.success) {
        res.status(400).json({ error: validation.error.errors });
        return;
      }

      const user = currentUser(req);
      const { target, expirationDate } = validation.data;
      const link = await sharingService.createShareLink(user.id, target, expirationDate);
      res.status(201).json(link);
    } catch (error) {
      sendError(res, error, log, 'Failed to create share link');
    }
  });

  // GET /share/links - Links created by the caller (requires auth)
  router.get('/links', authenticateMiddleware, async (req: Request, res: Response): Promise<void> => {
    try {
      const user = currentUser(req);
      res.json(await sharingService.listMyLinks(user.id));
    } catch (error) {
      sendError(res, error, log, 'Failed to list share links');
    }
  });

  // DELETE /share/links/:id - Revoke a link (requires auth)
  router.delete('/links/:id', authenticateMiddleware, async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      const user = currentUser(req);
      await sharingService.revokeShareLink(user.id, params.data.id);
      res.json({ message: 'Share link revoked' });
    } catch (error) {
      sendError(res, error, log, 'Failed to revoke share link');
    }
  });

  // GET /share/:token - Shared item details (PUBLIC)
  router.get('/:token', async (req: Request, res: Response): Promise<void> => {
    try {
      const validation = shareTokenSchema.safeParse(req.params);
      if (!validation.success) {
        res.status(400).json({ error: validation.error.errors });
        return;
      }

      res.json(await sharingService.resolveShareLink(validation.data.token));
    } catch (error) {
      sendError(res, error, log, 'Failed to access share link');
    }
  });

  // GET /share/:token/download - Shared file contents (PUBLIC)
  router.get('/:token/download', async (req: Request, res: Response): Promise<void> => {
    try {
      const validation = shareTokenSchema.safeParse(req.params);
      if (!validation.success) {
        res.status(400).json({ error: validation.error.errors });
        return;
      }

      const { file, stream } = await sharingService.openSharedFile(validation.data.token);
      await sendFileStream(res, file, stream, log);
    } catch (error) {
      sendError(res, error, log, 'Failed to download shared file');
    }
  });

  return router;
}
