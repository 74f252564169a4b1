import { Router, Request, Response, RequestHandler } from 'express';
import { TreeService } from '../services/tree.service.js';
import {
  idParamSchema,
  createFolderSchema,
  renameSchema,
  moveSchema,
} from '../utils/validate.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import { createAuthenticateMiddleware, currentUser } from '../middleware/auth.middleware.js';
import { sendError } from '../middleware/error.middleware.js';

export interface FoldersRouterDeps {
  treeService: TreeService;
  logger?: LoggerLike;
  authenticateMiddleware?: RequestHandler;
}

export function createFoldersRouter({
  treeService,
  logger: loggerLike = logger,
  authenticateMiddleware = createAuthenticateMiddleware(),
}: FoldersRouterDeps): Router {
  const router = Router();
  const log = loggerLike;

  router.use(authenticateMiddleware);

  // GET /folders/root
  router.get('/root', async (req: Request, res: Response): Promise<void> => {
    try {
      const user = currentUser(req);
      const root = await treeService.getRootFolder(user.id);
      res.json(await treeService.getFolderContents(user.id, root.id));
    } catch (error) {
      sendError(res, error, log, 'Failed to load root folder');
    }
  });

  // GET /folders/:id
  router.get('/:id', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      const user = currentUser(req);
      res.json(await treeService.getFolderContents(user.id, params.data.id));
    } catch (error) {
      sendError(res, error, log, 'Failed to load folder');
    }
  });

  // POST /folders
  router.post('/', async (req: Request, res: Response): Promise<void> => {
    try {
      const validation = createFolderSchema.safeParse(req.body);
      if (!validation.success) {
        res.status(400).json({ error: validation.error.errors });
        return;
      }

      const user = currentUser(req);
      const { name, parentFolderId } = validation.data;
      res.status(201).json(await treeService.createFolder(user.id, name, parentFolderId));
    } catch (error) {
      sendError(res, error, log, 'Failed to create folder');
    }
  });

  // PUT /folders/:id/rename
  router.put('/:id/rename', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      const validation = renameSchema.safeParse(req.body);
      if (!params.success || !validation.success) {
        res.status(400).json({
          error: [...(params.error?.errors ?? []), ...(validation.error?.errors ?? [])],
        });
        return;
      }

      const user = currentUser(req);
      res.json(await treeService.renameFolder(user.id, params.data.id, validation.data.name));
    } catch (error) {
      sendError(res, error, log, 'Failed to rename folder');
    }
  });

  // PUT /folders/:id/move
  router.put('/:id/move', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      const validation = moveSchema.safeParse(req.body);
      if (!params.success || !validation.success) {
        res.status(400).json({
          error: [...(params.error?.errors ?? []), ...(validation.error?.errors ?? [])],
        });
        return;
      }

      const user = currentUser(req);
      res.json(
        await treeService.moveFolder(user.id, params.data.id, validation.data.targetFolderId)
      );
    } catch (error) {
      sendError(res, error, log, 'Failed to move folder');
    }
  });

  // DELETE /folders/:id - move to trash
  router.delete('/:id', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      const user = currentUser(req);
      const result = await treeService.deleteFolder(user.id, params.data.id);
      res.json({ message: 'Folder moved to trash', ...result });
    } catch (error) {
      sendError(res, error, log, 'Failed to delete folder');
    }
  });

  // POST /folders/:id/restore
  router.post('/:id/restore', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      const user = currentUser(req);
      const result = await treeService.restoreFolder(user.id, params.data.id);
      res.json({ message: 'Folder restored', ...result });
    } catch (error) {
      sendError(res, error, log, 'Failed to restore folder');
    }
  });

  // DELETE /folders/:id/purge - permanent
  router.delete('/:id/purge', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      const user = currentUser(req);
      const result = await treeService.purgeFolder(user.id, params.data.id);
      res.json({ message: 'Folder permanently deleted', ...result });
    } catch (error) {
      sendError(res, error, log, 'Failed to purge folder');
    }
  });

  return router;
}
