import { Router, Request, Response, RequestHandler } from 'express';
import multer from 'multer';
import { TreeService } from '../services/tree.service.js';
import { idParamSchema, renameSchema, moveSchema, uploadFieldsSchema } from '../utils/validate.js';
import { config } from '../config.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import { createAuthenticateMiddleware, currentUser } from '../middleware/auth.middleware.js';
import { sendError } from '../middleware/error.middleware.js';
import { sendFileStream } from './download.js';

export interface FilesRouterDeps {
  treeService: TreeService;
  logger?: LoggerLike;
  authenticateMiddleware?: RequestHandler;
  maxUploadBytes?: number;
}

export function createFilesRouter({
  treeService,
  logger: loggerLike = logger,
  authenticateMiddleware = createAuthenticateMiddleware(),
  maxUploadBytes = config.MAX_UPLOAD_BYTES,
}: FilesRouterDeps): Router {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: maxUploadBytes } });
  const log = loggerLike;

  router.use(authenticateMiddleware);

  // POST /files/upload
  router.post(
    '/upload',
    upload.single('file'),
    async (req: Request, res: Response): Promise<void> => {
      try {
        if (!req.file) {
          res.status(400).json({ error: 'No file uploaded' });
          return;
        }

        const validation = uploadFieldsSchema.safeParse(req.body);
        if (!validation.success) {
          res.status(400).json({ error: validation.error.errors });
          return;
        }

        const user = currentUser(req);
        const { originalname, mimetype, buffer } = req.file;
        const file = await treeService.uploadFile(user.id, {
          folderId: validation.data.folderId,
          name: originalname,
          mime: mimetype,
          buffer,
        });

        res.status(201).json(file);
      } catch (error) {
        sendError(res, error, log, 'Failed to upload file');
      }
    }
  );

  // GET /files/:id
  router.get('/:id', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      const user = currentUser(req);
      res.json(await treeService.getFile(user.id, params.data.id));
    } catch (error) {
      sendError(res, error, log, 'Failed to retrieve file details');
    }
  });

  // GET /files/:id/download
  router.get('/:id/download', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      const user = currentUser(req);
      const { file, stream } = await treeService.downloadFile(user.id, params.data.id);
      await sendFileStream(res, file, stream, log);
    } catch (error) {
      sendError(res, error, log, 'Failed to download file');
    }
  });

  // PUT /files/:id/rename
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
      res.json(await treeService.renameFile(user.id, params.data.id, validation.data.name));
    } catch (error) {
      sendError(res, error, log, 'Failed to rename file');
    }
  });

  // PUT /files/:id/move
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
      res.json(await treeService.moveFile(user.id, params.data.id, validation.data.targetFolderId));
    } catch (error) {
      sendError(res, error, log, 'Failed to move file');
    }
  });

  // DELETE /files/:id - move to trash
  router.delete('/:id', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      const user = currentUser(req);
      await treeService.deleteFile(user.id, params.data.id);
      res.json({ message: 'File moved to trash' });
    } catch (error) {
      sendError(res, error, log, 'Failed to delete file');
    }
  });

  // POST /files/:id/restore
  router.post('/:id/restore', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      const user = currentUser(req);
      res.json(await treeService.restoreFile(user.id, params.data.id));
    } catch (error) {
      sendError(res, error, log, 'Failed to restore file');
    }
  });

  // DELETE /files/:id/purge - permanent
  router.delete('/:id/purge', async (req: Request, res: Response): Promise<void> => {
    try {
      const params = idParamSchema.safeParse(req.params);
      if (!params.success) {
        res.status(400).json({ error: params.error.errors });
        return;
      }

      const user = currentUser(req);
      await treeService.purgeFile(user.id, params.data.id);
      res.json({ message: 'File permanently deleted' });
    } catch (error) {
      sendError(res, error, log, 'Failed to purge file');
    }
  });

  return router;
}
