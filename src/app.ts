import './config.js';
import 'reflect-metadata';
import express, { Application, Request, Response, NextFunction } from 'express';
import pinoHttp from 'pino-http';
import type { Logger } from 'pino';
import path from 'path';
import fs from 'fs';
import type { DataSource } from 'typeorm';
import { config, getS3Settings } from './config.js';
import { logger, type LoggerLike } from './utils/logger.js';
import { AppDataSource } from './data-source.js';
import { createAuthenticateMiddleware } from './middleware/auth.middleware.js';
import { createErrorHandler } from './middleware/error.middleware.js';
import { AccessService } from './services/access.service.js';
import { AdminService } from './services/admin.service.js';
import { AuthService } from './services/auth.service.js';
import { QuotaService } from './services/quota.service.js';
import { SharingService } from './services/sharing.service.js';
import { TreeService } from './services/tree.service.js';
import { S3BlobStorage, type BlobStorage } from './services/storage.service.js';
import { DiskBlobStorage } from './services/disk-storage.service.js';
import { createAuthRouter } from './routes/auth.route.js';
import { createFoldersRouter } from './routes/folders.route.js';
import { createFilesRouter } from './routes/files.route.js';
import { createDriveRouter } from './routes/drive.route.js';
import { createPermissionsRouter } from './routes/permissions.route.js';
import { createShareRouter } from './routes/share.route.js';
import { createAdminRouter } from './routes/admin.route.js';

export interface AppDeps {
  dataSource?: DataSource;
  blobStorage?: BlobStorage;
  /** Receives service logs and the per-request lines. */
  logger?: Logger;
  jwtSecret?: string;
  maxUploadBytes?: number;
}

export function createBlobStorage(log: LoggerLike = logger): BlobStorage {
  if (config.STORAGE_DRIVER === 's3') {
    return new S3BlobStorage(getS3Settings(config), log);
  }
  return new DiskBlobStorage(config.STORAGE_PATH, log);
}

export async function createApp(deps: AppDeps = {}): Promise<Application> {
  const app = express();
  const dataSource = deps.dataSource ?? AppDataSource;
  const log = deps.logger ?? logger;
  const blobStorage = deps.blobStorage ?? createBlobStorage(log);

  const accessService = new AccessService({ dataSource, logger: log });
  const quotaService = new QuotaService({ dataSource, logger: log });
  const authService = new AuthService({ dataSource, logger: log, jwtSecret: deps.jwtSecret });
  const treeService = new TreeService({ dataSource, accessService, quotaService, blobStorage, logger: log });
  const sharingService = new SharingService({ dataSource, accessService, blobStorage, logger: log });
  const adminService = new AdminService({ dataSource, authService, quotaService, logger: log });
  const authenticateMiddleware = createAuthenticateMiddleware({ dataSource, authService, logger: log });

  // Middleware
  const defaultOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'];
  const envOrigins = config.CORS_ORIGINS.split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  const allowedOrigins = envOrigins.length ? envOrigins : defaultOrigins;

  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (origin && allowedOrigins.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
    }
    // Ensure caches vary by Origin
    res.setHeader('Vary', 'Origin');
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,PUT,DELETE,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Access-Control-Allow-Credentials', 'true');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  app.use(pinoHttp({ logger: log }));

  // Routes
  app.use('/auth', createAuthRouter({ authService, quotaService, logger: log, authenticateMiddleware }));
  app.use('/folders', createFoldersRouter({ treeService, logger: log, authenticateMiddleware }));
  app.use(
    '/files',
    createFilesRouter({ treeService, logger: log, authenticateMiddleware, maxUploadBytes: deps.maxUploadBytes })
  );
  app.use('/drive', createDriveRouter({ treeService, logger: log, authenticateMiddleware }));
  app.use('/permissions', createPermissionsRouter({ sharingService, logger: log, authenticateMiddleware }));
  app.use('/share', createShareRouter({ sharingService, logger: log, authenticateMiddleware }));
  app.use('/admin', createAdminRouter({ adminService, logger: log, authenticateMiddleware }));

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createErrorHandler(log));

  return app;
}

export async function initializeDatabase(): Promise<void> {
  // Ensure data directory exists
  const dataDir = path.dirname(path.resolve(config.DATABASE_PATH));
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
    logger.info({ dataDir }, 'Created data directory');
  }

  await AppDataSource.initialize();
  logger.info('Database initialized');
}
