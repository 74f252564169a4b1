import { config } from './config.js';
import { createApp, initializeDatabase } from './app.js';
import { logger } from './utils/logger.js';

const PORT = config.PORT;

async function startServer(): Promise<void> {
  try {
    // Initialize database
    await initializeDatabase();

    // Create and start Express app
    const app = await createApp();

    app.listen(PORT, () => {
      logger.info({ port: PORT }, `Server running on http://localhost:${PORT}`);
      logger.info('Available endpoints:');
      logger.info('  GET  /health');
      logger.info('  POST /auth/register | /auth/login, GET /auth/me');
      logger.info('  GET  /folders/root | /folders/:id, POST /folders');
      logger.info('  POST /files/upload, GET /files/:id/download');
      logger.info('  GET  /drive/search?q= | /drive/trash');
      logger.info('  POST /permissions/grant, GET /permissions/shared-with-me');
      logger.info('  POST /share/links, GET /share/:token');
      logger.info('  GET  /admin/users');
    });
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

void startServer();
