import type { Response } from 'express';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { FileView } from '../services/tree.service.js';
import type { LoggerLike } from '../utils/logger.js';

/** Streams blob bytes as an attachment named after the file. */
export async function sendFileStream(
  res: Response,
  file: FileView,
  stream: Readable,
  log: LoggerLike
): Promise<void> {
  res.attachment(file.name);
  res.setHeader('Content-Type', file.mime || 'application/octet-stream');
  res.setHeader('Content-Length', String(file.size));

  try {
    await pipeline(stream, res);
  } catch (error) {
    log.error({ error, fileId: file.id }, 'File stream interrupted');
    if (!res.headersSent) {
      res.removeHeader('Content-Disposition');
      res.removeHeader('Content-Length');
      res.status(500).json({ error: 'Failed to read file contents' });
      return;
    }
    res.destroy();
  }
}
