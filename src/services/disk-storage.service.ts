import fs from 'fs';
import { Readable } from 'stream';
import path from 'path';
import { notFound } from '../utils/errors.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import { blobKeyFor, type BlobStorage } from './storage.service.js';

/** Stores blobs as flat files under one directory; the handle is the file name. */
export class DiskBlobStorage implements BlobStorage {
  private readonly root: string;
  private readonly log: LoggerLike;

  constructor(root: string, log: LoggerLike = logger) {
    this.root = path.resolve(root);
    this.log = log;
    if (!fs.existsSync(this.root)) {
      fs.mkdirSync(this.root, { recursive: true });
      this.log.info({ root: this.root }, 'Created blob storage directory');
    }
  }

  private pathFor(handle: string): string {
    if (handle !== path.basename(handle)) {
      throw new Error(`Invalid blob handle: ${handle}`);
    }
    return path.join(this.root, handle);
  }

  async save(buffer: Buffer, suggestedName: string, mime: string): Promise<string> {
    const handle = blobKeyFor(suggestedName);
    await fs.promises.writeFile(this.pathFor(handle), buffer);
    this.log.info({ key: handle, mime, size: buffer.length }, 'File written to disk storage');
    return handle;
  }

  async read(handle: string): Promise<Readable> {
    const fullPath = this.pathFor(handle);
    if (!fs.existsSync(fullPath)) {
      throw notFound('File contents are missing from storage');
    }
    return fs.createReadStream(fullPath);
  }

  async delete(handle: string): Promise<void> {
    await fs.promises.rm(this.pathFor(handle), { force: true });
    this.log.info({ key: handle }, 'File removed from disk storage');
  }
}
