import { Readable } from 'stream';
import {
  S3Client,
  PutObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  NotFound,
  NoSuchKey,
} from '@aws-sdk/client-s3';
import { randomUUID } from 'crypto';
import path from 'path';
import type { S3Settings } from '../config.js';
import { notFound } from '../utils/errors.js';
import { logger, type LoggerLike } from '../utils/logger.js';

/**
 * Byte storage for file contents. Handles are opaque to the rest of the
 * service.
 */
export interface BlobStorage {
  save(buffer: Buffer, suggestedName: string, mime: string): Promise<string>;
  read(handle: string): Promise<Readable>;
  /** Deleting a handle whose bytes are already gone is a no-op. */
  delete(handle: string): Promise<void>;
}

/** `<uuid>_<basename>`, keeping only characters safe for object keys and file names. */
export function blobKeyFor(suggestedName: string): string {
  const base = path.basename(suggestedName).replace(/[^a-zA-Z0-9._-]/g, '_') || 'file';
  return `${randomUUID()}_${base}`;
}

export class S3BlobStorage implements BlobStorage {
  private s3Client: S3Client;
  private bucket: string;
  private log: LoggerLike;

  constructor(settings: S3Settings | null, log: LoggerLike = logger) {
    if (!settings) {
      throw new Error('Missing required B2 environment variables');
    }

    this.log = log;
    this.bucket = settings.bucket;
    this.s3Client = new S3Client({
      endpoint: settings.endpoint,
      region: settings.region,
      credentials: {
        accessKeyId: settings.keyId,
        secretAccessKey: settings.appKey,
      },
    });

    this.log.info({ bucket: settings.bucket, region: settings.region }, 'Storage service initialized');
  }

  async save(buffer: Buffer, suggestedName: string, mime: string): Promise<string> {
    const key = blobKeyFor(suggestedName);
    const command = new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      Body: buffer,
      ContentType: mime,
    });

    await this.s3Client.send(command);
    this.log.info({ key, mime, size: buffer.length }, 'File uploaded to B2');
    return key;
  }

  async read(handle: string): Promise<Readable> {
    try {
      const response = await this.s3Client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: handle })
      );
      if (response.Body instanceof Readable) {
        return response.Body;
      }
      throw new Error(`Unexpected body type for object ${handle}`);
    } catch (error) {
      if (error instanceof NoSuchKey) {
        throw notFound('File contents are missing from storage');
      }
      throw error;
    }
  }

  async delete(handle: string): Promise<void> {
    try {
      await this.s3Client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: handle }));
    } catch (error) {
      if (error instanceof NotFound || error instanceof NoSuchKey) {
        this.log.warn({ key: handle }, 'Blob already absent, nothing to delete');
        return;
      }
      throw error;
    }

    await this.s3Client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: handle }));
    this.log.info({ key: handle }, 'File deleted from B2');
  }
}
