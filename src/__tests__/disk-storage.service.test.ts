import fs from 'fs';
import os from 'os';
import path from 'path';
import { DiskBlobStorage } from '../services/disk-storage.service.js';
import { blobKeyFor } from '../services/storage.service.js';
import { createLoggerStub } from '../testing/fixtures.js';

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('DiskBlobStorage', () => {
  let root: string;
  let storage: DiskBlobStorage;

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'blobs-'));
    storage = new DiskBlobStorage(path.join(root, 'nested'), createLoggerStub());
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it('creates its directory and round-trips bytes', async () => {
    const handle = await storage.save(Buffer.from('file body'), 'report.pdf', 'application/pdf');

    expect(fs.existsSync(path.join(root, 'nested', handle))).toBe(true);
    expect(await readAll(await storage.read(handle))).toBe('file body');
  });

  it('treats deleting a missing blob as a no-op', async () => {
    const handle = await storage.save(Buffer.from('x'), 'a.txt', 'text/plain');

    await storage.delete(handle);
    await expect(storage.delete(handle)).resolves.toBeUndefined();
    await expect(storage.read(handle)).rejects.toMatchObject({ kind: 'NotFound' });
  });

  it('refuses handles that leave the storage directory', async () => {
    await expect(storage.read('../outside.txt')).rejects.toThrow('Invalid blob handle: ../outside.txt');
  });
});

describe('blobKeyFor', () => {
  it('keeps a sanitized base name after a unique prefix', () => {
    const key = blobKeyFor('../my report (final).pdf');

    expect(key).toMatch(/^[0-9a-f-]{36}_my_report__final_\.pdf$/);
    expect(blobKeyFor('a.txt')).not.toBe(blobKeyFor('a.txt'));
  });
});
