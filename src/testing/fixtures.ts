import 'reflect-metadata';
import { Readable } from 'stream';
import { jest } from '@jest/globals';
import pino, { type Logger } from 'pino';
import { DataSource } from 'typeorm';
import { entities } from '../data-source.js';
import { UserEntity } from '../entities/UserEntity.js';
import { FolderEntity } from '../entities/FolderEntity.js';
import { FileEntity } from '../entities/FileEntity.js';
import { PermissionEntity, permissionColumns } from '../entities/PermissionEntity.js';
import { ROOT_FOLDER_NAME } from '../services/auth.service.js';
import type { BlobStorage } from '../services/storage.service.js';
import { notFound } from '../utils/errors.js';
import type { GrantableLevel, Role, TargetRef } from '../types/access.js';

export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'sqlite',
    database: ':memory:',
    dropSchema: true,
    entities,
    synchronize: true,
  });
  await dataSource.initialize();
  return dataSource;
}

export function createLoggerStub() {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

export interface LogEntry {
  msg?: string;
  req?: { method?: string; url?: string };
  res?: { statusCode?: number };
}

/** A real pino logger whose JSON lines are kept in `entries`. */
export function createCapturingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = pino({ base: undefined }, {
    write: (line: string) => {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

/** In-memory BlobStorage whose methods are jest mocks. */
export function createBlobStub() {
  const blobs = new Map<string, Buffer>();
  let counter = 0;

  return {
    blobs,
    save: jest.fn<BlobStorage['save']>(async (buffer, suggestedName) => {
      counter += 1;
      const handle = `blob-${counter}-${suggestedName}`;
      blobs.set(handle, buffer);
      return handle;
    }),
    read: jest.fn<BlobStorage['read']>(async (handle) => {
      const buffer = blobs.get(handle);
      if (!buffer) {
        throw notFound('File contents are missing from storage');
      }
      return Readable.from([buffer]);
    }),
    delete: jest.fn<BlobStorage['delete']>(async (handle) => {
      blobs.delete(handle);
    }),
  };
}

export interface SeedUserOptions {
  role?: Role;
  isActive?: boolean;
  storageLimit?: number;
  usedStorage?: number;
  passwordHash?: string;
}

/** Inserts a user together with their root folder. */
export async function seedUser(
  dataSource: DataSource,
  username: string,
  options: SeedUserOptions = {}
): Promise<{ user: UserEntity; root: FolderEntity }> {
  const manager = dataSource.manager;
  const user = await manager.save(
    manager.create(UserEntity, {
      username,
      passwordHash: options.passwordHash ?? 'not-a-real-hash',
      role: options.role ?? 'User',
      isActive: options.isActive ?? true,
      storageLimit: options.storageLimit ?? 1_000_000,
      usedStorage: options.usedStorage ?? 0,
    })
  );
  const root = await manager.save(
    manager.create(FolderEntity, {
      name: ROOT_FOLDER_NAME,
      ownerId: user.id,
      parentFolderId: null,
      isDeleted: false,
      deletedAt: null,
    })
  );
  return { user, root };
}

export async function seedFolder(
  dataSource: DataSource,
  ownerId: number,
  parentFolderId: number,
  name: string
): Promise<FolderEntity> {
  const manager = dataSource.manager;
  return manager.save(
    manager.create(FolderEntity, { name, ownerId, parentFolderId, isDeleted: false, deletedAt: null })
  );
}

export async function seedFile(
  dataSource: DataSource,
  ownerId: number,
  folderId: number,
  name: string,
  size = 10
): Promise<FileEntity> {
  const manager = dataSource.manager;
  return manager.save(
    manager.create(FileEntity, {
      name,
      extension: name.includes('.') ? name.slice(name.lastIndexOf('.')) : '',
      mime: 'text/plain',
      size,
      physicalPath: `seeded-${name}`,
      folderId,
      ownerId,
      isDeleted: false,
      deletedAt: null,
    })
  );
}

export async function seedGrant(
  dataSource: DataSource,
  userId: number,
  target: TargetRef,
  accessLevel: GrantableLevel
): Promise<PermissionEntity> {
  const manager = dataSource.manager;
  return manager.save(
    manager.create(PermissionEntity, { userId, ...permissionColumns(target), accessLevel })
  );
}
