import path from 'path';
import type { Readable } from 'stream';
import { In, IsNull, type DataSource, type EntityManager } from 'typeorm';
import { AppDataSource } from '../data-source.js';
import { FolderEntity } from '../entities/FolderEntity.js';
import { FileEntity } from '../entities/FileEntity.js';
import { PermissionEntity } from '../entities/PermissionEntity.js';
import { AccessService } from './access.service.js';
import { QuotaService } from './quota.service.js';
import type { BlobStorage } from './storage.service.js';
import { chunk } from '../utils/batch.js';
import { conflict, forbidden, invalidInput, notFound } from '../utils/errors.js';
import { escapeLikeString } from '../utils/validate.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import { fileRef, folderRef, type AccessLevel } from '../types/access.js';

/** Page size for name matches read while filtering search results by access. */
export const SEARCH_SCAN_LIMIT = 500;

const MAX_NAME_LENGTH = 255;

export interface FolderView {
  id: number;
  name: string;
  ownerId: number;
  parentFolderId: number | null;
  isDeleted: boolean;
  deletedAt: Date | null;
  createdAt: Date;
}

export interface FileView {
  id: number;
  name: string;
  extension: string;
  mime: string;
  size: number;
  folderId: number;
  ownerId: number;
  uploadDate: Date;
  isDeleted: boolean;
  deletedAt: Date | null;
}

export type WithAccess<T> = T & { accessLevel: AccessLevel };

export interface FolderContents {
  folder: WithAccess<FolderView>;
  subFolders: WithAccess<FolderView>[];
  files: WithAccess<FileView>[];
}

export interface SearchResults {
  folders: WithAccess<FolderView>[];
  files: WithAccess<FileView>[];
}

export interface TrashContents {
  folders: FolderView[];
  files: FileView[];
}

export interface CascadeResult {
  folders: number;
  files: number;
}

export interface UploadInput {
  folderId?: number | null;
  name: string;
  mime: string;
  buffer: Buffer;
}

export function toFolderView(folder: FolderEntity): FolderView {
  return {
    id: folder.id,
    name: folder.name,
    ownerId: folder.ownerId,
    parentFolderId: folder.parentFolderId,
    isDeleted: folder.isDeleted,
    deletedAt: folder.deletedAt,
    createdAt: folder.createdAt,
  };
}

export function toFileView(file: FileEntity): FileView {
  return {
    id: file.id,
    name: file.name,
    extension: file.extension,
    mime: file.mime,
    size: file.size,
    folderId: file.folderId,
    ownerId: file.ownerId,
    uploadDate: file.uploadDate,
    isDeleted: file.isDeleted,
    deletedAt: file.deletedAt,
  };
}

function cleanName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw invalidInput('Name cannot be empty');
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    throw invalidInput(`Name cannot exceed ${MAX_NAME_LENGTH} characters`);
  }
  return trimmed;
}

function sameInstant(a: Date | null, b: Date | null): boolean {
  return a !== null && b !== null && a.getTime() === b.getTime();
}

export interface TreeServiceDeps {
  dataSource?: Pick<DataSource, 'manager' | 'transaction'>;
  accessService?: AccessService;
  quotaService?: QuotaService;
  blobStorage: BlobStorage;
  logger?: LoggerLike;
}

/**
 * Structural operations on the folder/file tree. Every mutation runs in a
 * single store transaction.
 */
export class TreeService {
  private readonly dataSource: Pick<DataSource, 'manager' | 'transaction'>;
  private readonly access: AccessService;
  private readonly quota: QuotaService;
  private readonly blobs: BlobStorage;
  private readonly log: LoggerLike;

  constructor(deps: TreeServiceDeps) {
    this.dataSource = deps.dataSource ?? AppDataSource;
    this.log = deps.logger ?? logger;
    this.access = deps.accessService ?? new AccessService({ dataSource: this.dataSource, logger: this.log });
    this.quota = deps.quotaService ?? new QuotaService({ dataSource: this.dataSource, logger: this.log });
    this.blobs = deps.blobStorage;
  }

  // ---------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------

  async getRootFolder(userId: number, manager: EntityManager = this.dataSource.manager): Promise<FolderEntity> {
    const root = await manager.findOne(FolderEntity, {
      where: { ownerId: userId, parentFolderId: IsNull() },
    });
    if (!root) {
      throw notFound('Root folder not found');
    }
    return root;
  }

  async getFolderContents(userId: number, folderId: number): Promise<FolderContents> {
    const manager = this.dataSource.manager;
    const folder = await this.loadActiveFolder(manager, folderId);
    const level = await this.access.requireAccess(userId, folderRef(folderId), 'Read');

    const subFolders = await manager.find(FolderEntity, {
      where: { parentFolderId: folderId, isDeleted: false },
      order: { name: 'ASC' },
    });
    const files = await manager.find(FileEntity, {
      where: { folderId, isDeleted: false },
      order: { name: 'ASC' },
    });

    // A child is never less accessible than its parent, but may be more.
    const annotatedFolders: WithAccess<FolderView>[] = [];
    for (const child of subFolders) {
      const childLevel = (await this.access.effectiveAccess(userId, folderRef(child.id))) ?? level;
      annotatedFolders.push({ ...toFolderView(child), accessLevel: childLevel });
    }
    const annotatedFiles: WithAccess<FileView>[] = [];
    for (const file of files) {
      const fileLevel = (await this.access.effectiveAccess(userId, fileRef(file.id))) ?? level;
      annotatedFiles.push({ ...toFileView(file), accessLevel: fileLevel });
    }

    return {
      folder: { ...toFolderView(folder), accessLevel: level },
      subFolders: annotatedFolders,
      files: annotatedFiles,
    };
  }

  async getFile(userId: number, fileId: number): Promise<WithAccess<FileView>> {
    const file = await this.loadActiveFile(this.dataSource.manager, fileId);
    const level = await this.access.requireAccess(userId, fileRef(fileId), 'Read');
    return { ...toFileView(file), accessLevel: level };
  }

  async downloadFile(userId: number, fileId: number): Promise<{ file: FileView; stream: Readable }> {
    const file = await this.loadActiveFile(this.dataSource.manager, fileId);
    await this.access.requireAccess(userId, fileRef(fileId), 'Read');
    const stream = await this.blobs.read(file.physicalPath);
    this.log.info({ userId, fileId }, 'File download started');
    return { file: toFileView(file), stream };
  }

  /**
   * Case-insensitive substring search over names, limited to entries the
   * user can at least read.
   */
  async search(userId: number, query: string): Promise<SearchResults> {
    const term = query.trim();
    if (!term) {
      throw invalidInput('Search query cannot be empty');
    }
    const pattern = `%${escapeLikeString(term.toLowerCase())}%`;
    const manager = this.dataSource.manager;

    const results: SearchResults = { folders: [], files: [] };

    for (let offset = 0; ; offset += SEARCH_SCAN_LIMIT) {
      const folders = await manager
        .createQueryBuilder(FolderEntity, 'folder')
        .where('folder.isDeleted = :deleted', { deleted: false })
        .andWhere('folder.parentFolderId IS NOT NULL')
        .andWhere("LOWER(folder.name) LIKE :pattern ESCAPE '\\'", { pattern })
        .orderBy('folder.name', 'ASC')
        .addOrderBy('folder.id', 'ASC')
        .skip(offset)
        .take(SEARCH_SCAN_LIMIT)
        .getMany();

      for (const folder of folders) {
        const level = await this.access.effectiveAccess(userId, folderRef(folder.id));
        if (level !== null) results.folders.push({ ...toFolderView(folder), accessLevel: level });
      }
      if (folders.length < SEARCH_SCAN_LIMIT) break;
    }

    for (let offset = 0; ; offset += SEARCH_SCAN_LIMIT) {
      const files = await manager
        .createQueryBuilder(FileEntity, 'file')
        .where('file.isDeleted = :deleted', { deleted: false })
        .andWhere("LOWER(file.name) LIKE :pattern ESCAPE '\\'", { pattern })
        .orderBy('file.name', 'ASC')
        .addOrderBy('file.id', 'ASC')
        .skip(offset)
        .take(SEARCH_SCAN_LIMIT)
        .getMany();

      for (const file of files) {
        const level = await this.access.effectiveAccess(userId, fileRef(file.id));
        if (level !== null) results.files.push({ ...toFileView(file), accessLevel: level });
      }
      if (files.length < SEARCH_SCAN_LIMIT) break;
    }

    this.log.info(
      { userId, query: term, folders: results.folders.length, files: results.files.length },
      'Search completed'
    );
    return results;
  }

  /** The user's trashed items whose container is not itself trashed. */
  async listTrash(userId: number): Promise<TrashContents> {
    const manager = this.dataSource.manager;
    const folders = await manager.find(FolderEntity, {
      where: { ownerId: userId, isDeleted: true },
      order: { deletedAt: 'DESC' },
    });
    const files = await manager.find(FileEntity, {
      where: { ownerId: userId, isDeleted: true },
      order: { deletedAt: 'DESC' },
    });

    const containerIds = [
      ...new Set([
        ...folders.map((f) => f.parentFolderId).filter((id): id is number => id !== null),
        ...files.map((f) => f.folderId),
      ]),
    ];
    const trashedContainers = new Set<number>();
    for (const batch of chunk(containerIds)) {
      const rows = await manager.find(FolderEntity, {
        where: { id: In(batch), isDeleted: true },
        select: { id: true },
      });
      rows.forEach((row) => trashedContainers.add(row.id));
    }

    return {
      folders: folders
        .filter((f) => f.parentFolderId === null || !trashedContainers.has(f.parentFolderId))
        .map(toFolderView),
      files: files.filter((f) => !trashedContainers.has(f.folderId)).map(toFileView),
    };
  }

  // ---------------------------------------------------------------------
  // Create / rename / move
  // ---------------------------------------------------------------------

  /**
   * Creates a folder owned by the caller. Without a parent the folder goes
   * under the caller's root.
   */
  async createFolder(userId: number, name: string, parentFolderId?: number | null): Promise<FolderView> {
    const folderName = cleanName(name);

    const folder = await this.dataSource.transaction(async (manager) => {
      const parentId = parentFolderId ?? (await this.getRootFolder(userId, manager)).id;
      await this.loadActiveFolder(manager, parentId, 'Parent folder not found');
      await this.access.requireAccess(userId, folderRef(parentId), 'Edit', manager);

      return manager.save(
        manager.create(FolderEntity, {
          name: folderName,
          ownerId: userId,
          parentFolderId: parentId,
          isDeleted: false,
          deletedAt: null,
        })
      );
    });

    this.log.info({ userId, folderId: folder.id, parentFolderId: folder.parentFolderId }, 'Folder created');
    return toFolderView(folder);
  }

  async renameFolder(userId: number, folderId: number, newName: string): Promise<FolderView> {
    const folderName = cleanName(newName);

    const folder = await this.dataSource.transaction(async (manager) => {
      const existing = await this.loadActiveFolder(manager, folderId);
      await this.access.requireAccess(userId, folderRef(folderId), 'Edit', manager);
      existing.name = folderName;
      return manager.save(existing);
    });

    this.log.info({ userId, folderId }, 'Folder renamed');
    return toFolderView(folder);
  }

  async renameFile(userId: number, fileId: number, newName: string): Promise<FileView> {
    const fileName = cleanName(newName);

    const file = await this.dataSource.transaction(async (manager) => {
      const existing = await this.loadActiveFile(manager, fileId);
      await this.access.requireAccess(userId, fileRef(fileId), 'Edit', manager);
      existing.name = fileName;
      existing.extension = path.extname(fileName);
      return manager.save(existing);
    });

    this.log.info({ userId, fileId }, 'File renamed');
    return toFileView(file);
  }

  /**
   * Moves a folder under another folder (the caller's root when the target
   * is null). Refuses any move that would make the folder its own ancestor.
   */
  async moveFolder(userId: number, folderId: number, targetFolderId?: number | null): Promise<FolderView> {
    const folder = await this.dataSource.transaction(async (manager) => {
      const source = await this.loadActiveFolder(manager, folderId);
      if (source.parentFolderId === null) {
        throw invalidInput('Root folders cannot be moved');
      }
      await this.access.requireAccess(userId, folderRef(folderId), 'Edit', manager);

      const targetId = targetFolderId ?? (await this.getRootFolder(userId, manager)).id;
      if (targetId === folderId) {
        throw invalidInput('Cannot move a folder into itself');
      }
      await this.loadActiveFolder(manager, targetId, 'Target folder not found');
      await this.access.requireAccess(userId, folderRef(targetId), 'Edit', manager);
      await this.assertNotWithin(manager, folderId, targetId);

      if (source.parentFolderId === targetId) {
        return source;
      }
      source.parentFolderId = targetId;
      return manager.save(source);
    });

    this.log.info({ userId, folderId, parentFolderId: folder.parentFolderId }, 'Folder moved');
    return toFolderView(folder);
  }

  async moveFile(userId: number, fileId: number, targetFolderId?: number | null): Promise<FileView> {
    const file = await this.dataSource.transaction(async (manager) => {
      const existing = await this.loadActiveFile(manager, fileId);
      await this.access.requireAccess(userId, fileRef(fileId), 'Edit', manager);

      const targetId = targetFolderId ?? (await this.getRootFolder(userId, manager)).id;
      await this.loadActiveFolder(manager, targetId, 'Target folder not found');
      await this.access.requireAccess(userId, folderRef(targetId), 'Edit', manager);

      if (existing.folderId === targetId) {
        return existing;
      }
      existing.folderId = targetId;
      return manager.save(existing);
    });

    this.log.info({ userId, fileId, folderId: file.folderId }, 'File moved');
    return toFileView(file);
  }

  // ---------------------------------------------------------------------
  // Upload
  // ---------------------------------------------------------------------

  /**
   * Stores the bytes, then charges quota and inserts metadata in one
   * transaction. The stored bytes are removed again if that transaction
   * fails.
   */
  async uploadFile(userId: number, input: UploadInput): Promise<FileView> {
    const fileName = cleanName(input.name);
    const size = input.buffer.length;
    if (size === 0) {
      throw invalidInput('No file uploaded');
    }

    const manager = this.dataSource.manager;
    const folderId = input.folderId ?? (await this.getRootFolder(userId, manager)).id;
    await this.loadActiveFolder(manager, folderId);
    await this.access.requireAccess(userId, folderRef(folderId), 'Edit');
    await this.quota.assertFits(userId, size);

    const handle = await this.blobs.save(input.buffer, fileName, input.mime);

    let file: FileEntity;
    try {
      file = await this.dataSource.transaction(async (tx) => {
        await this.loadActiveFolder(tx, folderId);
        await this.access.requireAccess(userId, folderRef(folderId), 'Edit', tx);
        await this.quota.reserve(tx, userId, size);

        return tx.save(
          tx.create(FileEntity, {
            name: fileName,
            extension: path.extname(fileName),
            mime: input.mime,
            size,
            physicalPath: handle,
            folderId,
            ownerId: userId,
            isDeleted: false,
            deletedAt: null,
          })
        );
      });
    } catch (error) {
      try {
        await this.blobs.delete(handle);
      } catch (cleanupError) {
        this.log.error({ error: cleanupError, handle }, 'Failed to remove blob of aborted upload');
      }
      throw error;
    }

    this.log.info({ userId, fileId: file.id, folderId, size }, 'File uploaded successfully');
    return toFileView(file);
  }

  // ---------------------------------------------------------------------
  // Soft delete / restore
  // ---------------------------------------------------------------------

  /** Moves a folder and its whole active subtree to the trash. */
  async deleteFolder(userId: number, folderId: number): Promise<CascadeResult> {
    const result = await this.dataSource.transaction(async (manager) => {
      const folder = await this.loadActiveFolder(manager, folderId);
      if (folder.parentFolderId === null) {
        throw invalidInput('Root folders cannot be deleted');
      }
      await this.access.requireAccess(userId, folderRef(folderId), 'Edit', manager);

      const folderIds = await this.collectSubtree(manager, folderId);
      const deletedAt = new Date();
      const counts: CascadeResult = { folders: 0, files: 0 };

      for (const batch of chunk(folderIds)) {
        const folders = await manager.update(
          FolderEntity,
          { id: In(batch), isDeleted: false },
          { isDeleted: true, deletedAt }
        );
        const files = await manager.update(
          FileEntity,
          { folderId: In(batch), isDeleted: false },
          { isDeleted: true, deletedAt }
        );
        counts.folders += folders.affected ?? 0;
        counts.files += files.affected ?? 0;
      }
      return counts;
    });

    this.log.info({ userId, folderId, ...result }, 'Folder moved to trash');
    return result;
  }

  async deleteFile(userId: number, fileId: number): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      const file = await this.loadActiveFile(manager, fileId);
      await this.access.requireAccess(userId, fileRef(fileId), 'Edit', manager);
      file.isDeleted = true;
      file.deletedAt = new Date();
      await manager.save(file);
    });

    this.log.info({ userId, fileId }, 'File moved to trash');
  }

  /**
   * Owner-only. Brings back the folder and the descendants that were
   * trashed together with it.
   */
  async restoreFolder(userId: number, folderId: number): Promise<CascadeResult> {
    const result = await this.dataSource.transaction(async (manager) => {
      const folder = await manager.findOne(FolderEntity, { where: { id: folderId } });
      if (!folder) {
        throw notFound('Folder not found');
      }
      if (folder.ownerId !== userId) {
        throw forbidden('Only the owner can restore this folder');
      }
      if (!folder.isDeleted) {
        throw invalidInput('Folder is not in the trash');
      }

      const stamp = folder.deletedAt;
      const folderIds = await this.collectSubtree(manager, folderId);
      const descendantIds = folderIds.filter((id) => id !== folderId);

      const restoreFolderIds: number[] = [];
      for (const batch of chunk(descendantIds)) {
        const rows = await manager.find(FolderEntity, {
          where: { id: In(batch), isDeleted: true },
          select: { id: true, deletedAt: true },
        });
        rows.filter((row) => sameInstant(row.deletedAt, stamp)).forEach((row) => restoreFolderIds.push(row.id));
      }
      const restoreFileIds: number[] = [];
      for (const batch of chunk(folderIds)) {
        const rows = await manager.find(FileEntity, {
          where: { folderId: In(batch), isDeleted: true },
          select: { id: true, deletedAt: true },
        });
        rows.filter((row) => sameInstant(row.deletedAt, stamp)).forEach((row) => restoreFileIds.push(row.id));
      }

      for (const batch of chunk(restoreFolderIds)) {
        await manager.update(FolderEntity, { id: In(batch) }, { isDeleted: false, deletedAt: null });
      }
      for (const batch of chunk(restoreFileIds)) {
        await manager.update(FileEntity, { id: In(batch) }, { isDeleted: false, deletedAt: null });
      }

      folder.isDeleted = false;
      folder.deletedAt = null;
      if (!(await this.isActiveContainer(manager, folder.parentFolderId))) {
        folder.parentFolderId = (await this.getRootFolder(folder.ownerId, manager)).id;
      }
      await manager.save(folder);

      return { folders: restoreFolderIds.length + 1, files: restoreFileIds.length };
    });

    this.log.info({ userId, folderId, ...result }, 'Folder restored');
    return result;
  }

  async restoreFile(userId: number, fileId: number): Promise<FileView> {
    const file = await this.dataSource.transaction(async (manager) => {
      const existing = await manager.findOne(FileEntity, { where: { id: fileId } });
      if (!existing) {
        throw notFound('File not found');
      }
      if (existing.ownerId !== userId) {
        throw forbidden('Only the owner can restore this file');
      }
      if (!existing.isDeleted) {
        throw invalidInput('File is not in the trash');
      }

      existing.isDeleted = false;
      existing.deletedAt = null;
      if (!(await this.isActiveContainer(manager, existing.folderId))) {
        existing.folderId = (await this.getRootFolder(existing.ownerId, manager)).id;
      }
      return manager.save(existing);
    });

    this.log.info({ userId, fileId, folderId: file.folderId }, 'File restored');
    return toFileView(file);
  }

  // ---------------------------------------------------------------------
  // Purge
  // ---------------------------------------------------------------------

  /**
   * Owner-only, irreversible. Removes the folder, its subtree, their files
   * and grants, deletes the stored bytes and returns the space to each
   * file owner's quota.
   */
  async purgeFolder(userId: number, folderId: number): Promise<CascadeResult> {
    const manager = this.dataSource.manager;
    const folder = await manager.findOne(FolderEntity, { where: { id: folderId } });
    if (!folder) {
      throw notFound('Folder not found');
    }
    if (folder.ownerId !== userId) {
      throw forbidden('Only the owner can permanently delete this folder');
    }
    if (folder.parentFolderId === null) {
      throw invalidInput('Root folders cannot be deleted');
    }

    // Bytes go first: a storage failure leaves the metadata intact and the
    // purge can be retried.
    const filesBefore = await this.filesIn(manager, await this.collectSubtree(manager, folderId));
    for (const file of filesBefore) {
      await this.blobs.delete(file.physicalPath);
    }

    const result = await this.dataSource.transaction(async (tx) => {
      const folderIds = await this.collectSubtree(tx, folderId);
      const files = await this.filesIn(tx, folderIds);
      const fileIds = files.map((f) => f.id);

      for (const batch of chunk(fileIds)) {
        await tx.delete(PermissionEntity, { fileId: In(batch) });
        await tx.delete(FileEntity, { id: In(batch) });
      }
      for (const batch of chunk(folderIds)) {
        await tx.delete(PermissionEntity, { folderId: In(batch) });
      }
      // Deepest first so no statement removes a parent ahead of its children.
      for (const id of [...folderIds].reverse()) {
        await tx.delete(FolderEntity, { id });
      }

      const bytesByOwner = new Map<number, number>();
      for (const file of files) {
        bytesByOwner.set(file.ownerId, (bytesByOwner.get(file.ownerId) ?? 0) + file.size);
      }
      for (const [ownerId, bytes] of bytesByOwner) {
        await this.quota.release(tx, ownerId, bytes);
      }

      return { folders: folderIds.length, files: files.length };
    });

    this.log.info({ userId, folderId, ...result }, 'Folder permanently deleted');
    return result;
  }

  async purgeFile(userId: number, fileId: number): Promise<void> {
    const manager = this.dataSource.manager;
    const file = await manager.findOne(FileEntity, { where: { id: fileId } });
    if (!file) {
      throw notFound('File not found');
    }
    if (file.ownerId !== userId) {
      throw forbidden('Only the owner can permanently delete this file');
    }

    await this.blobs.delete(file.physicalPath);

    await this.dataSource.transaction(async (tx) => {
      await tx.delete(PermissionEntity, { fileId });
      await tx.delete(FileEntity, { id: fileId });
      await this.quota.release(tx, file.ownerId, file.size);
    });

    this.log.info({ userId, fileId, size: file.size }, 'File permanently deleted');
  }

  // ---------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------

  private async loadActiveFolder(
    manager: EntityManager,
    folderId: number,
    message = 'Folder not found'
  ): Promise<FolderEntity> {
    const folder = await manager.findOne(FolderEntity, { where: { id: folderId } });
    if (!folder || folder.isDeleted) {
      throw notFound(message);
    }
    return folder;
  }

  private async loadActiveFile(manager: EntityManager, fileId: number): Promise<FileEntity> {
    const file = await manager.findOne(FileEntity, { where: { id: fileId } });
    if (!file || file.isDeleted) {
      throw notFound('File not found');
    }
    return file;
  }

  private async isActiveContainer(manager: EntityManager, folderId: number | null): Promise<boolean> {
    if (folderId === null) return false;
    const folder = await manager.findOne(FolderEntity, {
      where: { id: folderId },
      select: { id: true, isDeleted: true },
    });
    return folder !== null && !folder.isDeleted;
  }

  /**
   * Ids of the folder and every descendant, parents before children.
   * Breadth-first worklist; a visited set keeps corrupt cyclic data from
   * looping.
   */
  private async collectSubtree(manager: EntityManager, rootId: number): Promise<number[]> {
    const visited = new Set<number>([rootId]);
    const ordered = [rootId];
    let frontier = [rootId];

    while (frontier.length > 0) {
      const next: number[] = [];
      for (const batch of chunk(frontier)) {
        const children = await manager.find(FolderEntity, {
          where: { parentFolderId: In(batch) },
          select: { id: true },
        });
        for (const child of children) {
          if (!visited.has(child.id)) {
            visited.add(child.id);
            ordered.push(child.id);
            next.push(child.id);
          }
        }
      }
      frontier = next;
    }

    return ordered;
  }

  private async filesIn(manager: EntityManager, folderIds: number[]): Promise<FileEntity[]> {
    const files: FileEntity[] = [];
    for (const batch of chunk(folderIds)) {
      files.push(...(await manager.find(FileEntity, { where: { folderId: In(batch) } })));
    }
    return files;
  }

  /**
   * Walks up from the target. Meeting the source means the target sits in
   * the source's subtree.
   */
  private async assertNotWithin(manager: EntityManager, sourceId: number, targetId: number): Promise<void> {
    const visited = new Set<number>();
    let current: number | null = targetId;

    while (current !== null) {
      if (current === sourceId) {
        throw invalidInput('Cannot move a folder into one of its own subfolders');
      }
      if (visited.has(current)) {
        throw conflict('Folder hierarchy contains a cycle; move refused');
      }
      visited.add(current);

      const folder: FolderEntity | null = await manager.findOne(FolderEntity, {
        where: { id: current },
        select: { id: true, parentFolderId: true },
      });
      current = folder?.parentFolderId ?? null;
    }
  }
}
