import type { Readable } from 'stream';
import { In, type DataSource, type EntityManager } from 'typeorm';
import { AppDataSource } from '../data-source.js';
import { FolderEntity } from '../entities/FolderEntity.js';
import { FileEntity } from '../entities/FileEntity.js';
import { UserEntity } from '../entities/UserEntity.js';
import {
  PermissionEntity,
  permissionColumns,
  permissionTarget,
} from '../entities/PermissionEntity.js';
import { ShareLinkEntity, linkTarget } from '../entities/ShareLinkEntity.js';
import { AccessService } from './access.service.js';
import type { BlobStorage } from './storage.service.js';
import { toFileView, type FileView } from './tree.service.js';
import { AppError, conflict, forbidden, invalidInput, notFound } from '../utils/errors.js';
import { generateShareToken } from '../utils/generate-key.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import type { AccessLevel, GrantableLevel, TargetKind, TargetRef } from '../types/access.js';

const TOKEN_ATTEMPTS = 5;

export interface GrantView {
  id: number;
  userId: number;
  username: string | null;
  target: TargetRef;
  accessLevel: AccessLevel;
  createdAt: Date;
}

export interface SharedWithMeEntry {
  permissionId: number;
  target: TargetRef;
  name: string;
  ownerId: number;
  ownerUsername: string | null;
  accessLevel: AccessLevel;
}

export interface ShareLinkView {
  id: number;
  token: string;
  type: TargetKind;
  targetId: number;
  itemName: string | null;
  createdAt: Date;
  expirationDate: Date | null;
  isExpired: boolean;
}

export type SharedItem =
  | {
      type: 'file';
      name: string;
      extension: string;
      size: number;
      uploadDate: Date;
    }
  | {
      type: 'folder';
      name: string;
      subFolders: Array<{ id: number; name: string }>;
      files: Array<{ id: number; name: string; extension: string; size: number }>;
    };

type LoadedTarget =
  | { kind: 'file'; row: FileEntity }
  | { kind: 'folder'; row: FolderEntity };

export interface SharingServiceDeps {
  dataSource?: Pick<DataSource, 'manager' | 'transaction'>;
  accessService?: AccessService;
  blobStorage: BlobStorage;
  logger?: LoggerLike;
  now?: () => Date;
}

/**
 * Per-user grants and anonymous share links.
 */
export class SharingService {
  private readonly dataSource: Pick<DataSource, 'manager' | 'transaction'>;
  private readonly access: AccessService;
  private readonly blobs: BlobStorage;
  private readonly log: LoggerLike;
  private readonly now: () => Date;

  constructor(deps: SharingServiceDeps) {
    this.dataSource = deps.dataSource ?? AppDataSource;
    this.log = deps.logger ?? logger;
    this.access = deps.accessService ?? new AccessService({ dataSource: this.dataSource, logger: this.log });
    this.blobs = deps.blobStorage;
    this.now = deps.now ?? (() => new Date());
  }

  // ---------------------------------------------------------------------
  // Grants
  // ---------------------------------------------------------------------

  /**
   * Gives targetUserId the level on target, replacing any earlier grant for
   * the same pair. Only holders of Delete (owners) may grant.
   */
  async grantPermission(
    granterId: number,
    targetUserId: number,
    target: TargetRef,
    level: GrantableLevel
  ): Promise<GrantView> {
    if (granterId === targetUserId) {
      throw invalidInput('Cannot grant permissions to yourself');
    }

    const permission = await this.dataSource.transaction(async (manager) => {
      await this.loadTarget(manager, target, { activeOnly: true });
      await this.access.requireAccess(granterId, target, 'Delete', manager);

      const grantee = await manager.findOne(UserEntity, { where: { id: targetUserId } });
      if (!grantee) {
        throw notFound('User not found');
      }

      const columns = permissionColumns(target);
      const existing = await manager.findOne(PermissionEntity, {
        where:
          target.kind === 'folder'
            ? { userId: targetUserId, folderId: target.id }
            : { userId: targetUserId, fileId: target.id },
      });

      if (existing) {
        existing.accessLevel = level;
        return manager.save(existing);
      }
      return manager.save(
        manager.create(PermissionEntity, { userId: targetUserId, ...columns, accessLevel: level })
      );
    });

    this.log.info(
      { granterId, userId: targetUserId, target, accessLevel: level, permissionId: permission.id },
      'Permission granted'
    );
    return this.toGrantView(permission, null);
  }

  async revokePermission(requesterId: number, permissionId: number): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      const permission = await manager.findOne(PermissionEntity, { where: { id: permissionId } });
      if (!permission) {
        throw notFound('Permission not found');
      }
      const target = permissionTarget(permission);
      const loaded = target ? await this.findTarget(manager, target) : null;
      if (!loaded || loaded.row.ownerId !== requesterId) {
        throw forbidden('Only the owner can revoke this permission');
      }
      await manager.delete(PermissionEntity, { id: permissionId });
    });

    this.log.info({ requesterId, permissionId }, 'Permission revoked');
  }

  /** Direct grants naming the user, not the inherited closure. */
  async listSharedWithMe(userId: number): Promise<SharedWithMeEntry[]> {
    const manager = this.dataSource.manager;
    const permissions = await manager.find(PermissionEntity, {
      where: { userId },
      order: { createdAt: 'DESC' },
    });

    const entries: SharedWithMeEntry[] = [];
    for (const permission of permissions) {
      const target = permissionTarget(permission);
      if (!target) continue;
      const loaded = await this.findTarget(manager, target);
      if (!loaded || loaded.row.isDeleted) continue;

      entries.push({
        permissionId: permission.id,
        target,
        name: loaded.row.name,
        ownerId: loaded.row.ownerId,
        ownerUsername: null,
        accessLevel: permission.accessLevel,
      });
    }

    const usernames = await this.usernames(manager, entries.map((e) => e.ownerId));
    return entries.map((entry) => ({ ...entry, ownerUsername: usernames.get(entry.ownerId) ?? null }));
  }

  /** Owner-only list of the grants on one item. */
  async listGrants(requesterId: number, target: TargetRef): Promise<GrantView[]> {
    const manager = this.dataSource.manager;
    const loaded = await this.loadTarget(manager, target, { activeOnly: false });
    if (loaded.row.ownerId !== requesterId) {
      throw forbidden('Only the owner can view permissions on this item');
    }

    const permissions = await manager.find(PermissionEntity, {
      where: target.kind === 'folder' ? { folderId: target.id } : { fileId: target.id },
      order: { createdAt: 'ASC' },
    });
    const usernames = await this.usernames(manager, permissions.map((p) => p.userId));
    return permissions.map((p) => this.toGrantView(p, usernames.get(p.userId) ?? null));
  }

  // ---------------------------------------------------------------------
  // Share links
  // ---------------------------------------------------------------------

  async createShareLink(
    creatorId: number,
    target: TargetRef,
    expirationDate?: Date | null
  ): Promise<ShareLinkView> {
    const manager = this.dataSource.manager;
    const loaded = await this.loadTarget(manager, target, { activeOnly: true });
    if (loaded.row.ownerId !== creatorId) {
      throw forbidden('Only the owner can share this item');
    }

    const token = await this.uniqueToken(manager);
    const link = await manager.save(
      manager.create(ShareLinkEntity, {
        token,
        targetType: target.kind,
        targetId: target.id,
        creatorId,
        expirationDate: expirationDate ?? null,
      })
    );

    this.log.info(
      { creatorId, linkId: link.id, target, expirationDate: link.expirationDate },
      'Share link created'
    );
    return this.toLinkView(link, loaded.row.name);
  }

  /**
   * Anonymous read-only projection of a shared file, or of one level of a
   * shared folder's children.
   */
  async resolveShareLink(token: string): Promise<SharedItem> {
    const manager = this.dataSource.manager;
    const { loaded } = await this.openLink(manager, token);

    if (loaded.kind === 'file') {
      const file = loaded.row;
      return {
        type: 'file',
        name: file.name,
        extension: file.extension,
        size: file.size,
        uploadDate: file.uploadDate,
      };
    }

    const folder = loaded.row;
    const subFolders = await manager.find(FolderEntity, {
      where: { parentFolderId: folder.id, isDeleted: false },
      order: { name: 'ASC' },
    });
    const files = await manager.find(FileEntity, {
      where: { folderId: folder.id, isDeleted: false },
      order: { name: 'ASC' },
    });

    return {
      type: 'folder',
      name: folder.name,
      subFolders: subFolders.map((f) => ({ id: f.id, name: f.name })),
      files: files.map((f) => ({ id: f.id, name: f.name, extension: f.extension, size: f.size })),
    };
  }

  /** Anonymous download through a file link. */
  async openSharedFile(token: string): Promise<{ file: FileView; stream: Readable }> {
    const { link, loaded } = await this.openLink(this.dataSource.manager, token);
    if (loaded.kind !== 'file') {
      throw invalidInput('This link does not point to a file');
    }

    const stream = await this.blobs.read(loaded.row.physicalPath);
    this.log.info({ linkId: link.id, fileId: loaded.row.id }, 'Shared file downloaded');
    return { file: toFileView(loaded.row), stream };
  }

  async listMyLinks(userId: number): Promise<ShareLinkView[]> {
    const manager = this.dataSource.manager;
    const links = await manager.find(ShareLinkEntity, {
      where: { creatorId: userId },
      order: { createdAt: 'DESC', id: 'DESC' },
    });

    const views: ShareLinkView[] = [];
    for (const link of links) {
      const loaded = await this.findTarget(manager, linkTarget(link));
      views.push(this.toLinkView(link, loaded ? loaded.row.name : null));
    }
    return views;
  }

  async revokeShareLink(requesterId: number, linkId: number): Promise<void> {
    const manager = this.dataSource.manager;
    const link = await manager.findOne(ShareLinkEntity, { where: { id: linkId } });
    if (!link) {
      throw notFound('Share link not found');
    }
    if (link.creatorId !== requesterId) {
      throw forbidden('Only the creator can revoke this link');
    }

    await manager.delete(ShareLinkEntity, { id: linkId });
    this.log.info({ requesterId, linkId }, 'Share link revoked');
  }

  // ---------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------

  private async openLink(
    manager: EntityManager,
    token: string
  ): Promise<{ link: ShareLinkEntity; loaded: LoadedTarget }> {
    const link = await manager.findOne(ShareLinkEntity, { where: { token } });
    if (!link) {
      throw notFound('Link not found');
    }
    if (link.expirationDate !== null && link.expirationDate.getTime() < this.now().getTime()) {
      throw new AppError('Expired', 'This link has expired');
    }

    const noun = link.targetType === 'file' ? 'File' : 'Folder';
    const loaded = await this.findTarget(manager, linkTarget(link));
    if (!loaded || loaded.row.isDeleted) {
      throw new AppError('Gone', `${noun} no longer available`);
    }
    return { link, loaded };
  }

  private async findTarget(manager: EntityManager, target: TargetRef): Promise<LoadedTarget | null> {
    if (target.kind === 'file') {
      const row = await manager.findOne(FileEntity, { where: { id: target.id } });
      return row ? { kind: 'file', row } : null;
    }
    const row = await manager.findOne(FolderEntity, { where: { id: target.id } });
    return row ? { kind: 'folder', row } : null;
  }

  /**
   * @throws AppError NotFound when the item does not exist, or is trashed
   * and activeOnly is set
   */
  private async loadTarget(
    manager: EntityManager,
    target: TargetRef,
    options: { activeOnly: boolean }
  ): Promise<LoadedTarget> {
    const loaded = await this.findTarget(manager, target);
    if (!loaded || (options.activeOnly && loaded.row.isDeleted)) {
      throw notFound(target.kind === 'file' ? 'File not found' : 'Folder not found');
    }
    return loaded;
  }

  private async uniqueToken(manager: EntityManager): Promise<string> {
    for (let attempt = 0; attempt < TOKEN_ATTEMPTS; attempt += 1) {
      const token = generateShareToken();
      const taken = await manager.exists(ShareLinkEntity, { where: { token } });
      if (!taken) {
        return token;
      }
      this.log.warn({ attempt }, 'Share token collision, regenerating');
    }
    throw conflict('Could not allocate a unique share token');
  }

  private async usernames(manager: EntityManager, userIds: number[]): Promise<Map<number, string>> {
    const ids = [...new Set(userIds)];
    if (ids.length === 0) return new Map();
    const users = await manager.find(UserEntity, {
      where: { id: In(ids) },
      select: { id: true, username: true },
    });
    return new Map(users.map((u) => [u.id, u.username]));
  }

  private toGrantView(permission: PermissionEntity, username: string | null): GrantView {
    const target = permissionTarget(permission);
    if (!target) {
      throw new Error(`Permission ${permission.id} names no target`);
    }
    return {
      id: permission.id,
      userId: permission.userId,
      username,
      target,
      accessLevel: permission.accessLevel,
      createdAt: permission.createdAt,
    };
  }

  private toLinkView(link: ShareLinkEntity, itemName: string | null): ShareLinkView {
    return {
      id: link.id,
      token: link.token,
      type: link.targetType,
      targetId: link.targetId,
      itemName,
      createdAt: link.createdAt,
      expirationDate: link.expirationDate,
      isExpired: link.expirationDate !== null && link.expirationDate.getTime() < this.now().getTime(),
    };
  }
}
