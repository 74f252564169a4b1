import type { DataSource, EntityManager } from 'typeorm';
import { AppDataSource } from '../data-source.js';
import { FolderEntity } from '../entities/FolderEntity.js';
import { FileEntity } from '../entities/FileEntity.js';
import { PermissionEntity } from '../entities/PermissionEntity.js';
import { UserEntity } from '../entities/UserEntity.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import { forbidden } from '../utils/errors.js';
import {
  isAtLeast,
  higherOf,
  type AccessLevel,
  type TargetRef,
} from '../types/access.js';

/** Upper bound on folders visited when walking a parent chain. */
export const MAX_ANCESTOR_DEPTH = 50;

export interface AccessServiceDeps {
  dataSource?: Pick<DataSource, 'manager'>;
  logger?: LoggerLike;
}

/**
 * Resolves a user's effective access to a file or folder from ownership,
 * direct grants and grants inherited from ancestor folders.
 */
export class AccessService {
  private readonly dataSource: Pick<DataSource, 'manager'>;
  private readonly log: LoggerLike;

  constructor(deps: AccessServiceDeps = {}) {
    this.dataSource = deps.dataSource ?? AppDataSource;
    this.log = deps.logger ?? logger;
  }

  /**
   * Returns the highest level the user holds on the target, or null when
   * there is none. Lookup failures resolve to null.
   */
  async effectiveAccess(
    userId: number,
    target: TargetRef,
    manager: EntityManager = this.dataSource.manager
  ): Promise<AccessLevel | null> {
    try {
      return await this.resolve(userId, target, manager);
    } catch (error) {
      this.log.warn({ error, userId, target }, 'Access lookup failed, denying access');
      return null;
    }
  }

  async hasPermission(
    userId: number,
    target: TargetRef,
    minLevel: AccessLevel,
    manager?: EntityManager
  ): Promise<boolean> {
    return isAtLeast(await this.effectiveAccess(userId, target, manager), minLevel);
  }

  /**
   * @throws AppError Forbidden when the user holds less than minLevel
   */
  async requireAccess(
    userId: number,
    target: TargetRef,
    minLevel: AccessLevel,
    manager?: EntityManager
  ): Promise<AccessLevel> {
    const level = await this.effectiveAccess(userId, target, manager);
    if (level === null || !isAtLeast(level, minLevel)) {
      this.log.warn({ userId, target, required: minLevel, actual: level }, 'Access denied');
      throw forbidden(`${minLevel} access required on this ${target.kind}`);
    }
    return level;
  }

  private async resolve(
    userId: number,
    target: TargetRef,
    manager: EntityManager
  ): Promise<AccessLevel | null> {
    let ownerId: number;
    let startFolderId: number | null;

    if (target.kind === 'file') {
      const file = await manager.findOne(FileEntity, {
        where: { id: target.id },
        select: { id: true, ownerId: true, folderId: true },
      });
      if (!file) return null;
      ownerId = file.ownerId;
      startFolderId = file.folderId;
    } else {
      const folder = await manager.findOne(FolderEntity, {
        where: { id: target.id },
        select: { id: true, ownerId: true },
      });
      if (!folder) return null;
      ownerId = folder.ownerId;
      startFolderId = folder.id;
    }

    if (ownerId === userId) {
      return 'Delete';
    }

    let candidate: AccessLevel | null = null;

    if (target.kind === 'file') {
      const direct = await manager.findOne(PermissionEntity, {
        where: { userId, fileId: target.id },
      });
      candidate = direct?.accessLevel ?? null;
    }

    // The folder's own grant is the first step of the walk.
    candidate = higherOf(candidate, await this.inheritedGrant(userId, startFolderId, candidate, manager));

    if (candidate === null) {
      const user = await manager.findOne(UserEntity, {
        where: { id: userId },
        select: { id: true, role: true },
      });
      if (user?.role === 'Admin') {
        return 'Read';
      }
    }

    return candidate;
  }

  private async inheritedGrant(
    userId: number,
    startFolderId: number | null,
    current: AccessLevel | null,
    manager: EntityManager
  ): Promise<AccessLevel | null> {
    let candidate = current;
    let folderId = startFolderId;
    const visited = new Set<number>();

    while (folderId !== null && visited.size < MAX_ANCESTOR_DEPTH) {
      // Edit is the highest grantable level
      if (isAtLeast(candidate, 'Edit')) break;
      if (visited.has(folderId)) break;
      visited.add(folderId);

      const grant = await manager.findOne(PermissionEntity, {
        where: { userId, folderId },
      });
      candidate = higherOf(candidate, grant?.accessLevel ?? null);

      const folder = await manager.findOne(FolderEntity, {
        where: { id: folderId },
        select: { id: true, parentFolderId: true },
      });
      folderId = folder?.parentFolderId ?? null;
    }

    return candidate;
  }
}
