import type { DataSource, EntityManager } from 'typeorm';
import { AppDataSource } from '../data-source.js';
import { UserEntity } from '../entities/UserEntity.js';
import { FileEntity } from '../entities/FileEntity.js';
import { AppError, notFound } from '../utils/errors.js';
import { logger, type LoggerLike } from '../utils/logger.js';

export interface StorageUsage {
  usedStorage: number;
  storageLimit: number;
}

export interface QuotaServiceDeps {
  dataSource?: Pick<DataSource, 'manager'>;
  logger?: LoggerLike;
}

export class QuotaService {
  private readonly dataSource: Pick<DataSource, 'manager'>;
  private readonly log: LoggerLike;

  constructor(deps: QuotaServiceDeps = {}) {
    this.dataSource = deps.dataSource ?? AppDataSource;
    this.log = deps.logger ?? logger;
  }

  async getUsage(userId: number, manager: EntityManager = this.dataSource.manager): Promise<StorageUsage> {
    const user = await manager.findOne(UserEntity, { where: { id: userId } });
    if (!user) {
      throw notFound('User not found');
    }
    return { usedStorage: user.usedStorage, storageLimit: user.storageLimit };
  }

  /**
   * Throws QuotaExceeded when the upload would not fit. Does not write.
   */
  async assertFits(
    userId: number,
    bytes: number,
    manager: EntityManager = this.dataSource.manager
  ): Promise<void> {
    const usage = await this.getUsage(userId, manager);
    if (usage.usedStorage + bytes > usage.storageLimit) {
      this.log.warn({ userId, bytes, ...usage }, 'Storage quota exceeded');
      throw new AppError(
        'QuotaExceeded',
        `Storage quota exceeded: ${usage.usedStorage} of ${usage.storageLimit} bytes used, ${bytes} requested`
      );
    }
  }

  /**
   * Checks and charges bytes to the user. Must run inside the transaction
   * that inserts the file row.
   */
  async reserve(manager: EntityManager, userId: number, bytes: number): Promise<void> {
    await this.assertFits(userId, bytes, manager);
    await manager.increment(UserEntity, { id: userId }, 'usedStorage', bytes);
  }

  /** Returns bytes to the user, never going below zero. */
  async release(manager: EntityManager, userId: number, bytes: number): Promise<void> {
    if (bytes <= 0) return;
    await manager
      .createQueryBuilder()
      .update(UserEntity)
      .set({ usedStorage: () => 'MAX("usedStorage" - :bytes, 0)' })
      .where('id = :userId', { userId })
      .setParameter('bytes', bytes)
      .execute();
  }

  /** Recomputes usedStorage from the user's stored files, trashed ones included. */
  async reconcile(userId: number): Promise<StorageUsage> {
    const manager = this.dataSource.manager;
    const user = await manager.findOne(UserEntity, { where: { id: userId } });
    if (!user) {
      throw notFound('User not found');
    }

    const total = (await manager.sum(FileEntity, 'size', { ownerId: userId })) ?? 0;
    await manager.update(UserEntity, { id: userId }, { usedStorage: total });

    this.log.info({ userId, previous: user.usedStorage, usedStorage: total }, 'Storage usage reconciled');
    return { usedStorage: total, storageLimit: user.storageLimit };
  }
}
