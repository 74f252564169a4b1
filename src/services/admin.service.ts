import type { DataSource } from 'typeorm';
import { AppDataSource } from '../data-source.js';
import { UserEntity } from '../entities/UserEntity.js';
import { AuthService, toUserView, type UserView } from './auth.service.js';
import { QuotaService, type StorageUsage } from './quota.service.js';
import { invalidInput, notFound } from '../utils/errors.js';
import { logger, type LoggerLike } from '../utils/logger.js';

export const MIN_PASSWORD_LENGTH = 4;

export interface AdminServiceDeps {
  dataSource?: Pick<DataSource, 'manager' | 'transaction'>;
  authService?: AuthService;
  quotaService?: QuotaService;
  logger?: LoggerLike;
}

export class AdminService {
  private readonly dataSource: Pick<DataSource, 'manager' | 'transaction'>;
  private readonly auth: AuthService;
  private readonly quota: QuotaService;
  private readonly log: LoggerLike;

  constructor(deps: AdminServiceDeps = {}) {
    this.dataSource = deps.dataSource ?? AppDataSource;
    this.log = deps.logger ?? logger;
    this.auth = deps.authService ?? new AuthService({ dataSource: this.dataSource, logger: this.log });
    this.quota = deps.quotaService ?? new QuotaService({ dataSource: this.dataSource, logger: this.log });
  }

  async listUsers(): Promise<UserView[]> {
    const users = await this.dataSource.manager.find(UserEntity, { order: { id: 'ASC' } });
    return users.map(toUserView);
  }

  async activateUser(userId: number): Promise<UserView> {
    const user = await this.loadUser(userId);
    user.isActive = true;
    await this.dataSource.manager.save(user);
    this.log.info({ userId }, 'User activated');
    return toUserView(user);
  }

  async lockUser(userId: number): Promise<UserView> {
    const user = await this.loadUser(userId);
    if (user.role === 'Admin') {
      throw invalidInput('Cannot lock an Administrator account');
    }
    user.isActive = false;
    await this.dataSource.manager.save(user);
    this.log.info({ userId }, 'User account locked');
    return toUserView(user);
  }

  async resetPassword(userId: number, newPassword: string): Promise<void> {
    if (newPassword.length < MIN_PASSWORD_LENGTH) {
      throw invalidInput(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }
    const user = await this.loadUser(userId);
    user.passwordHash = await this.auth.hashPassword(newPassword);
    await this.dataSource.manager.save(user);
    this.log.info({ userId }, 'Password reset');
  }

  async updateStorageLimit(userId: number, newLimit: number): Promise<UserView> {
    if (!Number.isInteger(newLimit) || newLimit < 0) {
      throw invalidInput('Storage limit must be a non-negative integer');
    }
    const user = await this.loadUser(userId);
    user.storageLimit = newLimit;
    await this.dataSource.manager.save(user);
    this.log.info({ userId, storageLimit: newLimit }, 'Storage limit updated');
    return toUserView(user);
  }

  reconcileStorage(userId: number): Promise<StorageUsage> {
    return this.quota.reconcile(userId);
  }

  private async loadUser(userId: number): Promise<UserEntity> {
    const user = await this.dataSource.manager.findOne(UserEntity, { where: { id: userId } });
    if (!user) {
      throw notFound('User not found');
    }
    return user;
  }
}
