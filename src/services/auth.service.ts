import bcrypt from 'bcrypt';
import jwt, { JsonWebTokenError, type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { DataSource } from 'typeorm';
import { AppDataSource } from '../data-source.js';
import { config } from '../config.js';
import { UserEntity } from '../entities/UserEntity.js';
import { FolderEntity } from '../entities/FolderEntity.js';
import { conflict, unauthorized } from '../utils/errors.js';
import { logger, type LoggerLike } from '../utils/logger.js';
import { ROLES, type Role } from '../types/access.js';

export const ROOT_FOLDER_NAME = 'Root';

export interface UserView {
  id: number;
  username: string;
  role: Role;
  isActive: boolean;
  storageLimit: number;
  usedStorage: number;
  createdAt: Date;
}

export interface TokenClaims {
  userId: number;
  role: Role;
}

const claimsSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  role: z.enum(ROLES),
});

export function toUserView(user: UserEntity): UserView {
  return {
    id: user.id,
    username: user.username,
    role: user.role,
    isActive: user.isActive,
    storageLimit: user.storageLimit,
    usedStorage: user.usedStorage,
    createdAt: user.createdAt,
  };
}

export interface AuthServiceDeps {
  dataSource?: Pick<DataSource, 'manager' | 'transaction'>;
  logger?: LoggerLike;
  jwtSecret?: string;
  /** Seconds */
  tokenTtl?: number;
  defaultStorageLimit?: number;
  saltRounds?: number;
}

/**
 * Registration, credential checks and bearer tokens.
 */
export class AuthService {
  private readonly dataSource: Pick<DataSource, 'manager' | 'transaction'>;
  private readonly log: LoggerLike;
  private readonly jwtSecret: string;
  private readonly tokenTtl: number;
  private readonly defaultStorageLimit: number;
  private readonly saltRounds: number;

  constructor(deps: AuthServiceDeps = {}) {
    this.dataSource = deps.dataSource ?? AppDataSource;
    this.log = deps.logger ?? logger;
    this.jwtSecret = deps.jwtSecret ?? config.JWT_SECRET;
    this.tokenTtl = deps.tokenTtl ?? config.JWT_EXPIRES_IN;
    this.defaultStorageLimit = deps.defaultStorageLimit ?? config.DEFAULT_STORAGE_LIMIT;
    this.saltRounds = deps.saltRounds ?? 10;
  }

  hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.saltRounds);
  }

  verifyPassword(password: string, passwordHash: string): Promise<boolean> {
    return bcrypt.compare(password, passwordHash);
  }

  issueToken(user: Pick<UserEntity, 'id' | 'role'>): string {
    return jwt.sign({ role: user.role }, this.jwtSecret, {
      subject: String(user.id),
      expiresIn: this.tokenTtl,
    });
  }

  /** Returns null for malformed, tampered or expired tokens. */
  verifyToken(token: string): TokenClaims | null {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.jwtSecret);
    } catch (error) {
      if (error instanceof JsonWebTokenError) {
        return null;
      }
      throw error;
    }

    const claims = claimsSchema.safeParse(payload);
    if (!claims.success) {
      return null;
    }
    return { userId: Number(claims.data.sub), role: claims.data.role };
  }

  /**
   * Creates the account and its root folder. The very first account becomes
   * an active Admin; later ones wait for activation.
   */
  async register(username: string, password: string): Promise<UserView> {
    const passwordHash = await this.hashPassword(password);

    const user = await this.dataSource.transaction(async (manager) => {
      if (await manager.exists(UserEntity, { where: { username } })) {
        throw conflict('Username already exists');
      }
      const isFirstUser = (await manager.count(UserEntity)) === 0;

      const created = await manager.save(
        manager.create(UserEntity, {
          username,
          passwordHash,
          role: isFirstUser ? 'Admin' : 'User',
          isActive: isFirstUser,
          storageLimit: this.defaultStorageLimit,
          usedStorage: 0,
        })
      );

      await manager.save(
        manager.create(FolderEntity, {
          name: ROOT_FOLDER_NAME,
          ownerId: created.id,
          parentFolderId: null,
          isDeleted: false,
          deletedAt: null,
        })
      );
      return created;
    });

    this.log.info({ userId: user.id, username, role: user.role }, 'User registered');
    return toUserView(user);
  }

  async login(username: string, password: string): Promise<{ token: string; user: UserView }> {
    const user = await this.dataSource.manager.findOne(UserEntity, { where: { username } });

    if (!user || !(await this.verifyPassword(password, user.passwordHash))) {
      this.log.warn({ username }, 'Failed login attempt');
      throw unauthorized('Invalid credentials');
    }
    if (!user.isActive) {
      this.log.warn({ userId: user.id }, 'Login refused for inactive account');
      throw unauthorized('Account is not activated');
    }

    this.log.info({ userId: user.id }, 'User logged in');
    return { token: this.issueToken(user), user: toUserView(user) };
  }
}
