import 'reflect-metadata';
import path from 'path';
import { DataSource } from 'typeorm';
import { config } from './config.js';
import { UserEntity } from './entities/UserEntity.js';
import { FolderEntity } from './entities/FolderEntity.js';
import { FileEntity } from './entities/FileEntity.js';
import { PermissionEntity } from './entities/PermissionEntity.js';
import { ShareLinkEntity } from './entities/ShareLinkEntity.js';

export const entities = [UserEntity, FolderEntity, FileEntity, PermissionEntity, ShareLinkEntity];

export const AppDataSource = new DataSource({
  type: 'sqlite',
  database: path.resolve(config.DATABASE_PATH),
  entities,
  synchronize: true,
  logging: false,
});
