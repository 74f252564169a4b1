import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  Index,
  Check,
} from 'typeorm';
import type { AccessLevel, TargetRef } from '../types/access.js';
import { UserEntity } from './UserEntity.js';
import { FolderEntity } from './FolderEntity.js';
import { FileEntity } from './FileEntity.js';

@Entity('permissions')
@Index(['userId', 'folderId'], { unique: true })
@Index(['userId', 'fileId'], { unique: true })
@Check(`("folderId" IS NULL) <> ("fileId" IS NULL)`)
export class PermissionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  userId!: number;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user?: UserEntity;

  @Column({ type: 'integer', nullable: true })
  folderId!: number | null;

  @ManyToOne(() => FolderEntity, { onDelete: 'CASCADE', nullable: true })
  @JoinColumn({ name: 'folderId' })
  folder?: FolderEntity | null;

  @Column({ type: 'integer', nullable: true })
  fileId!: number | null;

  @ManyToOne(() => FileEntity, { onDelete: 'CASCADE', nullable: true })
  @JoinColumn({ name: 'fileId' })
  file?: FileEntity | null;

  @Column({ type: 'text' })
  accessLevel!: AccessLevel;

  @CreateDateColumn()
  createdAt!: Date;
}

/** Column values naming a target, the other column left null. */
export function permissionColumns(target: TargetRef): { folderId: number | null; fileId: number | null } {
  return target.kind === 'folder'
    ? { folderId: target.id, fileId: null }
    : { folderId: null, fileId: target.id };
}

export function permissionTarget(permission: PermissionEntity): TargetRef | null {
  if (permission.folderId !== null) return { kind: 'folder', id: permission.folderId };
  if (permission.fileId !== null) return { kind: 'file', id: permission.fileId };
  return null;
}
