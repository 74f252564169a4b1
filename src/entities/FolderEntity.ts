import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  Index,
} from 'typeorm';
import { UserEntity } from './UserEntity.js';

@Entity('folders')
export class FolderEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  name!: string;

  @Index()
  @Column({ type: 'integer' })
  ownerId!: number;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'ownerId' })
  owner?: UserEntity;

  // Null only for a user's root folder
  @Index()
  @Column({ type: 'integer', nullable: true })
  parentFolderId!: number | null;

  @ManyToOne(() => FolderEntity, { onDelete: 'CASCADE', nullable: true })
  @JoinColumn({ name: 'parentFolderId' })
  parentFolder?: FolderEntity | null;

  @Column({ type: 'boolean', default: false })
  isDeleted!: boolean;

  @Column({ type: 'datetime', nullable: true })
  deletedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;
}
