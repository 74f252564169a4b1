import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  Index,
} from 'typeorm';
import { FolderEntity } from './FolderEntity.js';
import { UserEntity } from './UserEntity.js';

@Entity('files')
export class FileEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  name!: string;

  @Column({ type: 'text', default: '' })
  extension!: string;

  @Column({ type: 'text', default: 'application/octet-stream' })
  mime!: string;

  @Column({ type: 'integer' })
  size!: number;

  // Opaque handle into blob storage
  @Column({ type: 'text' })
  physicalPath!: string;

  @Index()
  @Column({ type: 'integer' })
  folderId!: number;

  @ManyToOne(() => FolderEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'folderId' })
  folder?: FolderEntity;

  @Index()
  @Column({ type: 'integer' })
  ownerId!: number;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'ownerId' })
  owner?: UserEntity;

  @CreateDateColumn()
  uploadDate!: Date;

  @Column({ type: 'boolean', default: false })
  isDeleted!: boolean;

  @Column({ type: 'datetime', nullable: true })
  deletedAt!: Date | null;
}
