import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';
import type { TargetKind, TargetRef } from '../types/access.js';

// The target is referenced without a foreign key: a purged target leaves the
// link in place so it resolves as gone rather than unknown.
@Entity('share_links')
@Index(['targetType', 'targetId'])
export class ShareLinkEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text', unique: true })
  token!: string;

  @Column({ type: 'text' })
  targetType!: TargetKind;

  @Column({ type: 'integer' })
  targetId!: number;

  @Index()
  @Column({ type: 'integer' })
  creatorId!: number;

  @Column({ type: 'datetime', nullable: true })
  expirationDate!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;
}

export function linkTarget(link: ShareLinkEntity): TargetRef {
  return { kind: link.targetType, id: link.targetId };
}
