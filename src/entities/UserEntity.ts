import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';
import type { Role } from '../types/access.js';

@Entity('users')
export class UserEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text', unique: true })
  username!: string;

  @Column({ type: 'text' })
  passwordHash!: string;

  @Column({ type: 'text', default: 'User' })
  role!: Role;

  @Column({ type: 'boolean', default: false })
  isActive!: boolean;

  @Column({ type: 'integer' })
  storageLimit!: number;

  @Column({ type: 'integer', default: 0 })
  usedStorage!: number;

  @CreateDateColumn()
  createdAt!: Date;
}
