import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { bigintNumber } from '../database/transformers.js';

@Entity('individual_accounts')
@Index('UQ_INDIVIDUAL_ACCOUNT_REMOTE_OWNER', ['remoteId', 'addedByUserId'], { unique: true })
export class IndividualAccountEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('bigint', { name: 'remote_id', transformer: bigintNumber }) remoteId!: number;
  @Index('IDX_INDIVIDUAL_ACCOUNT_LOGIN')
  @Column('varchar', { length: 255 }) login!: string;

  @Column('varchar', { length: 255, nullable: true, name: 'display_name' }) displayName!: string | null;
  @Column('varchar', { length: 255, nullable: true }) email!: string | null;
  @Column('varchar', { length: 512, nullable: true, name: 'avatar_url' }) avatarUrl!: string | null;
  @Column('text', { nullable: true }) bio!: string | null;
  @Column('varchar', { length: 255, nullable: true }) company!: string | null;
  @Column('varchar', { length: 255, nullable: true }) location!: string | null;
  @Column('varchar', { length: 512, nullable: true }) blog!: string | null;

  @Column('int', { default: 0, name: 'public_repos' }) publicRepos!: number;
  @Column('int', { default: 0, name: 'public_gists' }) publicGists!: number;
  @Column('int', { default: 0 }) followers!: number;
  @Column('int', { default: 0 }) following!: number;

  @Column('boolean', { default: true, name: 'is_active' }) isActive!: boolean;
  @Column('boolean', { default: true, name: 'auto_sync' }) autoSync!: boolean;
  @Column('timestamptz', { nullable: true, name: 'last_synced_at' }) lastSyncedAt!: Date | null;

  @Column('int', { name: 'added_by_user_id' }) addedByUserId!: number;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' }) updatedAt!: Date;
}
