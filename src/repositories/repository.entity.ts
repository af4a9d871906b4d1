import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { RepositoryProvider } from '../source/source-client.interface.js';

export enum SyncStatus {
  PENDING = 'pending',
  SYNCING = 'syncing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

@Entity('repositories')
@Index('UQ_REPOSITORY_URL_OWNER', ['url', 'ownerId'], { unique: true })
export class RepositoryEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('varchar', { length: 255 }) name!: string;
  @Column('varchar', { length: 512, nullable: true, name: 'full_name' }) fullName!: string | null;
  @Column('varchar', { length: 512 }) url!: string;
  @Column('varchar', { length: 512, nullable: true, name: 'clone_url' }) cloneUrl!: string | null;

  @Column('varchar', { length: 20, default: RepositoryProvider.GITHUB })
  provider!: RepositoryProvider;

  @Column('varchar', { length: 255, nullable: true, name: 'external_id' }) externalId!: string | null;
  @Column('text', { nullable: true }) description!: string | null;
  @Column('varchar', { length: 100, default: 'main', name: 'default_branch' }) defaultBranch!: string;
  @Column('boolean', { default: false, name: 'is_private' }) isPrivate!: boolean;
  @Column('boolean', { default: true, name: 'is_active' }) isActive!: boolean;

  @Index('IDX_REPOSITORY_SYNC_STATUS')
  @Column('varchar', { length: 20, default: SyncStatus.PENDING, name: 'sync_status' })
  syncStatus!: SyncStatus;

  @Column('text', { nullable: true, name: 'sync_error' }) syncError!: string | null;

  // task that owns the current run; a redelivered task may resume it
  @Column('varchar', { length: 255, nullable: true, name: 'sync_job_id' }) syncJobId!: string | null;
  @Column('timestamptz', { nullable: true, name: 'last_synced_at' }) lastSyncedAt!: Date | null;

  @Index('IDX_REPOSITORY_OWNER')
  @Column('int', { name: 'owner_id' }) ownerId!: number;

  // org token to use for private organization repositories
  @Column('int', { nullable: true, name: 'source_organization_account_id' })
  sourceOrganizationAccountId!: number | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' }) updatedAt!: Date;
}

export type RepositoryDraft = Omit<RepositoryEntity, 'id' | 'createdAt' | 'updatedAt'>;

export type RepositoryPatch = Partial<
  Pick<
    RepositoryEntity,
    | 'description'
    | 'defaultBranch'
    | 'isPrivate'
    | 'isActive'
    | 'syncStatus'
    | 'syncError'
    | 'syncJobId'
    | 'lastSyncedAt'
  >
>;
