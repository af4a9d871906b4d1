import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { bigintNumber } from '../database/transformers.js';

export enum SelectionStatus {
  PENDING = 'pending', // not decided yet
  SELECTED = 'selected', // user wants to monitor it
  DESELECTED = 'deselected', // user explicitly does not
  SYNCED = 'synced', // promoted to a monitored repository
}

@Entity('repository_selections')
@Index('UQ_SELECTION_REMOTE_INDIVIDUAL', ['remoteRepoId', 'individualAccountId'], { unique: true })
@Index('UQ_SELECTION_REMOTE_ORGANIZATION', ['remoteRepoId', 'organizationAccountId'], { unique: true })
@Check(
  'CHK_SELECTION_SINGLE_SOURCE',
  '("individual_account_id" IS NULL) <> ("organization_account_id" IS NULL)',
)
export class RepositorySelectionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('bigint', { name: 'remote_repo_id', transformer: bigintNumber }) remoteRepoId!: number;
  @Column('varchar', { length: 255 }) name!: string;
  @Column('varchar', { length: 512, name: 'full_name' }) fullName!: string;
  @Column('text', { nullable: true }) description!: string | null;
  @Column('varchar', { length: 512 }) url!: string;
  @Column('varchar', { length: 512, nullable: true, name: 'clone_url' }) cloneUrl!: string | null;
  @Column('varchar', { length: 100, default: 'main', name: 'default_branch' }) defaultBranch!: string;
  @Column('boolean', { default: false, name: 'is_private' }) isPrivate!: boolean;
  @Column('boolean', { default: false, name: 'is_fork' }) isFork!: boolean;
  @Column('boolean', { default: false, name: 'is_archived' }) isArchived!: boolean;

  @Column('int', { default: 0, name: 'stargazers_count' }) stargazersCount!: number;
  @Column('int', { default: 0, name: 'watchers_count' }) watchersCount!: number;
  @Column('int', { default: 0, name: 'forks_count' }) forksCount!: number;
  @Column('int', { default: 0 }) size!: number;
  @Column('varchar', { length: 100, nullable: true }) language!: string | null;

  @Column('varchar', { length: 20, default: SelectionStatus.PENDING })
  status!: SelectionStatus;

  @Column('timestamptz', { nullable: true, name: 'selected_at' }) selectedAt!: Date | null;

  @Index('IDX_SELECTION_REPOSITORY')
  @Column('int', { nullable: true, name: 'repository_id' }) repositoryId!: number | null;

  @Column('int', { nullable: true, name: 'individual_account_id' }) individualAccountId!: number | null;
  @Column('int', { nullable: true, name: 'organization_account_id' }) organizationAccountId!: number | null;

  @Column('int', { name: 'selected_by_user_id' }) selectedByUserId!: number;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' }) updatedAt!: Date;
}

/** Descriptive fields reconciliation may overwrite. Status and selectedAt are not among them. */
export const MUTABLE_SELECTION_FIELDS = [
  'description',
  'stargazersCount',
  'watchersCount',
  'forksCount',
  'size',
  'language',
  'isArchived',
] as const;

export type MutableSelectionFields = Pick<
  RepositorySelectionEntity,
  (typeof MUTABLE_SELECTION_FIELDS)[number]
>;

export type SelectionDraft = Omit<RepositorySelectionEntity, 'id' | 'createdAt' | 'updatedAt'>;
