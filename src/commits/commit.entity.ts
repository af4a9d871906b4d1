import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('commits')
@Index('UQ_COMMIT_REPOSITORY_SHA', ['repositoryId', 'sha'], { unique: true })
export class CommitEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('varchar', { length: 40 }) sha!: string;
  @Column('text') message!: string;

  @Column('varchar', { length: 255, nullable: true, name: 'author_name' }) authorName!: string | null;
  @Column('varchar', { length: 255, nullable: true, name: 'author_email' }) authorEmail!: string | null;
  @Column('varchar', { length: 255, nullable: true, name: 'committer_name' }) committerName!: string | null;
  @Column('varchar', { length: 255, nullable: true, name: 'committer_email' }) committerEmail!: string | null;

  @Index('IDX_COMMIT_DATE')
  @Column('timestamptz', { name: 'commit_date' }) commitDate!: Date;

  @Column('int', { default: 0, name: 'lines_added' }) linesAdded!: number;
  @Column('int', { default: 0, name: 'lines_removed' }) linesRemoved!: number;
  @Column('int', { default: 0, name: 'files_changed' }) filesChanged!: number;

  @Column('simple-json', { name: 'files_added' }) filesAdded!: string[];
  @Column('simple-json', { name: 'files_modified' }) filesModified!: string[];
  @Column('simple-json', { name: 'files_deleted' }) filesDeleted!: string[];
  @Column('simple-json', { name: 'parent_shas' }) parentShas!: string[];

  @Column('boolean', { default: false, name: 'is_merge' }) isMerge!: boolean;
  @Column('boolean', { default: false, name: 'is_analyzed' }) isAnalyzed!: boolean;

  @Index('IDX_COMMIT_REPOSITORY')
  @Column('int', { name: 'repository_id' }) repositoryId!: number;

  @Index('IDX_COMMIT_DEVELOPER')
  @Column('int', { nullable: true, name: 'developer_id' }) developerId!: number | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' }) createdAt!: Date;
}

export type CommitDraft = Omit<CommitEntity, 'id' | 'createdAt'>;
