import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

@Entity('developers')
export class DeveloperEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('varchar', { length: 255 }) name!: string;

  // not unique: lookups take the lowest id
  @Index('IDX_DEVELOPER_EMAIL')
  @Column('varchar', { length: 255 }) email!: string;

  @Column('varchar', { length: 255, nullable: true, name: 'git_name' }) gitName!: string | null;
  @Column('varchar', { length: 255, nullable: true, name: 'git_email' }) gitEmail!: string | null;
  @Column('int', { nullable: true, name: 'user_id' }) userId!: number | null;

  @Column('boolean', { default: false, name: 'is_merged' }) isMerged!: boolean;
  @Column('int', { nullable: true, name: 'merged_with_id' }) mergedWithId!: number | null;
  @Column('boolean', { default: true, name: 'is_active' }) isActive!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' }) updatedAt!: Date;
}

export type DeveloperDraft = Pick<DeveloperEntity, 'name' | 'email' | 'gitName' | 'gitEmail'>;
