import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitSyncSchema1760000000000 implements MigrationInterface {
  name = 'InitSyncSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE TABLE IF NOT EXISTS individual_accounts (
      id               SERIAL PRIMARY KEY,
      remote_id        BIGINT NOT NULL,
      login            VARCHAR(255) NOT NULL,
      display_name     VARCHAR(255),
      email            VARCHAR(255),
      avatar_url       VARCHAR(512),
      bio              TEXT,
      company          VARCHAR(255),
      location         VARCHAR(255),
      blog             VARCHAR(512),
      public_repos     INT NOT NULL DEFAULT 0,
      public_gists     INT NOT NULL DEFAULT 0,
      followers        INT NOT NULL DEFAULT 0,
      following        INT NOT NULL DEFAULT 0,
      is_active        BOOLEAN NOT NULL DEFAULT true,
      auto_sync        BOOLEAN NOT NULL DEFAULT true,
      last_synced_at   TIMESTAMPTZ,
      added_by_user_id INT NOT NULL,
      created_at       TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at       TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT "UQ_INDIVIDUAL_ACCOUNT_REMOTE_OWNER" UNIQUE (remote_id, added_by_user_id)
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS "IDX_INDIVIDUAL_ACCOUNT_LOGIN" ON individual_accounts (login)');

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS organization_accounts (
      id               SERIAL PRIMARY KEY,
      remote_id        BIGINT NOT NULL,
      login            VARCHAR(255) NOT NULL,
      display_name     VARCHAR(255),
      description      TEXT,
      email            VARCHAR(255),
      avatar_url       VARCHAR(512),
      company          VARCHAR(255),
      location         VARCHAR(255),
      blog             VARCHAR(512),
      public_repos     INT NOT NULL DEFAULT 0,
      public_gists     INT NOT NULL DEFAULT 0,
      followers        INT NOT NULL DEFAULT 0,
      following        INT NOT NULL DEFAULT 0,
      access_token     TEXT,
      scopes           TEXT,
      is_active        BOOLEAN NOT NULL DEFAULT true,
      auto_sync        BOOLEAN NOT NULL DEFAULT true,
      last_synced_at   TIMESTAMPTZ,
      added_by_user_id INT NOT NULL,
      created_at       TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at       TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT "UQ_ORGANIZATION_ACCOUNT_REMOTE_OWNER" UNIQUE (remote_id, added_by_user_id)
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS "IDX_ORGANIZATION_ACCOUNT_LOGIN" ON organization_accounts (login)');

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS repositories (
      id                             SERIAL PRIMARY KEY,
      name                           VARCHAR(255) NOT NULL,
      full_name                      VARCHAR(512),
      url                            VARCHAR(512) NOT NULL,
      clone_url                      VARCHAR(512),
      provider                       VARCHAR(20) NOT NULL DEFAULT 'github',
      external_id                    VARCHAR(255),
      description                    TEXT,
      default_branch                 VARCHAR(100) NOT NULL DEFAULT 'main',
      is_private                     BOOLEAN NOT NULL DEFAULT false,
      is_active                      BOOLEAN NOT NULL DEFAULT true,
      sync_status                    VARCHAR(20) NOT NULL DEFAULT 'pending',
      sync_error                     TEXT,
      sync_job_id                    VARCHAR(255),
      last_synced_at                 TIMESTAMPTZ,
      owner_id                       INT NOT NULL,
      source_organization_account_id INT REFERENCES organization_accounts (id) ON DELETE SET NULL,
      created_at                     TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at                     TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT "UQ_REPOSITORY_URL_OWNER" UNIQUE (url, owner_id),
      CONSTRAINT "CHK_REPOSITORY_SYNC_STATUS" CHECK (sync_status IN ('pending', 'syncing', 'completed', 'failed'))
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS "IDX_REPOSITORY_SYNC_STATUS" ON repositories (sync_status)');
    await queryRunner.query('CREATE INDEX IF NOT EXISTS "IDX_REPOSITORY_OWNER" ON repositories (owner_id)');

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS repository_selections (
      id                      SERIAL PRIMARY KEY,
      remote_repo_id          BIGINT NOT NULL,
      name                    VARCHAR(255) NOT NULL,
      full_name               VARCHAR(512) NOT NULL,
      description             TEXT,
      url                     VARCHAR(512) NOT NULL,
      clone_url               VARCHAR(512),
      default_branch          VARCHAR(100) NOT NULL DEFAULT 'main',
      is_private              BOOLEAN NOT NULL DEFAULT false,
      is_fork                 BOOLEAN NOT NULL DEFAULT false,
      is_archived             BOOLEAN NOT NULL DEFAULT false,
      stargazers_count        INT NOT NULL DEFAULT 0,
      watchers_count          INT NOT NULL DEFAULT 0,
      forks_count             INT NOT NULL DEFAULT 0,
      size                    INT NOT NULL DEFAULT 0,
      language                VARCHAR(100),
      status                  VARCHAR(20) NOT NULL DEFAULT 'pending',
      selected_at             TIMESTAMPTZ,
      repository_id           INT REFERENCES repositories (id) ON DELETE SET NULL,
      individual_account_id   INT REFERENCES individual_accounts (id) ON DELETE CASCADE,
      organization_account_id INT REFERENCES organization_accounts (id) ON DELETE CASCADE,
      selected_by_user_id     INT NOT NULL,
      created_at              TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at              TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT "CHK_SELECTION_SINGLE_SOURCE"
        CHECK ((individual_account_id IS NULL) <> (organization_account_id IS NULL))
    )`);
    await queryRunner.query(
      'CREATE UNIQUE INDEX IF NOT EXISTS "UQ_SELECTION_REMOTE_INDIVIDUAL" ON repository_selections (remote_repo_id, individual_account_id)',
    );
    await queryRunner.query(
      'CREATE UNIQUE INDEX IF NOT EXISTS "UQ_SELECTION_REMOTE_ORGANIZATION" ON repository_selections (remote_repo_id, organization_account_id)',
    );
    await queryRunner.query('CREATE INDEX IF NOT EXISTS "IDX_SELECTION_REPOSITORY" ON repository_selections (repository_id)');

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS developers (
      id             SERIAL PRIMARY KEY,
      name           VARCHAR(255) NOT NULL,
      email          VARCHAR(255) NOT NULL,
      git_name       VARCHAR(255),
      git_email      VARCHAR(255),
      user_id        INT,
      is_merged      BOOLEAN NOT NULL DEFAULT false,
      merged_with_id INT REFERENCES developers (id) ON DELETE SET NULL,
      is_active      BOOLEAN NOT NULL DEFAULT true,
      created_at     TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at     TIMESTAMPTZ NOT NULL DEFAULT now()
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS "IDX_DEVELOPER_EMAIL" ON developers (email)');

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS commits (
      id              SERIAL PRIMARY KEY,
      sha             VARCHAR(40) NOT NULL,
      message         TEXT NOT NULL,
      author_name     VARCHAR(255),
      author_email    VARCHAR(255),
      committer_name  VARCHAR(255),
      committer_email VARCHAR(255),
      commit_date     TIMESTAMPTZ NOT NULL,
      lines_added     INT NOT NULL DEFAULT 0,
      lines_removed   INT NOT NULL DEFAULT 0,
      files_changed   INT NOT NULL DEFAULT 0,
      files_added     TEXT NOT NULL,
      files_modified  TEXT NOT NULL,
      files_deleted   TEXT NOT NULL,
      parent_shas     TEXT NOT NULL,
      is_merge        BOOLEAN NOT NULL DEFAULT false,
      is_analyzed     BOOLEAN NOT NULL DEFAULT false,
      repository_id   INT NOT NULL REFERENCES repositories (id) ON DELETE CASCADE,
      developer_id    INT REFERENCES developers (id) ON DELETE SET NULL,
      created_at      TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT "UQ_COMMIT_REPOSITORY_SHA" UNIQUE (repository_id, sha)
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS "IDX_COMMIT_DATE" ON commits (commit_date DESC)');
    await queryRunner.query('CREATE INDEX IF NOT EXISTS "IDX_COMMIT_REPOSITORY" ON commits (repository_id)');
    await queryRunner.query('CREATE INDEX IF NOT EXISTS "IDX_COMMIT_DEVELOPER" ON commits (developer_id)');
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP TABLE IF EXISTS commits');
    await queryRunner.query('DROP TABLE IF EXISTS developers');
    await queryRunner.query('DROP TABLE IF EXISTS repository_selections');
    await queryRunner.query('DROP TABLE IF EXISTS repositories');
    await queryRunner.query('DROP TABLE IF EXISTS organization_accounts');
    await queryRunner.query('DROP TABLE IF EXISTS individual_accounts');
  }
}
