import { Pool, type PoolClient } from 'pg';
import { registerType, toSql } from 'pgvector/pg';
import type { Logger } from 'pino';

import type { PgVectorSettings } from './config';
import { toDatastoreError } from './errors';
import type {
  CandidateQuery,
  EmbeddingVector,
  JobEmbeddingSet,
  JobRecord,
  ProfileEmbeddingSet,
  ProfileRecord,
  RankedCandidate
} from './types';

const VECTOR_TYPE_NAME = 'vector';

type ProfileRow = {
  profile_id: string;
  skills_text: string;
  experience_text: string;
  goals_text: string;
  skills_embedding: unknown;
  experience_embedding: unknown;
  goals_embedding: unknown;
  created_at: unknown;
  updated_at: unknown;
};

type JobRow = {
  job_id: string;
  title: string;
  company: string | null;
  location: string | null;
  description_text: string;
  requirements_text: string;
  description_embedding: unknown;
  requirements_embedding: unknown;
  is_active: boolean;
  created_at: unknown;
  updated_at: unknown;
};

type RankedJobRow = JobRow & {
  compatibility_score: number | string | null;
};

export interface UpsertProfileInput {
  profileId: string;
  skillsText: string;
  experienceText: string;
  goalsText: string;
  embeddings: ProfileEmbeddingSet;
}

export interface UpsertJobInput {
  jobId: string;
  title: string;
  company: string | null;
  location: string | null;
  descriptionText: string;
  requirementsText: string;
  embeddings: JobEmbeddingSet;
  isActive: boolean;
}

export interface PgVectorHealth {
  status: 'healthy' | 'degraded' | 'unhealthy';
  activeJobs: number;
  profiles: number;
  poolSize: number;
  message?: string;
}

/**
 * Reads a pgvector column. The registered type parser yields number arrays;
 * without it the driver hands back the `[1,2,3]` text form.
 */
export function parseVector(value: unknown): EmbeddingVector {
  if (value === null || value === undefined) {
    return [];
  }

  if (Array.isArray(value) && value.every((entry: unknown) => typeof entry === 'number')) {
    return [...value];
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
      const body = trimmed.slice(1, -1).trim();
      if (body.length === 0) {
        return [];
      }
      const parsed = body.split(',').map((entry) => Number(entry));
      if (parsed.every((entry) => Number.isFinite(entry))) {
        return parsed;
      }
    }
  }

  throw new Error('Unrecognized vector column value.');
}

function toIsoString(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  return new Date().toISOString();
}

function mapProfileRow(row: ProfileRow): ProfileRecord {
  return {
    profileId: row.profile_id,
    skillsText: row.skills_text,
    experienceText: row.experience_text,
    goalsText: row.goals_text,
    embeddings: {
      skills: parseVector(row.skills_embedding),
      experience: parseVector(row.experience_embedding),
      goals: parseVector(row.goals_embedding)
    },
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at)
  };
}

function mapJobRow(row: JobRow): JobRecord {
  return {
    jobId: row.job_id,
    title: row.title,
    company: row.company,
    location: row.location,
    descriptionText: row.description_text,
    requirementsText: row.requirements_text,
    embeddings: {
      description: parseVector(row.description_embedding),
      requirements: parseVector(row.requirements_embedding)
    },
    isActive: row.is_active,
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at)
  };
}

/**
 * SQL for one clamped cosine similarity term. pgvector yields NaN for a zero
 * vector, which scores 0 here just as it does in the engine.
 */
export function similarityTerm(column: string, parameter: string): string {
  return `GREATEST(0, LEAST(1, COALESCE(NULLIF(1 - (${column} <=> ${parameter}), 'NaN'::float8), 0)))`;
}

export class PgVectorClient {
  private readonly pool: Pool;
  private initialized = false;
  private schemaSetupDone = false;
  private readonly schema: string;
  private readonly profilesTable: string;
  private readonly jobsTable: string;
  private readonly dimensions: number;

  constructor(private readonly config: PgVectorSettings, private readonly logger: Logger) {
    this.schema = config.schema;
    this.profilesTable = `${config.schema}.${config.profilesTable}`;
    this.jobsTable = `${config.schema}.${config.jobsTable}`;
    this.dimensions = config.dimensions;

    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.poolMax,
      idleTimeoutMillis: config.idleTimeoutMillis,
      connectionTimeoutMillis: config.connectionTimeoutMillis,
      statement_timeout: config.statementTimeoutMillis
    });

    this.pool.on('connect', (client) => {
      Promise.resolve(registerType(client)).catch((error: unknown) => {
        this.logger.error({ error }, 'Failed to register the vector type on a new connection.');
      });
    });
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    // Connection and schema checks happen on first use.
    this.initialized = true;
    this.logger.info('PgVectorClient initialized (connection will be established on first use)');
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.initialized = false;
    this.schemaSetupDone = false;
  }

  async upsertProfile(input: UpsertProfileInput): Promise<ProfileRecord> {
    await this.initialize();

    return this.withClient(async (client) => {
      const result = await client.query<ProfileRow>({
        text: `
          INSERT INTO ${this.profilesTable}
            (profile_id, skills_text, experience_text, goals_text,
             skills_embedding, experience_embedding, goals_embedding, created_at, updated_at)
          VALUES ($1, $2, $3, $4, $5, $6, $7, timezone('utc', now()), timezone('utc', now()))
          ON CONFLICT (profile_id)
          DO UPDATE SET
            skills_text = EXCLUDED.skills_text,
            experience_text = EXCLUDED.experience_text,
            goals_text = EXCLUDED.goals_text,
            skills_embedding = EXCLUDED.skills_embedding,
            experience_embedding = EXCLUDED.experience_embedding,
            goals_embedding = EXCLUDED.goals_embedding,
            updated_at = timezone('utc', now())
          RETURNING *;
        `,
        values: [
          input.profileId,
          input.skillsText,
          input.experienceText,
          input.goalsText,
          toSql(input.embeddings.skills),
          toSql(input.embeddings.experience),
          toSql(input.embeddings.goals)
        ]
      });

      return mapProfileRow(result.rows[0]);
    });
  }

  async upsertJob(input: UpsertJobInput): Promise<JobRecord> {
    await this.initialize();

    return this.withClient(async (client) => {
      const result = await client.query<JobRow>({
        text: `
          INSERT INTO ${this.jobsTable}
            (job_id, title, company, location, description_text, requirements_text,
             description_embedding, requirements_embedding, is_active, created_at, updated_at)
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, timezone('utc', now()), timezone('utc', now()))
          ON CONFLICT (job_id)
          DO UPDATE SET
            title = EXCLUDED.title,
            company = EXCLUDED.company,
            location = EXCLUDED.location,
            description_text = EXCLUDED.description_text,
            requirements_text = EXCLUDED.requirements_text,
            description_embedding = EXCLUDED.description_embedding,
            requirements_embedding = EXCLUDED.requirements_embedding,
            is_active = EXCLUDED.is_active,
            updated_at = timezone('utc', now())
          RETURNING *;
        `,
        values: [
          input.jobId,
          input.title,
          input.company,
          input.location,
          input.descriptionText,
          input.requirementsText,
          toSql(input.embeddings.description),
          toSql(input.embeddings.requirements),
          input.isActive
        ]
      });

      return mapJobRow(result.rows[0]);
    });
  }

  async getProfile(profileId: string): Promise<ProfileRecord | null> {
    await this.initialize();

    return this.withClient(async (client) => {
      const result = await client.query<ProfileRow>(
        `SELECT * FROM ${this.profilesTable} WHERE profile_id = $1`,
        [profileId]
      );
      const row = result.rows[0];
      return row ? mapProfileRow(row) : null;
    });
  }

  async getJob(jobId: string): Promise<JobRecord | null> {
    await this.initialize();

    return this.withClient(async (client) => {
      const result = await client.query<JobRow>(`SELECT * FROM ${this.jobsTable} WHERE job_id = $1`, [jobId]);
      const row = result.rows[0];
      return row ? mapJobRow(row) : null;
    });
  }

  async setJobActive(jobId: string, isActive: boolean): Promise<JobRecord | null> {
    await this.initialize();

    return this.withClient(async (client) => {
      const result = await client.query<JobRow>(
        `UPDATE ${this.jobsTable}
            SET is_active = $2, updated_at = timezone('utc', now())
          WHERE job_id = $1
          RETURNING *;`,
        [jobId, isActive]
      );
      const row = result.rows[0];
      return row ? mapJobRow(row) : null;
    });
  }

  async listActiveJobs(): Promise<JobRecord[]> {
    await this.initialize();

    return this.withClient(async (client) => {
      const result = await client.query<JobRow>(
        `SELECT * FROM ${this.jobsTable} WHERE is_active = TRUE ORDER BY updated_at DESC, job_id ASC`
      );
      return result.rows.map(mapJobRow);
    });
  }

  /**
   * Ranks active jobs by the weighted compatibility formula inside Postgres
   * and returns the best `limit` of them.
   */
  async rankActiveJobs(query: CandidateQuery): Promise<Array<RankedCandidate<JobRecord>>> {
    await this.initialize();

    return this.withClient(async (client) => {
      const scoreExpression = [
        `${similarityTerm('description_embedding', '$1::vector')} * $4::float8`,
        `${similarityTerm('requirements_embedding', '$2::vector')} * $5::float8`,
        `${similarityTerm('description_embedding', '$3::vector')} * $6::float8`
      ].join('\n            + ');

      const result = await client.query<RankedJobRow>({
        text: `
          SELECT *,
            (${scoreExpression}) AS compatibility_score
          FROM ${this.jobsTable}
          WHERE is_active = TRUE
          ORDER BY compatibility_score DESC, updated_at DESC, job_id ASC
          LIMIT $7;
        `,
        values: [
          toSql(query.profile.skills),
          toSql(query.profile.experience),
          toSql(query.profile.goals),
          query.weights.skills,
          query.weights.experience,
          query.weights.goals,
          query.limit
        ]
      });

      return result.rows.map((row) => {
        const job = mapJobRow(row);
        const preliminaryScore = Number(row.compatibility_score ?? 0);
        return {
          jobId: job.jobId,
          job,
          embeddings: job.embeddings,
          preliminaryScore: Number.isFinite(preliminaryScore) ? preliminaryScore : 0
        } satisfies RankedCandidate<JobRecord>;
      });
    });
  }

  async healthCheck(): Promise<PgVectorHealth> {
    try {
      await this.initialize();

      const counts = await this.withClient(async (client) => {
        const result = await client.query<{ active_jobs: string | number; profiles: string | number }>(
          `SELECT
             (SELECT COUNT(*) FROM ${this.jobsTable} WHERE is_active = TRUE) AS active_jobs,
             (SELECT COUNT(*) FROM ${this.profilesTable}) AS profiles`
        );
        const row = result.rows[0];
        return {
          activeJobs: Number(row?.active_jobs ?? 0),
          profiles: Number(row?.profiles ?? 0)
        };
      });

      return {
        status: 'healthy',
        ...counts,
        poolSize: this.pool.totalCount
      } satisfies PgVectorHealth;
    } catch (error) {
      this.logger.error({ error }, 'PgVector health check failed.');
      return {
        status: 'unhealthy',
        activeJobs: 0,
        profiles: 0,
        poolSize: this.pool.totalCount,
        message: error instanceof Error ? error.message : 'Unknown error'
      } satisfies PgVectorHealth;
    }
  }

  private async setupDatabaseIfNeeded(client: PoolClient): Promise<void> {
    if (this.config.enableAutoMigrate) {
      await this.ensureExtensions(client);
      await this.ensureSchema(client);
      await this.ensureTables(client);
    } else {
      await this.verifyExtensions(client);
      await this.verifyTables(client);
    }
  }

  private async ensureExtensions(client: PoolClient): Promise<void> {
    await client.query('CREATE EXTENSION IF NOT EXISTS "vector"');
  }

  private async ensureSchema(client: PoolClient): Promise<void> {
    await client.query(`CREATE SCHEMA IF NOT EXISTS ${this.schema}`);
  }

  private async ensureTables(client: PoolClient): Promise<void> {
    await client.query(`
      CREATE TABLE IF NOT EXISTS ${this.profilesTable} (
        profile_id TEXT PRIMARY KEY,
        skills_text TEXT NOT NULL DEFAULT '',
        experience_text TEXT NOT NULL DEFAULT '',
        goals_text TEXT NOT NULL DEFAULT '',
        skills_embedding ${VECTOR_TYPE_NAME}(${this.dimensions}) NOT NULL,
        experience_embedding ${VECTOR_TYPE_NAME}(${this.dimensions}) NOT NULL,
        goals_embedding ${VECTOR_TYPE_NAME}(${this.dimensions}) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT timezone('utc', now()),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT timezone('utc', now())
      );
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS ${this.jobsTable} (
        job_id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        company TEXT,
        location TEXT,
        description_text TEXT NOT NULL DEFAULT '',
        requirements_text TEXT NOT NULL DEFAULT '',
        description_embedding ${VECTOR_TYPE_NAME}(${this.dimensions}) NOT NULL,
        requirements_embedding ${VECTOR_TYPE_NAME}(${this.dimensions}) NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT timezone('utc', now()),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT timezone('utc', now())
      );
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS ${this.config.jobsTable}_active_idx
        ON ${this.jobsTable} (is_active, updated_at DESC);
    `);

    for (const column of ['description_embedding', 'requirements_embedding']) {
      await client.query(`
        CREATE INDEX IF NOT EXISTS ${this.config.jobsTable}_${column}_hnsw_idx
          ON ${this.jobsTable} USING hnsw (${column} vector_cosine_ops)
          WITH (m = 16, ef_construction = 64);
      `);
    }
  }

  private async verifyExtensions(client: PoolClient): Promise<void> {
    const result = await client.query(`SELECT 1 FROM pg_extension WHERE extname = $1`, [VECTOR_TYPE_NAME]);
    if (result.rowCount === 0) {
      throw new Error('vector extension is not installed. Enable ENABLE_AUTO_MIGRATE or run the managed migrations.');
    }
  }

  private async verifyTables(client: PoolClient): Promise<void> {
    const tables = [this.config.profilesTable, this.config.jobsTable];

    for (const table of tables) {
      const exists = await client.query(
        `SELECT table_name FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2`,
        [this.schema, table]
      );

      if (exists.rowCount === 0) {
        throw new Error(
          `Table ${this.schema}.${table} is missing. Run migrations or set ENABLE_AUTO_MIGRATE=true for bootstrap.`
        );
      }
    }
  }

  /** Runs `handler` on a pooled client. Every failure surfaces as a `DatastoreError`. */
  private async withClient<T>(handler: (client: PoolClient) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw toDatastoreError(error);
    }

    try {
      if (!this.schemaSetupDone) {
        await this.setupDatabaseIfNeeded(client);
        this.schemaSetupDone = true;
        this.logger.info('Database schema setup completed');
      }
      return await handler(client);
    } catch (error) {
      throw toDatastoreError(error);
    } finally {
      client.release();
    }
  }
}
