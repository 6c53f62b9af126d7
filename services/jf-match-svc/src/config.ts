import { getConfig as getBaseConfig, parseBoolean, type ServiceConfig } from '@jobfit/common';

import type { EmbeddingProviderName, WeightConfig } from './types';
import { createWeightConfig } from './weights';

export type RankingMode = 'pushdown' | 'scan';

export interface PgVectorSettings {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  poolMax: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  statementTimeoutMillis: number;
  schema: string;
  profilesTable: string;
  jobsTable: string;
  dimensions: number;
  enableAutoMigrate: boolean;
}

export interface OpenAiProviderSettings {
  baseUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

export interface EmbeddingProviderSettings {
  provider: EmbeddingProviderName;
  openai: OpenAiProviderSettings;
}

export interface EmbeddingGatewaySettings {
  dimensions: number;
  maxInputChars: number;
  retryAttempts: number;
  retryMinDelayMs: number;
  retryMaxDelayMs: number;
}

export interface MatchingSettings {
  weights: WeightConfig;
  rankingMode: RankingMode;
  defaultLimit: number;
  maxLimit: number;
  defaultMinScore: number;
  recommendationLimit: number;
  recommendationMinScore: number;
}

export interface MatchServiceConfig {
  base: ServiceConfig;
  pgvector: PgVectorSettings;
  providers: EmbeddingProviderSettings;
  gateway: EmbeddingGatewaySettings;
  matching: MatchingSettings;
}

let cachedConfig: MatchServiceConfig | null = null;

const PROVIDER_NAMES: readonly EmbeddingProviderName[] = ['openai', 'local'];
const RANKING_MODES: readonly RankingMode[] = ['pushdown', 'scan'];

function readRaw(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim().length === 0 ? undefined : value.trim();
}

function readChoice<T extends string>(name: string, choices: readonly T[], defaultValue: T): T {
  const raw = readRaw(name)?.toLowerCase();
  if (raw === undefined) {
    return defaultValue;
  }

  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${choices.join(', ')}, received "${raw}".`);
  }
  return match;
}

function readNumber(name: string, defaultValue: number): number {
  const raw = readRaw(name);
  if (raw === undefined) {
    return defaultValue;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, received "${raw}".`);
  }
  return parsed;
}

function readNonNegative(name: string, defaultValue: number): number {
  const value = readNumber(name, defaultValue);
  if (value < 0) {
    throw new Error(`${name} must not be negative, received ${value}.`);
  }
  return value;
}

function readPositiveInteger(name: string, defaultValue: number): number {
  const value = readNumber(name, defaultValue);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, received ${value}.`);
  }
  return value;
}

/** Scores are fractions; "70" where 0.7 was meant is rejected rather than clamped. */
function readScore(name: string, defaultValue: number): number {
  const value = readNumber(name, defaultValue);
  if (value < 0 || value > 1) {
    throw new Error(`${name} must be between 0 and 1, received ${value}.`);
  }
  return value;
}

/**
 * Reads the service configuration once. Unset or blank variables take their
 * defaults; a value that is set but invalid throws, which fails start-up.
 */
export function getMatchServiceConfig(): MatchServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const base = getBaseConfig();
  const dimensions = readPositiveInteger('EMBEDDING_DIMENSIONS', 768);

  const gateway: EmbeddingGatewaySettings = {
    dimensions,
    maxInputChars: readPositiveInteger('EMBEDDING_MAX_INPUT_CHARS', 8_000),
    retryAttempts: readPositiveInteger('EMBEDDING_RETRY_ATTEMPTS', 3),
    retryMinDelayMs: readNonNegative('EMBEDDING_RETRY_MIN_DELAY_MS', 2_000),
    retryMaxDelayMs: readNonNegative('EMBEDDING_RETRY_MAX_DELAY_MS', 10_000)
  };

  if (gateway.retryMaxDelayMs < gateway.retryMinDelayMs) {
    gateway.retryMaxDelayMs = gateway.retryMinDelayMs;
  }

  const pgvector: PgVectorSettings = {
    host: process.env.PGVECTOR_HOST ?? '127.0.0.1',
    port: readPositiveInteger('PGVECTOR_PORT', 5432),
    database: process.env.PGVECTOR_DATABASE ?? 'jobfit',
    user: process.env.PGVECTOR_USER ?? 'postgres',
    password: process.env.PGVECTOR_PASSWORD ?? '',
    ssl: parseBoolean(process.env.PGVECTOR_SSL, false),
    poolMax: readPositiveInteger('PGVECTOR_POOL_MAX', 10),
    idleTimeoutMillis: readNonNegative('PGVECTOR_IDLE_TIMEOUT_MS', 30_000),
    connectionTimeoutMillis: readNonNegative('PGVECTOR_CONNECTION_TIMEOUT_MS', 5_000),
    statementTimeoutMillis: readNonNegative('PGVECTOR_STATEMENT_TIMEOUT_MS', 30_000),
    schema: process.env.MATCH_PG_SCHEMA ?? 'matching',
    profilesTable: process.env.MATCH_PROFILES_TABLE ?? 'candidate_profiles',
    jobsTable: process.env.MATCH_JOBS_TABLE ?? 'job_postings',
    dimensions,
    enableAutoMigrate: parseBoolean(process.env.ENABLE_AUTO_MIGRATE, false)
  };

  const providers: EmbeddingProviderSettings = {
    provider: readChoice('EMBEDDING_PROVIDER', PROVIDER_NAMES, 'openai'),
    openai: {
      baseUrl: process.env.OPENAI_BASE_URL ?? 'https://api.openai.com/v1',
      apiKey: process.env.OPENAI_API_KEY,
      model: process.env.OPENAI_EMBEDDING_MODEL ?? 'text-embedding-3-small',
      timeoutMs: readPositiveInteger('EMBEDDING_PROVIDER_TIMEOUT_MS', 30_000)
    }
  };

  const matching: MatchingSettings = {
    weights: createWeightConfig({
      skills: readNumber('MATCH_WEIGHT_SKILLS', 0.4),
      experience: readNumber('MATCH_WEIGHT_EXPERIENCE', 0.35),
      goals: readNumber('MATCH_WEIGHT_GOALS', 0.25)
    }),
    rankingMode: readChoice('MATCH_RANKING_MODE', RANKING_MODES, 'pushdown'),
    defaultLimit: readPositiveInteger('MATCH_DEFAULT_LIMIT', 20),
    maxLimit: readPositiveInteger('MATCH_MAX_LIMIT', 100),
    defaultMinScore: readScore('MATCH_DEFAULT_MIN_SCORE', 0.6),
    recommendationLimit: readPositiveInteger('MATCH_RECOMMENDATION_LIMIT', 10),
    recommendationMinScore: readScore('MATCH_RECOMMENDATION_MIN_SCORE', 0.7)
  };

  if (matching.defaultLimit > matching.maxLimit) {
    throw new Error(
      `MATCH_DEFAULT_LIMIT must not exceed MATCH_MAX_LIMIT, received ${matching.defaultLimit} > ${matching.maxLimit}.`
    );
  }

  cachedConfig = {
    base,
    pgvector,
    providers,
    gateway,
    matching
  };

  return cachedConfig;
}

export function resetMatchServiceConfig(): void {
  cachedConfig = null;
}
