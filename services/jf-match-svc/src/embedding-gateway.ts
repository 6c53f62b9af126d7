import { getLogger } from '@jobfit/common';
import pRetry, { AbortError } from 'p-retry';
import type { Logger } from 'pino';

import type { EmbeddingGatewaySettings } from './config';
import { toProviderError, type EmbeddingBatch, type EmbeddingProvider } from './embedding-provider';
import { ProviderError } from './errors';
import type { EmbeddingVector, JobEmbeddingSet, ProfileEmbeddingSet } from './types';
import { zeroVector } from './vector-math';

export interface EmbeddingGatewayOptions {
  provider: EmbeddingProvider;
  settings: EmbeddingGatewaySettings;
  logger?: Logger;
}

interface PendingText {
  index: number;
  text: string;
}

/**
 * Cuts `text` to at most `maxChars` UTF-16 code units without leaving half of
 * a surrogate pair at the end.
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }

  const cut = text.slice(0, maxChars);
  const last = cut.charCodeAt(cut.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut;
}

export class EmbeddingGateway {
  private readonly provider: EmbeddingProvider;
  private readonly settings: EmbeddingGatewaySettings;
  private readonly logger: Logger;

  constructor({ provider, settings, logger }: EmbeddingGatewayOptions) {
    if (provider.dimensions !== settings.dimensions) {
      throw new ProviderError(
        `Embedding provider dimensionality (${provider.dimensions}) does not match configured dimensions (${settings.dimensions}).`,
        { transient: false }
      );
    }

    this.provider = provider;
    this.settings = settings;
    this.logger = logger ?? getLogger({ module: 'embedding-gateway' });
  }

  get dimensions(): number {
    return this.settings.dimensions;
  }

  async embedOne(text: string): Promise<EmbeddingVector> {
    const [embedding] = await this.embedMany([text]);
    return embedding;
  }

  /**
   * Embeds every text, sending the non-empty ones to the provider as a single
   * batch. Empty or whitespace-only texts map to the zero vector.
   */
  async embedMany(texts: readonly string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) {
      return [];
    }

    const pending: PendingText[] = [];
    texts.forEach((text, index) => {
      const prepared = this.prepareText(text, index);
      if (prepared !== null) {
        pending.push({ index, text: prepared });
      }
    });

    const results = texts.map(() => zeroVector(this.settings.dimensions));

    if (pending.length === 0) {
      this.logger.debug({ count: texts.length }, 'All texts empty; returning zero vectors without calling the provider.');
      return results;
    }

    if (pending.length < texts.length) {
      this.logger.debug(
        { emptyCount: texts.length - pending.length, count: texts.length },
        'Empty texts mapped to zero vectors.'
      );
    }

    const batch = await this.callProvider(pending.map((entry) => entry.text));
    this.validateBatch(batch, pending.length);

    pending.forEach((entry, position) => {
      results[entry.index] = batch.embeddings[position];
    });

    return results;
  }

  async embedProfile(skills: string, experience: string, goals: string): Promise<ProfileEmbeddingSet> {
    const [skillsEmbedding, experienceEmbedding, goalsEmbedding] = await this.embedMany([skills, experience, goals]);

    return {
      skills: skillsEmbedding,
      experience: experienceEmbedding,
      goals: goalsEmbedding
    };
  }

  async embedJob(description: string, requirements: string): Promise<JobEmbeddingSet> {
    const [descriptionEmbedding, requirementsEmbedding] = await this.embedMany([description, requirements]);

    return {
      description: descriptionEmbedding,
      requirements: requirementsEmbedding
    };
  }

  private prepareText(text: string, index: number): string | null {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return null;
    }

    const { maxInputChars } = this.settings;
    if (trimmed.length > maxInputChars) {
      this.logger.warn(
        { index, originalLength: trimmed.length, maxInputChars },
        'Text truncated before embedding.'
      );
      return truncateText(trimmed, maxInputChars);
    }

    return trimmed;
  }

  private async callProvider(texts: string[]): Promise<EmbeddingBatch> {
    const { retryAttempts, retryMinDelayMs, retryMaxDelayMs } = this.settings;
    const started = Date.now();
    let attempts = 0;

    try {
      const batch = await pRetry(
        async () => {
          attempts += 1;
          try {
            return await this.provider.embed(texts);
          } catch (error) {
            const providerError = toProviderError(error);
            if (!providerError.transient) {
              throw new AbortError(providerError);
            }
            throw providerError;
          }
        },
        {
          retries: Math.max(0, retryAttempts - 1),
          factor: 2,
          minTimeout: retryMinDelayMs,
          maxTimeout: retryMaxDelayMs,
          randomize: true,
          onFailedAttempt: (error) => {
            this.logger.warn(
              {
                provider: this.provider.name,
                attempt: error.attemptNumber,
                retriesLeft: error.retriesLeft,
                err: error.message
              },
              'Embedding provider call failed.'
            );
          }
        }
      );

      this.logger.info(
        {
          provider: this.provider.name,
          model: this.provider.model,
          batchSize: texts.length,
          tokens: batch.totalTokens,
          attempts,
          durationMs: Date.now() - started
        },
        'Embedding provider call completed.'
      );

      return batch;
    } catch (error) {
      const providerError = toProviderError(error).withAttempts(attempts);
      this.logger.error(
        {
          provider: this.provider.name,
          model: this.provider.model,
          batchSize: texts.length,
          attempts,
          transient: providerError.transient,
          status: providerError.status,
          durationMs: Date.now() - started
        },
        'Embedding provider call failed permanently.'
      );
      throw providerError;
    }
  }

  private validateBatch(batch: EmbeddingBatch, expectedCount: number): void {
    if (batch.embeddings.length !== expectedCount) {
      throw new ProviderError(
        `Embedding provider returned ${batch.embeddings.length} vectors for a batch of ${expectedCount}.`,
        { transient: false }
      );
    }

    for (const embedding of batch.embeddings) {
      if (embedding.length !== this.settings.dimensions) {
        throw new ProviderError(
          `Embedding dimensionality mismatch. Expected ${this.settings.dimensions}, received ${embedding.length}.`,
          { transient: false }
        );
      }

      if (!embedding.every((value) => Number.isFinite(value))) {
        throw new ProviderError('Embedding vector must contain only finite numbers.', { transient: false });
      }
    }
  }
}
