import axios, { isAxiosError, type AxiosInstance } from 'axios';
import type { Logger } from 'pino';

import type { EmbeddingProviderSettings, OpenAiProviderSettings } from './config';
import { ProviderError } from './errors';
import type { EmbeddingProviderName, EmbeddingVector } from './types';

export interface EmbeddingBatch {
  embeddings: EmbeddingVector[];
  totalTokens?: number;
}

export interface EmbeddingProvider {
  readonly name: EmbeddingProviderName;
  readonly model: string;
  readonly dimensions: number;
  embed(texts: string[]): Promise<EmbeddingBatch>;
}

export interface EmbeddingProviderFactoryOptions {
  settings: EmbeddingProviderSettings;
  dimensions: number;
  logger: Logger;
}

export class LocalDeterministicProvider implements EmbeddingProvider {
  readonly name: EmbeddingProviderName = 'local';
  readonly model = 'local-deterministic';
  readonly dimensions: number;

  constructor(dimensions: number) {
    this.dimensions = dimensions;
  }

  async embed(texts: string[]): Promise<EmbeddingBatch> {
    return { embeddings: texts.map((text) => this.embedText(text)) };
  }

  private embedText(text: string): EmbeddingVector {
    const normalized = text.trim().toLowerCase();
    let hash = 0;
    for (let i = 0; i < normalized.length; i += 1) {
      hash = (hash << 5) - hash + normalized.charCodeAt(i);
      hash |= 0;
    }

    const vector = Array.from({ length: this.dimensions }, (_, index) => Math.sin(hash + index) * 0.5);
    const magnitude = Math.sqrt(vector.reduce((acc, value) => acc + value * value, 0));
    return magnitude > 0 ? vector.map((value) => value / magnitude) : vector;
  }
}

interface OpenAiEmbeddingItem {
  index: number;
  embedding: number[];
}

function isEmbeddingItem(value: unknown): value is OpenAiEmbeddingItem {
  return (
    typeof value === 'object' &&
    value !== null &&
    'index' in value &&
    typeof value.index === 'number' &&
    'embedding' in value &&
    Array.isArray(value.embedding) &&
    value.embedding.every((entry: unknown) => typeof entry === 'number')
  );
}

function readTotalTokens(payload: object): number | undefined {
  if (!('usage' in payload) || typeof payload.usage !== 'object' || payload.usage === null) {
    return undefined;
  }

  const usage = payload.usage;
  return 'total_tokens' in usage && typeof usage.total_tokens === 'number' ? usage.total_tokens : undefined;
}

/**
 * Parses an OpenAI-style `/embeddings` response body, ordering vectors by
 * their `index` so they line up with the request's `input` array.
 */
export function parseEmbeddingResponse(body: unknown, expectedCount: number): EmbeddingBatch {
  if (typeof body !== 'object' || body === null) {
    throw new ProviderError('Embedding provider returned an empty response body.', { transient: false });
  }

  const data = 'data' in body ? body.data : undefined;
  if (!Array.isArray(data) || !data.every(isEmbeddingItem)) {
    throw new ProviderError('Embedding provider response did not include embedding data.', { transient: false });
  }

  if (data.length !== expectedCount) {
    throw new ProviderError(
      `Embedding provider returned ${data.length} vectors for a batch of ${expectedCount}.`,
      { transient: false }
    );
  }

  const embeddings = [...data].sort((a, b) => a.index - b.index).map((item) => item.embedding);

  return {
    embeddings,
    totalTokens: readTotalTokens(body)
  };
}

export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;

    if (status === undefined) {
      return new ProviderError(`Embedding provider request failed (${error.code ?? 'network error'}).`, {
        transient: true,
        cause: error
      });
    }

    const transient = status === 429 || status >= 500;
    return new ProviderError(`Embedding provider responded with status ${status}.`, {
      transient,
      status,
      cause: error
    });
  }

  return new ProviderError('Embedding provider request failed.', { transient: false, cause: error });
}

export class OpenAiCompatibleProvider implements EmbeddingProvider {
  readonly name: EmbeddingProviderName = 'openai';
  readonly model: string;
  readonly dimensions: number;
  private readonly http: AxiosInstance;

  constructor(settings: OpenAiProviderSettings, dimensions: number, http?: AxiosInstance) {
    this.model = settings.model;
    this.dimensions = dimensions;
    this.http =
      http ??
      axios.create({
        baseURL: settings.baseUrl,
        timeout: settings.timeoutMs,
        headers: {
          Authorization: `Bearer ${settings.apiKey ?? ''}`,
          'Content-Type': 'application/json'
        }
      });
  }

  async embed(texts: string[]): Promise<EmbeddingBatch> {
    try {
      const response = await this.http.post<unknown>('/embeddings', {
        model: this.model,
        input: texts,
        dimensions: this.dimensions
      });

      return parseEmbeddingResponse(response.data, texts.length);
    } catch (error) {
      throw toProviderError(error);
    }
  }
}

export function createEmbeddingProvider(options: EmbeddingProviderFactoryOptions): EmbeddingProvider {
  const { settings, dimensions, logger } = options;

  switch (settings.provider) {
    case 'openai':
      if (!settings.openai.apiKey) {
        logger.warn({ provider: 'openai' }, 'OPENAI_API_KEY not configured. Falling back to deterministic local provider.');
        return new LocalDeterministicProvider(dimensions);
      }
      return new OpenAiCompatibleProvider(settings.openai, dimensions);
    case 'local':
    default:
      return new LocalDeterministicProvider(dimensions);
  }
}
