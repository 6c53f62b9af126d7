import pino from 'pino';
import { describe, expect, it } from 'vitest';

import type { EmbeddingGatewaySettings } from '../config';
import { EmbeddingGateway, truncateText } from '../embedding-gateway';
import type { EmbeddingBatch, EmbeddingProvider } from '../embedding-provider';
import { ProviderError } from '../errors';
import type { EmbeddingProviderName } from '../types';

const logger = pino({ level: 'silent' });

const settings: EmbeddingGatewaySettings = {
  dimensions: 3,
  maxInputChars: 8_000,
  retryAttempts: 3,
  retryMinDelayMs: 0,
  retryMaxDelayMs: 0
};

type Behaviour = (texts: string[], call: number) => Promise<EmbeddingBatch>;

class FakeProvider implements EmbeddingProvider {
  readonly name: EmbeddingProviderName = 'local';
  readonly model = 'fake-model';
  readonly calls: string[][] = [];

  constructor(readonly dimensions: number, private readonly behaviour: Behaviour) {}

  async embed(texts: string[]): Promise<EmbeddingBatch> {
    this.calls.push(texts);
    return this.behaviour(texts, this.calls.length);
  }
}

const lengthVectors: Behaviour = async (texts) => ({
  embeddings: texts.map((text) => [text.length, 1, 0])
});

function gatewayWith(provider: FakeProvider, overrides: Partial<EmbeddingGatewaySettings> = {}): EmbeddingGateway {
  return new EmbeddingGateway({ provider, settings: { ...settings, ...overrides }, logger });
}

describe('EmbeddingGateway', () => {
  it('returns the zero vector for whitespace-only text without calling the provider', async () => {
    const provider = new FakeProvider(3, lengthVectors);

    await expect(gatewayWith(provider).embedOne('   \n\t')).resolves.toEqual([0, 0, 0]);
    expect(provider.calls).toHaveLength(0);
  });

  it('returns an empty list for an empty batch', async () => {
    const provider = new FakeProvider(3, lengthVectors);

    await expect(gatewayWith(provider).embedMany([])).resolves.toEqual([]);
    expect(provider.calls).toHaveLength(0);
  });

  it('sends only non-empty texts in one call and keeps the input order', async () => {
    const provider = new FakeProvider(3, lengthVectors);

    const vectors = await gatewayWith(provider).embedMany(['ab', '  ', ' abcd ']);

    expect(provider.calls).toEqual([['ab', 'abcd']]);
    expect(vectors).toEqual([
      [2, 1, 0],
      [0, 0, 0],
      [4, 1, 0]
    ]);
  });

  it('truncates long text to the configured maximum', async () => {
    const provider = new FakeProvider(3, lengthVectors);

    await gatewayWith(provider).embedOne('a'.repeat(9_000));

    expect(provider.calls[0][0]).toHaveLength(8_000);
  });

  it('retries transient failures and succeeds', async () => {
    const provider = new FakeProvider(3, async (texts, call) => {
      if (call < 3) {
        throw new ProviderError('Embedding provider responded with status 503.', { transient: true, status: 503 });
      }
      return lengthVectors(texts, call);
    });

    await expect(gatewayWith(provider).embedOne('abc')).resolves.toEqual([3, 1, 0]);
    expect(provider.calls).toHaveLength(3);
  });

  it('gives up after the configured number of attempts', async () => {
    const provider = new FakeProvider(3, async () => {
      throw new ProviderError('Embedding provider responded with status 429.', { transient: true, status: 429 });
    });

    const error = await gatewayWith(provider)
      .embedOne('abc')
      .then(
        () => null,
        (reason: unknown) => reason
      );

    expect(provider.calls).toHaveLength(3);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ transient: true, status: 429, attempts: 3, statusCode: 503 });
  });

  it('does not retry permanent failures', async () => {
    const provider = new FakeProvider(3, async () => {
      throw new ProviderError('Embedding provider responded with status 401.', { transient: false, status: 401 });
    });

    await expect(gatewayWith(provider).embedOne('abc')).rejects.toMatchObject({
      transient: false,
      status: 401,
      attempts: 1
    });
    expect(provider.calls).toHaveLength(1);
  });

  it('rejects vectors of the wrong dimension', async () => {
    const provider = new FakeProvider(3, async () => ({ embeddings: [[1, 0]] }));

    await expect(gatewayWith(provider).embedOne('abc')).rejects.toThrow(
      'Embedding dimensionality mismatch. Expected 3, received 2.'
    );
    expect(provider.calls).toHaveLength(1);
  });

  it('rejects a batch with the wrong number of vectors', async () => {
    const provider = new FakeProvider(3, async () => ({ embeddings: [[1, 0, 0]] }));

    await expect(gatewayWith(provider).embedMany(['a', 'b'])).rejects.toThrow(
      'Embedding provider returned 1 vectors for a batch of 2.'
    );
  });

  it('rejects non-finite values', async () => {
    const provider = new FakeProvider(3, async () => ({ embeddings: [[1, Number.NaN, 0]] }));

    await expect(gatewayWith(provider).embedOne('abc')).rejects.toThrow(
      'Embedding vector must contain only finite numbers.'
    );
  });

  it('refuses a provider whose dimensionality differs from the configuration', () => {
    expect(() => gatewayWith(new FakeProvider(4, lengthVectors))).toThrow(ProviderError);
  });

  it('embeds profile and job fields by name', async () => {
    const provider = new FakeProvider(3, lengthVectors);
    const gateway = gatewayWith(provider);

    await expect(gateway.embedProfile('a', 'bb', '')).resolves.toEqual({
      skills: [1, 1, 0],
      experience: [2, 1, 0],
      goals: [0, 0, 0]
    });
    await expect(gateway.embedJob('ccc', 'dddd')).resolves.toEqual({
      description: [3, 1, 0],
      requirements: [4, 1, 0]
    });
  });
});

describe('truncateText', () => {
  it('leaves short text untouched', () => {
    expect(truncateText('hello', 10)).toBe('hello');
  });

  it('cuts to the limit', () => {
    expect(truncateText('abcdef', 4)).toBe('abcd');
  });

  it('does not split a surrogate pair', () => {
    expect(truncateText('abc\u{1F600}', 4)).toBe('abc');
  });
});
