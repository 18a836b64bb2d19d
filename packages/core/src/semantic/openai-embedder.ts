/**
 * @module semantic/openai-embedder
 * Embedder backed by the OpenAI embeddings endpoint.
 */

import OpenAI from 'openai';
import { DeskmateError } from '../errors.js';
import type { Embedder } from './embedder.js';

export interface OpenAIEmbedderConfig {
  apiKey?: string;
  apiKeyEnv?: string;
  model?: string;
  /** Max texts per request. Default: 100. */
  batchSize?: number;
  /** Injected client, mainly for tests. */
  client?: OpenAI;
}

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly batchSize: number;

  constructor(config: OpenAIEmbedderConfig) {
    this.model = config.model ?? DEFAULT_EMBEDDING_MODEL;
    this.batchSize = Math.max(1, config.batchSize ?? 100);

    if (config.client) {
      this.client = config.client;
      return;
    }

    const apiKey = config.apiKey ?? (config.apiKeyEnv ? process.env[config.apiKeyEnv] : undefined);
    if (!apiKey) {
      throw new DeskmateError(
        'CAPABILITY_UNAVAILABLE',
        `Missing API key for OpenAI embeddings. Checked config.apiKey and env var ${config.apiKeyEnv ?? '(none)'}`,
        { provider: 'openai' },
      );
    }
    this.client = new OpenAI({ apiKey });
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const response = await this.client.embeddings.create({ model: this.model, input: batch });
      // Embeddings come back in input order.
      vectors.push(...response.data.map((d) => d.embedding));
    }
    return vectors;
  }

  id(): string {
    return `openai:${this.model}`;
  }
}
