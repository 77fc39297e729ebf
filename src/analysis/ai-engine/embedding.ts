/**
 * 文本向量化
 */

import OpenAI from 'openai';
import { AIEngineError } from './interface';
import { toError } from '../../collection/utils/error-handler';

export interface EmbeddingProvider {
  /**
   * 返回与输入顺序一致的向量
   */
  embed(texts: string[]): Promise<number[][]>;
}

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIEmbeddingConfig, client?: OpenAI) {
    if (!config.apiKey) {
      throw AIEngineError.configurationError('OpenAI API key is required for embeddings');
    }
    this.model = config.model;
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    try {
      const response = await this.client.embeddings.create({ model: this.model, input: texts });
      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map(item => item.embedding);
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        throw AIEngineError.fromStatus('OpenAI', error.status, error.message, error.code ?? undefined, error.headers?.['retry-after'], error);
      }
      const cause = toError(error);
      throw AIEngineError.networkError(`Embedding request failed: ${cause.message}`, cause);
    }
  }
}
