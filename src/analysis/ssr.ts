/**
 * SSR（语义相似度评分）
 * 把模型的自由文本回答与1-5分锚点语句做向量相似度比较，得到李克特量表上的分布与期望值
 */

import fs from 'fs';
import path from 'path';
import { EmbeddingProvider } from './ai-engine/embedding';
import { isJsonObject } from './ai-engine/response-parser';
import { CollectionError, CollectionErrorType, toError } from '../collection/utils/error-handler';

export const DEFAULT_ANCHORS_PATH = path.join(process.cwd(), 'config', 'ssr-anchors.json');

export interface SsrAnchor {
  point: number;
  text: string;
}

export interface SsrRating {
  /** 与锚点一一对应的概率 */
  distribution: number[];
  /** 期望的李克特分值（1-5） */
  expected: number;
  similarities: number[];
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) {
    throw new Error(`向量维度不一致: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * 相似度 -> 概率分布：减去最小值后归一化，全部相等时为均匀分布
 * temperature 小于1使分布更尖锐，大于1更平坦
 */
export function similaritiesToDistribution(similarities: number[], temperature = 1): number[] {
  if (similarities.length === 0) {
    return [];
  }
  const min = Math.min(...similarities);
  let weights = similarities.map(value => value - min);
  if (temperature !== 1 && temperature > 0) {
    weights = weights.map(value => Math.pow(value, 1 / temperature));
  }
  const total = weights.reduce((sum, value) => sum + value, 0);
  if (total === 0) {
    return similarities.map(() => 1 / similarities.length);
  }
  return weights.map(value => value / total);
}

/**
 * 李克特分值（1-5）映射为百分制
 */
export function toPercent(likert: number): number {
  return Math.round(((Math.min(5, Math.max(1, likert)) - 1) / 4) * 100 * 100) / 100;
}

export function loadAnchors(filePath: string = DEFAULT_ANCHORS_PATH, set = 'purchase_intent'): SsrAnchor[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new CollectionError(
      `无法读取SSR锚点文件: ${toError(error).message}`,
      CollectionErrorType.CONFIGURATION_ERROR,
      undefined,
      'loadAnchors',
      { filePath }
    );
  }

  const entries = isJsonObject(raw) ? raw[set] : undefined;
  const anchors: SsrAnchor[] = Array.isArray(entries)
    ? entries
      .filter(isJsonObject)
      .map(entry => ({ point: entry.point, text: entry.text }))
      .filter((entry): entry is SsrAnchor => typeof entry.point === 'number' && typeof entry.text === 'string')
    : [];

  if (anchors.length < 2) {
    throw new CollectionError(`SSR锚点集 ${set} 至少需要两条语句`, CollectionErrorType.CONFIGURATION_ERROR, undefined, 'loadAnchors');
  }
  return anchors.sort((a, b) => a.point - b.point);
}

export class SsrRater {
  private provider: EmbeddingProvider;
  private anchors: SsrAnchor[];
  private temperature: number;
  private anchorVectors: Promise<number[][]> | null = null;

  constructor(provider: EmbeddingProvider, anchors: SsrAnchor[], temperature = 1) {
    this.provider = provider;
    this.anchors = anchors;
    this.temperature = temperature;
  }

  /**
   * 评估一段自由文本回答
   */
  async rate(responseText: string): Promise<SsrRating> {
    const anchorVectors = await this.getAnchorVectors();
    const [responseVector] = await this.provider.embed([responseText]);
    if (!responseVector) {
      throw new Error('向量服务没有返回回答的向量');
    }

    const similarities = anchorVectors.map(vector => cosineSimilarity(responseVector, vector));
    const distribution = similaritiesToDistribution(similarities, this.temperature);
    const expected = distribution.reduce((sum, probability, i) => sum + probability * this.anchors[i].point, 0);

    return { distribution, expected, similarities };
  }

  /**
   * 锚点向量只计算一次；失败后允许重试
   */
  private async getAnchorVectors(): Promise<number[][]> {
    if (!this.anchorVectors) {
      this.anchorVectors = this.embedAnchors();
    }
    try {
      return await this.anchorVectors;
    } catch (error) {
      this.anchorVectors = null;
      throw error;
    }
  }

  private async embedAnchors(): Promise<number[][]> {
    const vectors = await this.provider.embed(this.anchors.map(anchor => anchor.text));
    if (vectors.length !== this.anchors.length) {
      throw new Error(`锚点向量数量不符: ${vectors.length}/${this.anchors.length}`);
    }
    return vectors;
  }
}
