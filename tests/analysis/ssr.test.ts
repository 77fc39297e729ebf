/**
 * 语义相似度评分测试
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  cosineSimilarity,
  similaritiesToDistribution,
  toPercent,
  loadAnchors,
  SsrAnchor,
  SsrRater
} from '../../src/analysis/ssr';
import { EmbeddingProvider } from '../../src/analysis/ai-engine/embedding';
import { CollectionErrorType } from '../../src/collection/utils/error-handler';

class TableEmbeddingProvider implements EmbeddingProvider {
  calls: string[][] = [];
  failuresLeft = 0;

  constructor(private vectors: Record<string, number[]>) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('embedding service unavailable');
    }
    return texts.map(text => this.vectors[text] ?? [0, 0, 0]);
  }
}

const ANCHORS: SsrAnchor[] = [
  { point: 1, text: 'no' },
  { point: 2, text: 'maybe' },
  { point: 3, text: 'yes' }
];

const VECTORS: Record<string, number[]> = {
  no: [1, 0, 0],
  maybe: [0, 1, 0],
  yes: [0, 0, 1],
  'absolutely buy': [0, 0, 1],
  'could go either way': [0, 1, 1]
};

describe('语义相似度评分测试', () => {
  test('应该计算余弦相似度', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('向量维度不一致: 2 vs 3');
  });

  describe('概率分布', () => {
    test('应该减去最小值后归一化', () => {
      const distribution = similaritiesToDistribution([0.2, 0.4, 0.6]);
      expect(distribution[0]).toBe(0);
      expect(distribution[1]).toBeCloseTo(1 / 3, 10);
      expect(distribution[2]).toBeCloseTo(2 / 3, 10);
    });

    test('低温度应该使分布更尖锐', () => {
      const distribution = similaritiesToDistribution([0.2, 0.4, 0.6], 0.5);
      expect(distribution[1]).toBeCloseTo(0.2, 10);
      expect(distribution[2]).toBeCloseTo(0.8, 10);
    });

    test('相似度相同时应该均匀分布', () => {
      expect(similaritiesToDistribution([0.5, 0.5])).toEqual([0.5, 0.5]);
      expect(similaritiesToDistribution([])).toEqual([]);
    });
  });

  test('应该把李克特分值转换为百分制', () => {
    expect([1, 3, 4.2, 5, 7, 0].map(toPercent)).toEqual([0, 50, 80, 100, 100, 0]);
  });

  describe('锚点文件', () => {
    test('应该加载默认锚点', () => {
      const anchors = loadAnchors();
      expect(anchors.map(anchor => anchor.point)).toEqual([1, 2, 3, 4, 5]);
    });

    test('应该排序并丢弃无效条目', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'radar-ssr-'));
      const file = path.join(dir, 'anchors.json');
      fs.writeFileSync(file, JSON.stringify({
        custom: [{ point: 2, text: 'b' }, { point: 'x', text: 'bad' }, { point: 1, text: 'a' }],
        tiny: [{ point: 1, text: 'a' }]
      }));

      try {
        expect(loadAnchors(file, 'custom')).toEqual([{ point: 1, text: 'a' }, { point: 2, text: 'b' }]);
        expect(() => loadAnchors(file, 'tiny')).toThrow('SSR锚点集 tiny 至少需要两条语句');
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    test('文件不存在时应该报配置错误', () => {
      let caught: unknown;
      try {
        loadAnchors('/nonexistent/anchors.json');
      } catch (error) {
        caught = error;
      }
      expect(caught).toMatchObject({ errorType: CollectionErrorType.CONFIGURATION_ERROR });
    });
  });

  describe('评分器', () => {
    test('应该根据回答与锚点的相似度给出期望分', async () => {
      const rater = new SsrRater(new TableEmbeddingProvider(VECTORS), ANCHORS);

      const definite = await rater.rate('absolutely buy');
      expect(definite.distribution).toEqual([0, 0, 1]);
      expect(definite.expected).toBe(3);

      const unsure = await rater.rate('could go either way');
      expect(unsure.distribution[0]).toBe(0);
      expect(unsure.expected).toBeCloseTo(2.5, 10);
    });

    test('锚点向量应该只计算一次', async () => {
      const provider = new TableEmbeddingProvider(VECTORS);
      const rater = new SsrRater(provider, ANCHORS);

      await rater.rate('absolutely buy');
      await rater.rate('could go either way');

      expect(provider.calls).toEqual([['no', 'maybe', 'yes'], ['absolutely buy'], ['could go either way']]);
    });

    test('锚点向量计算失败后应该允许重试', async () => {
      const provider = new TableEmbeddingProvider(VECTORS);
      provider.failuresLeft = 1;
      const rater = new SsrRater(provider, ANCHORS);

      await expect(rater.rate('absolutely buy')).rejects.toThrow('embedding service unavailable');
      await expect(rater.rate('absolutely buy')).resolves.toMatchObject({ expected: 3 });
      expect(provider.calls).toHaveLength(3);
    });
  });
});
