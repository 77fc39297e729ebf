import { createDatabase, RadarDatabase } from '..';
import { IN_MEMORY } from '../config/connection';
import { MetricsSnapshot, PlatformType, ProductRecord, SourceType } from '../../collection/types/product';
import { AnalysisRecord } from '../types';

function product(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    id: 'p1',
    platform: PlatformType.TIKTOK_SHOP,
    source: SourceType.ADS_INTEL,
    name: 'Glow Serum',
    category: 'Skincare',
    productUrl: 'https://example.com/p1',
    sellerUrl: null,
    skuId: null,
    price: '$19.99',
    firstDetectedAt: new Date('2025-10-01T09:00:00.000Z'),
    lastSeenAt: new Date('2025-10-01T09:00:00.000Z'),
    ...overrides
  };
}

function snapshot(capturedAt: string, views: number | null, productId = 'p1'): MetricsSnapshot {
  return {
    productId,
    capturedAt: new Date(capturedAt),
    views,
    likes: null,
    comments: null,
    shares: null,
    impressions: 120000,
    videoCount: 2,
    erPercent: null
  };
}

function analysis(productId: string, analyzedAt: string, opportunityScore: number): AnalysisRecord {
  return {
    productId,
    analyzedAt: new Date(analyzedAt),
    trendScore: 60,
    priority: 'B',
    direction: 'rising',
    fitScore: 70,
    ssrScore: null,
    opportunityScore,
    reasons: ['matches skincare focus'],
    risks: [],
    recommendation: 'test',
    hooks: ['before/after'],
    offers: [],
    whyItWorks: null,
    reproducibility: 7,
    samplingEase: null,
    model: 'fake-model'
  };
}

describe('数据仓库测试', () => {
  let database: RadarDatabase;

  beforeEach(async () => {
    database = createDatabase(IN_MEMORY);
    await database.migrations.migrate();
  });

  afterEach(async () => {
    await database.connection.close();
  });

  describe('ProductRepository', () => {
    test('应该插入并查找商品', async () => {
      await database.products.upsert(product());
      const found = await database.products.findById('p1');

      expect(found).toEqual(product());
      expect(await database.products.count()).toBe(1);
    });

    test('更新时应该保留首次发现时间且不用空值覆盖', async () => {
      await database.products.upsert(product());
      const updated = await database.products.upsert(product({
        category: 'N/A',
        price: null,
        firstDetectedAt: new Date('2025-10-08T09:00:00.000Z'),
        lastSeenAt: new Date('2025-10-08T09:00:00.000Z')
      }));

      expect(updated.firstDetectedAt.toISOString()).toBe('2025-10-01T09:00:00.000Z');
      expect(updated.lastSeenAt.toISOString()).toBe('2025-10-08T09:00:00.000Z');
      expect(updated.category).toBe('Skincare');
      expect(updated.price).toBe('$19.99');
    });

    test('应该按平台查询', async () => {
      await database.products.upsert(product());
      await database.products.upsert(product({ id: 'p2', platform: PlatformType.DOUYIN }));

      const douyin = await database.products.findByPlatform(PlatformType.DOUYIN);
      expect(douyin.map(item => item.id)).toEqual(['p2']);
      expect(await database.products.findAll(1)).toHaveLength(1);
    });

    test('删除商品应该级联删除指标历史', async () => {
      await database.products.upsert(product());
      await database.metrics.record(snapshot('2025-10-01T09:00:00.000Z', 1000));

      expect(await database.products.delete('p1')).toBe(true);
      expect(await database.products.delete('p1')).toBe(false);
      expect(await database.metrics.findByProduct('p1')).toEqual([]);
    });
  });

  describe('MetricsHistoryRepository', () => {
    beforeEach(async () => {
      await database.products.upsert(product());
    });

    test('应该按时间升序返回快照', async () => {
      await database.metrics.record(snapshot('2025-10-08T09:00:00.000Z', 3000));
      await database.metrics.record(snapshot('2025-10-01T09:00:00.000Z', 1000));

      const history = await database.metrics.findByProduct('p1');
      expect(history.map(item => item.views)).toEqual([1000, 3000]);

      const recent = await database.metrics.findByProduct('p1', new Date('2025-10-05T00:00:00.000Z'));
      expect(recent.map(item => item.views)).toEqual([3000]);
    });

    test('同一时刻重复写入应该覆盖', async () => {
      await database.metrics.record(snapshot('2025-10-01T09:00:00.000Z', 1000));
      await database.metrics.record(snapshot('2025-10-01T09:00:00.000Z', 1500));

      const history = await database.metrics.findByProduct('p1');
      expect(history).toHaveLength(1);
      expect(history[0].views).toBe(1500);
    });

    test('应该返回最近快照并清理旧数据', async () => {
      await database.metrics.record(snapshot('2025-09-01T09:00:00.000Z', 500));
      await database.metrics.record(snapshot('2025-10-01T09:00:00.000Z', 1000));

      expect((await database.metrics.latest('p1'))?.views).toBe(1000);
      expect(await database.metrics.deleteOlderThan(new Date('2025-09-15T00:00:00.000Z'))).toBe(1);
      expect(await database.metrics.latest('missing')).toBeNull();
    });

    test('未知商品应该违反外键约束', async () => {
      await expect(database.metrics.record(snapshot('2025-10-01T09:00:00.000Z', 1, 'unknown'))).rejects.toThrow();
    });
  });

  describe('AnalysisRepository', () => {
    beforeEach(async () => {
      await database.products.upsert(product());
      await database.products.upsert(product({ id: 'p2' }));
    });

    test('应该保存并读取列表字段', async () => {
      const saved = await database.analyses.save(analysis('p1', '2025-10-01T09:00:00.000Z', 55));
      const latest = await database.analyses.latestForProduct('p1');

      expect(saved.id).toBeGreaterThan(0);
      expect(latest?.reasons).toEqual(['matches skincare focus']);
      expect(latest?.hooks).toEqual(['before/after']);
      expect(latest?.direction).toBe('rising');
    });

    test('每个商品只返回最近一次分析并按机会分排序', async () => {
      await database.analyses.save(analysis('p1', '2025-10-01T09:00:00.000Z', 90));
      await database.analyses.save(analysis('p1', '2025-10-08T09:00:00.000Z', 40));
      await database.analyses.save(analysis('p2', '2025-10-08T09:00:00.000Z', 65));

      const latest = await database.analyses.latestAll();
      expect(latest.map(item => [item.productId, item.opportunityScore])).toEqual([
        ['p2', 65],
        ['p1', 40]
      ]);
    });
  });
});
