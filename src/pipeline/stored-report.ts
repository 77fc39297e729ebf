/**
 * 用数据库中保存的最近一次分析结果重新生成报告
 */

import { RadarDatabase } from '../db';
import { RadarReport, RankedProduct } from '../report/types';

export interface StoredReportOptions {
  brandName: string;
  topN: number;
  daysBack: number;
  limit?: number;
  now?: Date;
}

export async function buildStoredReport(database: RadarDatabase, options: StoredReportOptions): Promise<RadarReport> {
  const now = options.now ?? new Date();
  const analyses = await database.analyses.latestAll(options.limit);
  const items: RankedProduct[] = [];

  for (const analysis of analyses) {
    const product = await database.products.findById(analysis.productId);
    if (!product) {
      continue;
    }
    items.push({
      rank: items.length + 1,
      product,
      snapshot: await database.metrics.latest(product.id),
      evidence: [],
      analysis
    });
  }

  const latestRun = analyses.reduce<Date | null>(
    (latest, analysis) => (!latest || analysis.analyzedAt > latest ? analysis.analyzedAt : latest),
    null
  );
  const periodEnd = latestRun ?? now;

  return {
    generatedAt: now,
    periodStart: new Date(periodEnd.getTime() - options.daysBack * 24 * 60 * 60 * 1000),
    periodEnd,
    brandName: options.brandName,
    collected: {},
    items,
    topN: options.topN,
    errors: []
  };
}
