/**
 * 报告测试数据
 */

import { AnalysisRecord } from '../../src/db/types';
import { RadarReport, RankedProduct } from '../../src/report/types';
import { FIXED_NOW, sampleProduct } from '../helpers/fixtures';

function analysis(productId: string, overrides: Partial<AnalysisRecord>): AnalysisRecord {
  return {
    productId,
    analyzedAt: FIXED_NOW,
    trendScore: 50,
    priority: 'B',
    direction: 'stable',
    fitScore: null,
    ssrScore: null,
    opportunityScore: 50,
    reasons: [],
    risks: [],
    recommendation: null,
    hooks: [],
    offers: [],
    whyItWorks: null,
    reproducibility: null,
    samplingEase: null,
    model: null,
    ...overrides
  };
}

const serum = sampleProduct('p1', 'Glow | Serum');
const scrub = sampleProduct('p2', 'Body Scrub');

export const TOP_ITEM: RankedProduct = {
  rank: 1,
  product: serum.product,
  snapshot: serum.snapshot,
  evidence: serum.evidence,
  analysis: analysis('p1', {
    trendScore: 80.456,
    priority: 'A',
    direction: 'emerging',
    fitScore: 70,
    ssrScore: 62.5,
    opportunityScore: 84.18,
    reasons: ['fits skincare'],
    recommendation: 'Order samples',
    hooks: ['Stop scrolling']
  })
};

export const PLAIN_ITEM: RankedProduct = {
  rank: 2,
  product: { ...scrub.product, category: 'Body Care', price: null, productUrl: null },
  snapshot: null,
  evidence: [],
  analysis: analysis('p2', {
    trendScore: 40,
    priority: 'C',
    direction: 'insufficient_data',
    opportunityScore: 31
  })
};

export function sampleReport(overrides: Partial<RadarReport> = {}): RadarReport {
  return {
    generatedAt: FIXED_NOW,
    periodStart: new Date(2025, 9, 23),
    periodEnd: FIXED_NOW,
    brandName: 'Test Brand',
    collected: { ads_intel: 3, trending_api: 0 },
    items: [TOP_ITEM, PLAIN_ITEM],
    topN: 1,
    errors: [{ step: 'collect:vendor', message: 'timeout' }],
    ...overrides
  };
}
