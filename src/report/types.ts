/**
 * 报告数据模型
 */

import { EvidenceVideo, MetricsSnapshot, ProductRecord } from '../collection/types/product';
import { AnalysisRecord } from '../db/types';

/**
 * 流水线某一步的失败记录
 */
export interface StepError {
  step: string;
  message: string;
}

export interface RankedProduct {
  rank: number;
  product: ProductRecord;
  snapshot: MetricsSnapshot | null;
  evidence: EvidenceVideo[];
  analysis: AnalysisRecord;
}

export interface RadarReport {
  generatedAt: Date;
  periodStart: Date;
  periodEnd: Date;
  brandName: string;
  /** 各来源采集到的条数 */
  collected: Record<string, number>;
  items: RankedProduct[];
  /** 展开详情的商品数 */
  topN: number;
  errors: StepError[];
}

export interface ReportFiles {
  markdownPath: string;
  csvPath: string;
}
