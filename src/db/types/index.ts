/**
 * 数据库模块类型定义
 * 行类型与表结构一一对应（snake_case），时间以ISO字符串存储
 */

import { Priority, TrendDirection } from '../../analysis/types';

export interface ProductRow {
  id: string;
  platform: string;
  source: string;
  name: string;
  category: string;
  product_url: string | null;
  seller_url: string | null;
  sku_id: string | null;
  price: string | null;
  first_detected_at: string;
  last_seen_at: string;
}

export interface MetricsHistoryRow {
  id: number;
  product_id: string;
  captured_at: string;
  views: number | null;
  likes: number | null;
  comments: number | null;
  shares: number | null;
  impressions: number | null;
  video_count: number;
  er_percent: number | null;
}

export interface AnalysisRow {
  id: number;
  product_id: string;
  analyzed_at: string;
  trend_score: number;
  priority: string;
  direction: string;
  fit_score: number | null;
  ssr_score: number | null;
  opportunity_score: number;
  reasons: string;
  risks: string;
  recommendation: string | null;
  hooks: string;
  offers: string;
  why_it_works: string | null;
  reproducibility: number | null;
  sampling_ease: number | null;
  model: string | null;
}

/**
 * 一次运行中对单个商品的分析结果
 */
export interface AnalysisRecord {
  id?: number;
  productId: string;
  analyzedAt: Date;
  trendScore: number;
  priority: Priority;
  direction: TrendDirection;
  fitScore: number | null;
  ssrScore: number | null;
  opportunityScore: number;
  reasons: string[];
  risks: string[];
  recommendation: string | null;
  hooks: string[];
  offers: string[];
  whyItWorks: string | null;
  reproducibility: number | null;
  samplingEase: number | null;
  model: string | null;
}

export interface DatabaseConfig {
  databasePath: string;
}
