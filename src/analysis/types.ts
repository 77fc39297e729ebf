/**
 * 分析模块类型定义
 */

/** 优先级：A 立即跟进，B 观察，C 暂不考虑 */
export type Priority = 'A' | 'B' | 'C';

/** 趋势方向 */
export type TrendDirection = 'insufficient_data' | 'emerging' | 'rising' | 'stable' | 'declining';

export const TREND_DIRECTIONS: TrendDirection[] = ['emerging', 'rising', 'stable', 'declining', 'insufficient_data'];

/**
 * 趋势检测结果
 */
export interface TrendAnalysis {
  direction: TrendDirection;
  /** 每日播放增量 */
  slope: number;
  /** slope / 平均播放 */
  growthRate: number;
  /** 最后一个区间的日均增量 */
  gradient: number;
  /** 最后两个区间增量之差 */
  acceleration: number;
  rSquared: number;
  points: number;
}

/**
 * 品牌匹配分析结果
 */
export interface BrandFitResult {
  fitScore: number;
  reasons: string[];
  risks: string[];
  recommendation: string;
  /** SSR 估算的购买意愿（0-100），未启用时为null */
  ssrScore: number | null;
}

/**
 * 创意分析结果
 */
export interface CreativeResult {
  hooks: string[];
  offers: string[];
  whyItWorks: string;
  risks: string[];
  /** 复刻难度 0-10，越高越容易 */
  reproducibility: number;
  /** 样品获取难度 0-10，越高越容易 */
  samplingEase: number;
}

/**
 * 品牌档案
 */
export interface BrandProfile {
  name: string;
  positioning: string;
  targetAudience: {
    ageRange: string;
    gender: string;
    markets: string[];
  };
  categories: string[];
  priceRange: {
    min: number;
    max: number;
    currency: string;
  };
  values: string[];
  exclusions: string[];
}
