/**
 * 趋势评分指标
 * trendScore = 0.35*Impulse72h + 0.25*UGC占比 + 0.15*ER标准分 + 0.15*新鲜度 + 0.10*易复制度
 * 抖音商品使用加权版本：0.45 / 0.30 / 0.10 / 0.10 / 0.05
 */

import { EvidenceVideo, MetricsSnapshot, PlatformType } from '../collection/types/product';
import { parseVideoDate } from '../collection/validator';
import { clamp } from './ai-engine/response-parser';
import { Priority } from './types';

const HOURS_72 = 72 * 60 * 60 * 1000;

export interface TrendScoreWeights {
  impulse: number;
  ugc: number;
  er: number;
  recency: number;
  ease: number;
}

export const DEFAULT_WEIGHTS: TrendScoreWeights = { impulse: 0.35, ugc: 0.25, er: 0.15, recency: 0.15, ease: 0.10 };
export const DOUYIN_WEIGHTS: TrendScoreWeights = { impulse: 0.45, ugc: 0.30, er: 0.10, recency: 0.10, ease: 0.05 };

export interface TrendScoreInput {
  platform: PlatformType;
  views72h: number | null;
  totalViews: number | null;
  listingAgeDays: number | null;
  ugcShare: number | null;
  erPercent: number | null;
  reproducibility: number | null;
  samplingEase: number | null;
}

export interface TrendScoreBreakdown {
  impulse72h: number;
  ugcShare: number;
  erZ: number;
  recency: number;
  ease: number;
  trendScore: number;
  priority: Priority;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * 72小时冲量：近72小时播放占总播放的百分比，两周内上架的商品有最多20分的新鲜度加成
 */
export function calculateImpulse72h(
  views72h: number | null,
  totalViews: number | null,
  listingAgeDays: number | null
): number {
  if (!views72h || !totalViews) {
    return 0;
  }

  let ratio = (views72h / totalViews) * 100;
  if (listingAgeDays && listingAgeDays > 0) {
    ratio += Math.max(0, (14 - listingAgeDays) / 14) * 20;
  }
  return Math.min(100, ratio);
}

/**
 * 近72小时播放量
 * 有两次以上快照时取最近两次的增量（按时间间隔折算到72小时），否则取72小时内首次出现的证据视频播放量
 */
export function estimateViews72h(
  history: MetricsSnapshot[],
  evidence: EvidenceVideo[],
  now: Date
): number | null {
  const reach = history
    .map(snapshot => ({ at: snapshot.capturedAt.getTime(), value: snapshot.views ?? snapshot.impressions }))
    .filter((point): point is { at: number; value: number } => point.value !== null)
    .sort((a, b) => a.at - b.at);

  if (reach.length >= 2) {
    const last = reach[reach.length - 1];
    const previous = reach[reach.length - 2];
    const elapsed = last.at - previous.at;
    if (elapsed > 0) {
      const delta = Math.max(0, last.value - previous.value);
      return Math.round(delta * Math.min(1, HOURS_72 / elapsed));
    }
  }

  const recent = evidence.filter(video => {
    const seen = parseVideoDate(video.firstSeen);
    return seen !== null && video.views !== null && now.getTime() - seen.getTime() <= HOURS_72;
  });
  if (recent.length === 0) {
    return null;
  }
  return recent.reduce((total, video) => total + (video.views ?? 0), 0);
}

/**
 * UGC占比（非品牌官方视频的百分比）
 */
export function estimateUgcShare(videoCount: number, brandedCount: number): number {
  if (videoCount === 0) {
    return 0;
  }
  return round2(clamp(((videoCount - brandedCount) / videoCount) * 100, 0, 100));
}

/**
 * 新鲜度评分，未知时取中值50
 */
export function calculateRecencyScore(listingAgeDays: number | null): number {
  if (listingAgeDays === null) {
    return 50;
  }
  if (listingAgeDays <= 3) return 100;
  if (listingAgeDays <= 7) return 90;
  if (listingAgeDays <= 14) return 75;
  if (listingAgeDays <= 30) return 50;
  if (listingAgeDays <= 60) return 25;
  return 10;
}

/**
 * 易复制度：复刻难度与样品获取难度（0-10）的均值×10
 */
export function calculateEaseComposite(reproducibility: number | null, samplingEase: number | null): number {
  if (reproducibility === null && samplingEase === null) {
    return 50;
  }
  return round2((((reproducibility ?? 5) + (samplingEase ?? 5)) / 2) * 10);
}

/**
 * ER标准分：相对同批商品的z-score，[-3, 3] 映射到 [0, 100]
 */
export function normalizeEr(er: number, allErs: number[]): number {
  if (allErs.length < 2) {
    return 50;
  }

  const mean = allErs.reduce((total, value) => total + value, 0) / allErs.length;
  const variance = allErs.reduce((total, value) => total + (value - mean) ** 2, 0) / (allErs.length - 1);
  const stdev = Math.sqrt(variance);
  if (stdev === 0) {
    return 50;
  }

  const z = (er - mean) / stdev;
  return round2(clamp(((z + 3) / 6) * 100, 0, 100));
}

export function priorityFor(score: number): Priority {
  if (score >= 75) {
    return 'A';
  }
  if (score < 45) {
    return 'C';
  }
  return 'B';
}

/**
 * 计算完整的趋势评分
 */
export function calculateTrendScore(input: TrendScoreInput, allErs: number[]): TrendScoreBreakdown {
  const weights = input.platform === PlatformType.DOUYIN ? DOUYIN_WEIGHTS : DEFAULT_WEIGHTS;

  const impulse72h = calculateImpulse72h(input.views72h, input.totalViews, input.listingAgeDays);
  const ugcShare = input.ugcShare ?? 50;
  const erZ = input.erPercent ? normalizeEr(input.erPercent, allErs) : 50;
  const recency = calculateRecencyScore(input.listingAgeDays);
  const ease = calculateEaseComposite(input.reproducibility, input.samplingEase);

  const score = weights.impulse * impulse72h
    + weights.ugc * ugcShare
    + weights.er * erZ
    + weights.recency * recency
    + weights.ease * ease;
  const trendScore = round2(clamp(score, 0, 100));

  return { impulse72h, ugcShare, erZ, recency, ease, trendScore, priority: priorityFor(trendScore) };
}
