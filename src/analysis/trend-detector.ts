/**
 * 趋势检测：对指标历史做线性回归与梯度分析
 */

import { MetricsSnapshot } from '../collection/types/product';
import { clamp } from './ai-engine/response-parser';
import { TrendAnalysis, TrendDirection } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export const EMERGING_GROWTH = 0.25;
export const RISING_GROWTH = 0.05;
export const DECLINING_GROWTH = -0.05;
export const MIN_POINTS = 3;

export interface Point {
  x: number;
  y: number;
}

export interface RegressionResult {
  slope: number;
  intercept: number;
  rSquared: number;
}

/**
 * 最小二乘线性回归
 */
export function linearRegression(points: Point[]): RegressionResult {
  const n = points.length;
  if (n === 0) {
    return { slope: 0, intercept: 0, rSquared: 0 };
  }

  const meanX = points.reduce((total, point) => total + point.x, 0) / n;
  const meanY = points.reduce((total, point) => total + point.y, 0) / n;

  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (const point of points) {
    sxx += (point.x - meanX) ** 2;
    sxy += (point.x - meanX) * (point.y - meanY);
    syy += (point.y - meanY) ** 2;
  }

  if (sxx === 0) {
    return { slope: 0, intercept: meanY, rSquared: 0 };
  }

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;
  const rSquared = syy === 0 ? 1 : (sxy * sxy) / (sxx * syy);
  return { slope, intercept, rSquared };
}

/**
 * 快照 -> (距首次快照天数, 播放量)；没有播放量时用曝光量
 */
export function toPoints(history: MetricsSnapshot[]): Point[] {
  const sorted = history
    .filter(snapshot => (snapshot.views ?? snapshot.impressions) !== null)
    .sort((a, b) => a.capturedAt.getTime() - b.capturedAt.getTime());
  if (sorted.length === 0) {
    return [];
  }

  const origin = sorted[0].capturedAt.getTime();
  return sorted.map(snapshot => ({
    x: (snapshot.capturedAt.getTime() - origin) / DAY_MS,
    y: snapshot.views ?? snapshot.impressions ?? 0
  }));
}

function gradient(from: Point, to: Point): number {
  const dx = to.x - from.x;
  return dx > 0 ? (to.y - from.y) / dx : 0;
}

function classify(points: number, growthRate: number, acceleration: number): TrendDirection {
  if (points < MIN_POINTS) {
    return 'insufficient_data';
  }
  if (growthRate >= EMERGING_GROWTH && acceleration > 0) {
    return 'emerging';
  }
  if (growthRate >= RISING_GROWTH) {
    return 'rising';
  }
  if (growthRate <= DECLINING_GROWTH) {
    return 'declining';
  }
  return 'stable';
}

/**
 * 检测趋势方向
 */
export function detectTrend(history: MetricsSnapshot[]): TrendAnalysis {
  const points = toPoints(history);
  const { slope, rSquared } = linearRegression(points);
  const meanY = points.length > 0 ? points.reduce((total, point) => total + point.y, 0) / points.length : 0;
  const growthRate = meanY > 0 ? slope / meanY : 0;

  const n = points.length;
  const lastGradient = n >= 2 ? gradient(points[n - 2], points[n - 1]) : 0;
  const previousGradient = n >= 3 ? gradient(points[n - 3], points[n - 2]) : lastGradient;

  return {
    direction: classify(n, growthRate, lastGradient - previousGradient),
    slope,
    growthRate,
    gradient: lastGradient,
    acceleration: lastGradient - previousGradient,
    rSquared,
    points: n
  };
}

const MOMENTUM_BONUS: Record<TrendDirection, number> = {
  emerging: 20,
  rising: 10,
  stable: 0,
  declining: -15,
  insufficient_data: 0
};

/**
 * 机会分：0.4*趋势分 + 0.4*匹配分（未知按50）+ 动量加成
 */
export function scoreOpportunity(trend: TrendAnalysis, trendScore: number, fitScore: number | null): number {
  const score = 0.4 * trendScore + 0.4 * (fitScore ?? 50) + MOMENTUM_BONUS[trend.direction];
  return Math.round(clamp(score, 0, 100) * 100) / 100;
}
