/**
 * 数据校验与格式转换
 * 处理广告情报站上的日期、曝光量、受众等文本字段
 */

import { NOT_AVAILABLE } from './types/product';

const MONTHS: Record<string, number> = {
  Jan: 0, Feb: 1, Mar: 2, Apr: 3, May: 4, Jun: 5,
  Jul: 6, Aug: 7, Sep: 8, Oct: 9, Nov: 10, Dec: 11
};

const DAY_MS = 24 * 60 * 60 * 1000;

function isMissing(value: string | null | undefined): value is null | undefined | '' {
  return !value || value.trim() === '' || value.trim() === NOT_AVAILABLE;
}

/**
 * 解析 "Oct 27 2025" 格式的日期
 */
export function parseVideoDate(dateString: string | null | undefined): Date | null {
  if (isMissing(dateString)) {
    return null;
  }

  const parts = dateString.trim().split(/\s+/);
  if (parts.length !== 3) {
    return null;
  }

  const [monthStr, dayStr, yearStr] = parts;
  const month = MONTHS[monthStr];
  if (month === undefined || !/^\d+$/.test(dayStr) || !/^\d+$/.test(yearStr)) {
    return null;
  }

  const day = parseInt(dayStr, 10);
  const year = parseInt(yearStr, 10);
  if (day < 1 || day > 31 || year < 2020 || year > 2100) {
    return null;
  }

  const date = new Date(year, month, day);
  // 拒绝 "Feb 30" 这类溢出到下个月的日期
  if (date.getMonth() !== month || date.getDate() !== day) {
    return null;
  }
  return date;
}

/**
 * 判断日期是否在最近N天内（以当天零点为基准）
 */
export function isDateWithinDays(date: Date | null, days: number = 7, now: Date = new Date()): boolean {
  if (!date) {
    return false;
  }

  const today = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  const cutoff = new Date(today.getTime() - days * DAY_MS);
  return date.getTime() >= cutoff.getTime();
}

/**
 * 曝光量是否达到阈值
 */
export function validateImpressions(impressions: number | null | undefined, minValue: number = 50000): boolean {
  if (impressions === null || impressions === undefined) {
    return false;
  }
  return impressions >= minValue;
}

/** 数量单位，抖音以"万"计数 */
const SUFFIX_MULTIPLIERS: Record<string, number> = {
  K: 1_000,
  M: 1_000_000,
  B: 1_000_000_000,
  W: 10_000,
  '万': 10_000
};

/**
 * 解析曝光量文本："15.1K"、"1.5M"、"15,100"、"101300"
 */
export function parseImpressions(text: string | null | undefined): number | null {
  if (isMissing(text)) {
    return null;
  }

  const clean = text.trim().replace(/[,\s]/g, '');
  const suffix = clean.slice(-1).toUpperCase();
  const multiplier = SUFFIX_MULTIPLIERS[suffix] ?? 1;
  const numeric = multiplier === 1 ? clean : clean.slice(0, -1);

  if (!/^\d+(\.\d+)?$/.test(numeric)) {
    return null;
  }
  const value = parseFloat(numeric) * multiplier;
  // 带单位的数值四舍五入以消除浮点误差，纯数字直接截断
  return multiplier === 1 ? Math.floor(value) : Math.round(value);
}

/**
 * 校验http(s)地址
 */
export function validateUrl(url: string | null | undefined): boolean {
  if (isMissing(url)) {
    return false;
  }

  const pattern = /^https?:\/\/(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\.)+[A-Z]{2,6}\.?|localhost|\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})(?::\d+)?(?:\/?|[/?]\S+)$/i;
  return pattern.test(url.trim());
}

export interface DateValidationResult {
  valid: boolean;
  error: string | null;
}

/**
 * 完整校验视频日期文本
 */
export function validateVideoDateString(
  dateString: string | null | undefined,
  daysBack: number = 7,
  now: Date = new Date()
): DateValidationResult {
  if (isMissing(dateString)) {
    return { valid: false, error: '日期缺失或为N/A' };
  }

  const parsed = parseVideoDate(dateString);
  if (!parsed) {
    return { valid: false, error: `无法解析日期: ${dateString}` };
  }

  if (!isDateWithinDays(parsed, daysBack, now)) {
    return { valid: false, error: `日期 ${dateString} 早于 ${daysBack} 天前` };
  }

  return { valid: true, error: null };
}

/**
 * 受众格式化为 "35-45 Android"
 */
export function formatAudience(age: string | null | undefined, platform?: string | null): string {
  if (isMissing(age)) {
    return NOT_AVAILABLE;
  }

  const parts = [age.trim()];
  if (!isMissing(platform)) {
    parts.push(platform.trim());
  }
  return parts.join(' ');
}

function compact(value: number, unit: string): string {
  if (value >= 100) {
    return `${Math.floor(value)}${unit}`;
  }
  // 保留一位小数并去掉末尾的 .0
  return `${value.toFixed(1).replace(/\.0$/, '')}${unit}`;
}

/**
 * 曝光量格式化为 "170K"、"1.5M"
 */
export function formatImpressions(impressions: number | null | undefined): string {
  if (impressions === null || impressions === undefined || impressions <= 0) {
    return NOT_AVAILABLE;
  }

  if (impressions >= 1_000_000) {
    return compact(impressions / 1_000_000, 'M');
  }
  if (impressions >= 1_000) {
    return compact(impressions / 1_000, 'K');
  }
  return String(impressions);
}

/**
 * 两个日期之间相差的整天数
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / DAY_MS);
}

/**
 * 本地日期 YYYY-MM-DD（报告和日志文件名使用）
 */
export function formatLocalDate(date: Date, separator: string = '-'): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return [date.getFullYear(), month, day].join(separator);
}
