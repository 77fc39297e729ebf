/**
 * 供应商JSON字段读取
 * 不同接口对同一字段的命名不同，按候选键依次查找
 */

import { parseImpressions } from '../validator';

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function pick(source: JsonObject, keys: string[]): unknown {
  for (const key of keys) {
    const value = source[key];
    if (value !== undefined && value !== null && value !== '') {
      return value;
    }
  }
  return undefined;
}

export function pickString(source: JsonObject, keys: string[]): string | null {
  const value = pick(source, keys);
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

/**
 * 读取ID：先找字符串形式的字段，再接受安全整数范围内的数字。
 * 抖音/TikTok的 aweme_id、商品ID是19位数字，以JSON数字返回时在解析阶段就已丢失精度，
 * 这类值不可信，返回null，由调用方退回到URL或名称
 */
export function pickId(source: JsonObject, keys: string[]): string | null {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
  }
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'number' && Number.isSafeInteger(value)) {
      return String(value);
    }
  }
  return null;
}

export function pickCount(source: JsonObject, keys: string[]): number | null {
  const value = pick(source, keys);
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.max(0, Math.floor(value));
  }
  if (typeof value === 'string') {
    return parseImpressions(value);
  }
  return null;
}

export function pickDate(source: JsonObject, keys: string[]): Date | null {
  const value = pick(source, keys);
  let date: Date | null = null;
  if (typeof value === 'number') {
    // 秒级时间戳
    date = new Date(value < 1e12 ? value * 1000 : value);
  } else if (typeof value === 'string') {
    date = /^\d+$/.test(value) ? new Date(Number(value) * 1000) : new Date(value);
  }
  return date && !isNaN(date.getTime()) ? date : null;
}
