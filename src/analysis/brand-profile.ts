/**
 * 品牌档案加载
 */

import fs from 'fs';
import { load } from 'js-yaml';
import { BrandProfile } from './types';
import { CollectionError, CollectionErrorType, toError } from '../collection/utils/error-handler';
import { isJsonObject, JsonObject } from './ai-engine/response-parser';

function text(source: JsonObject, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : typeof value === 'number' ? String(value) : '';
}

function list(source: JsonObject, key: string): string[] {
  const value = source[key];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function number(source: JsonObject, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * 把YAML内容转换为品牌档案，缺少name时视为无效
 */
export function parseBrandProfile(raw: unknown): BrandProfile {
  if (!isJsonObject(raw) || !text(raw, 'name')) {
    throw new CollectionError('品牌档案缺少 name 字段', CollectionErrorType.CONFIGURATION_ERROR, undefined, 'loadBrandProfile');
  }

  const audienceValue = raw.targetAudience;
  const audience = isJsonObject(audienceValue) ? audienceValue : {};
  const priceValue = raw.priceRange;
  const price = isJsonObject(priceValue) ? priceValue : {};

  return {
    name: text(raw, 'name'),
    positioning: text(raw, 'positioning'),
    targetAudience: {
      ageRange: text(audience, 'ageRange'),
      gender: text(audience, 'gender'),
      markets: list(audience, 'markets')
    },
    categories: list(raw, 'categories'),
    priceRange: {
      min: number(price, 'min', 0),
      max: number(price, 'max', 0),
      currency: text(price, 'currency') || 'USD'
    },
    values: list(raw, 'values'),
    exclusions: list(raw, 'exclusions')
  };
}

export function loadBrandProfile(filePath: string): BrandProfile {
  let raw: unknown;
  try {
    raw = load(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new CollectionError(
      `无法读取品牌档案: ${toError(error).message}`,
      CollectionErrorType.CONFIGURATION_ERROR,
      undefined,
      'loadBrandProfile',
      { filePath }
    );
  }
  return parseBrandProfile(raw);
}
