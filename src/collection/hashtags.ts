/**
 * 话题标签库与商业触发词
 */

import fs from 'fs';
import path from 'path';

export interface HashtagBank {
  /** 平台 -> 类目 -> 标签 */
  platforms: Record<string, Record<string, string[]>>;
  /** 促销类文案触发词（买一送一、限时折扣等） */
  commercialTriggers: string[];
}

export const DEFAULT_HASHTAGS_PATH = path.join(process.cwd(), 'config', 'hashtags.json');

function toStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * 读取标签库文件
 */
export function loadHashtagBank(filePath: string = DEFAULT_HASHTAGS_PATH): HashtagBank {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const bank: HashtagBank = { platforms: {}, commercialTriggers: [] };
  if (typeof raw !== 'object' || raw === null) {
    return bank;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (key === 'commercialTriggers') {
      bank.commercialTriggers = toStringList(value);
      continue;
    }
    if (typeof value !== 'object' || value === null) {
      continue;
    }
    const categories: Record<string, string[]> = {};
    for (const [category, tags] of Object.entries(value)) {
      categories[category] = toStringList(tags);
    }
    bank.platforms[key] = categories;
  }
  return bank;
}

/**
 * 某平台全部标签（去重，保持顺序）
 */
export function allHashtags(bank: HashtagBank, platform: string): string[] {
  const categories = bank.platforms[platform] || {};
  return [...new Set(Object.values(categories).flat())];
}

/**
 * 某类目标签加上通用标签
 */
export function hashtagsForCategory(bank: HashtagBank, platform: string, category: string): string[] {
  const categories = bank.platforms[platform] || {};
  return [...new Set([...(categories[category] || []), ...(categories.general || [])])];
}

/**
 * 文案中出现的商业触发词
 */
export function findCommercialTriggers(bank: HashtagBank, text: string): string[] {
  return bank.commercialTriggers.filter(trigger => text.includes(trigger));
}
