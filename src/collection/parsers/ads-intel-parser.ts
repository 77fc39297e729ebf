/**
 * 广告情报站页面解析
 * 搜索页、商品页（TikTok Ads区块）与广告详情页的选择器与文本规则
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { AdCard, AdVideo, NOT_AVAILABLE, ProductLink } from '../types/product';
import { isDateWithinDays, parseImpressions, parseVideoDate, formatAudience } from '../validator';

export const DEFAULT_BASE_URL = 'https://www.pipiads.com';

/** 商品名中出现这些词时说明取到的是库存、佣金等标签 */
const NAME_SKIP_WORDS = ['остаток', 'remain', 'stock', 'месяц', 'month', 'комиссия', 'commission'];

const TIKTOK_ADS_LABELS = ['TikTok Ads', 'Реклама ТикТок', 'Реклама TikTok', 'TikTok Реклама'];

const DATE = '[A-Z][a-z]{2}\\s+\\d{1,2}\\s+\\d{4}';

const CARD_IMPRESSION_PATTERNS: RegExp[] = [
  /Impressions?[:\s]+([\d.,]+[KMB]?)/i,
  /([\d.,]+[KMB]?)\s*Impressions?/i,
  /Показы[:\s]+([\d.,]+[KMB]?)/i,
  /([\d.,]+[KMB]?)\s*Показы/i
];

const FIRST_SEEN_PATTERNS: RegExp[] = [
  new RegExp(`First\\s+seen[:\\s]+(${DATE})`),
  new RegExp(`Впервые\\s+замечено[:\\s]+(${DATE})`),
  // 日期区间取起始日期
  new RegExp(`(${DATE})\\s*-\\s*${DATE}`),
  new RegExp(`(${DATE})`)
];

const COUNTRY_KEYWORDS = [
  'USA', 'US', 'United States', 'United Kingdom', 'UK', 'Canada', 'Australia', 'Germany',
  'Mexico', 'Indonesia', 'Philippines', 'Thailand', 'Vietnam', 'Malaysia', 'Brazil',
  'Россия', 'Russia', 'Филиппины'
];

export interface VideoFilterOptions {
  minImpressions: number;
  priorityImpressions: number;
  daysBack: number;
}

export interface ProductPageData {
  name: string;
  category: string;
}

export interface AdDetailData extends AdVideo {
  /** 受众年龄段，如 "35-45" */
  audienceAge: string;
  /** 受众设备：iOS / Android / N/A */
  audiencePlatform: string;
}

function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * 加载HTML：移除脚本，并在每个元素后补空格，保证相邻元素的文本不会粘连
 */
export function loadDocument(html: string): CheerioAPI {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  $('br').replaceWith(' ');
  $('body *').append(' ');
  return $;
}

function absoluteUrl(href: string, baseUrl: string): string | null {
  try {
    const url = new URL(href, baseUrl);
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}

/**
 * 查找自身文本（不含子元素）等于标签的第一个元素
 */
function findLabel($: CheerioAPI, label: string) {
  return $('body *')
    .filter((_, el) => normalizeText($(el).clone().children().remove().end().text()) === label)
    .first();
}

/**
 * 查找标签元素，返回其父元素的文本
 */
function labelledText($: CheerioAPI, labels: string[]): { label: string; text: string } | null {
  for (const label of labels) {
    const match = findLabel($, label);
    if (match.length > 0) {
      return { label, text: normalizeText(match.parent().text()) };
    }
  }
  return null;
}

/**
 * 标签之后的文本
 */
function textAfterLabel($: CheerioAPI, labels: string[], minLength: number): string | null {
  const found = labelledText($, labels);
  if (!found) {
    return null;
  }
  const index = found.text.indexOf(found.label);
  const rest = found.text.slice(index + found.label.length).trim();
  return rest.length > minLength ? rest : null;
}

function matchFirstDate(text: string, patterns: RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match && parseVideoDate(match[1])) {
      return normalizeText(match[1]);
    }
  }
  return null;
}

function containsKeyword(text: string, keyword: string): boolean {
  const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^\\p{L}])${escaped}($|[^\\p{L}])`, 'u').test(text);
}

/**
 * 从卡片文本中识别曝光量：优先带"Impression/Показы"标签的数字，否则取最大的K/M数字
 */
export function extractCardImpressions(text: string): number {
  for (const pattern of CARD_IMPRESSION_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      const value = parseImpressions(match[1]);
      if (value !== null && value >= 1000) {
        return value;
      }
    }
  }

  const candidates = (text.match(/\b[\d.,]+[KM]\b/g) || [])
    .map(token => parseImpressions(token))
    .filter((value): value is number => value !== null && value >= 1000);
  return candidates.length > 0 ? Math.max(...candidates) : 0;
}

/**
 * 从卡片文本中识别首次出现日期
 */
export function extractFirstSeen(text: string): string | null {
  return matchFirstDate(text, FIRST_SEEN_PATTERNS);
}

/**
 * 解析搜索结果页，返回前count个不重复的商品链接
 */
export function parseSearchPage(html: string, count: number, baseUrl: string = DEFAULT_BASE_URL): ProductLink[] {
  const $ = loadDocument(html);
  const products: ProductLink[] = [];
  const seen = new Set<string>();

  $('a[href*="/tiktok-shop-product/"]').each((_, el) => {
    if (products.length >= count) {
      return false;
    }

    const link = $(el);
    const url = absoluteUrl(link.attr('href') || '', baseUrl);
    if (!url || seen.has(url)) {
      return undefined;
    }
    seen.add(url);

    const card = link.closest('[class*="card"], [class*="item"]');
    const scope = card.length > 0 ? card : link;

    let name = '';
    for (const selector of ['h1, h2, h3', '[class*="title"]', '[class*="name"]']) {
      const candidate = normalizeText(scope.find(selector).first().text());
      if (candidate.length > 5) {
        name = candidate;
        break;
      }
    }
    if (!name) {
      const linkText = normalizeText(link.text());
      name = linkText.length > 5 ? linkText : NOT_AVAILABLE;
    }

    let category = NOT_AVAILABLE;
    for (const selector of ['[class*="category"]', '[class*="tag"]']) {
      const candidate = normalizeText(scope.find(selector).first().text());
      if (candidate && candidate.length < 50) {
        category = candidate;
        break;
      }
    }

    products.push({ name, category, url });
    return undefined;
  });

  return products;
}

/**
 * 解析商品页的名称与类目
 */
export function parseProductPage(html: string): ProductPageData {
  const $ = loadDocument(html);

  let name = '';
  const nameSelectors = [
    'h1',
    '[class*="product-title"]',
    '[class*="product-name"]',
    'h2',
    '[data-testid*="title"]',
    '[data-testid*="name"]'
  ];

  for (const selector of nameSelectors) {
    const candidates = $(selector).toArray().map(el => normalizeText($(el).text()));
    const match = candidates.find(text =>
      text.length > 3 && !NAME_SKIP_WORDS.some(word => text.toLowerCase().includes(word))
    );
    if (match) {
      name = match;
      break;
    }
  }

  if (!name) {
    const title = normalizeText($('title').text());
    name = title.length > 3 ? title : NOT_AVAILABLE;
  }

  let category = NOT_AVAILABLE;
  for (const selector of ['[class*="category"]', '[class*="tag"]']) {
    const candidate = normalizeText($(selector).first().text());
    if (candidate && candidate.length < 100) {
      category = candidate;
      break;
    }
  }

  return { name, category };
}

/**
 * 解析商品页"TikTok Ads"区块中的广告卡片
 */
export function parseAdCards(html: string, maxCards: number = 50, baseUrl: string = DEFAULT_BASE_URL): AdCard[] {
  const $ = loadDocument(html);

  // 优先在"TikTok Ads"标题所在区块内查找
  let scope = $('body');
  for (const label of TIKTOK_ADS_LABELS) {
    const heading = findLabel($, label);
    if (heading.length === 0) {
      continue;
    }
    const block = heading.parents().filter((_, el) => $(el).find('a[href*="/ad-search/"]').length > 0).first();
    if (block.length > 0) {
      scope = block;
      break;
    }
  }

  const result: AdCard[] = [];
  const seenUrls = new Set<string>();

  scope.find('a[href*="/ad-search/"]').each((_, el) => {
    if (result.length >= maxCards) {
      return false;
    }

    const link = $(el);
    const adDetailUrl = absoluteUrl(link.attr('href') || '', baseUrl);
    if (!adDetailUrl || seenUrls.has(adDetailUrl)) {
      return undefined;
    }
    seenUrls.add(adDetailUrl);

    // 卡片容器内只能有这一条详情链接，否则说明取到的是列表
    let card = link.closest('[class*="card"], [class*="item"], li');
    if (card.length === 0 || card.find('a[href*="/ad-search/"]').length > 1) {
      card = link.parent();
    }
    const text = normalizeText(card.text());

    result.push({
      adDetailUrl,
      impressions: extractCardImpressions(text),
      firstSeen: extractFirstSeen(text)
    });
    return undefined;
  });

  return result;
}

/**
 * 解析广告详情页
 */
export function parseAdDetailPage(html: string): AdDetailData {
  const $ = loadDocument(html);
  const pageText = normalizeText($('body').text());

  // TikTok 帖子链接：优先 "TikTok Post" 标签旁的链接
  let tiktokUrl = NOT_AVAILABLE;
  for (const label of ['TikTok Post', 'Пост TikTok']) {
    const href = findLabel($, label).parent().find('a[href*="tiktok.com"]').first().attr('href');
    if (href) {
      tiktokUrl = href;
      break;
    }
  }
  if (tiktokUrl === NOT_AVAILABLE) {
    tiktokUrl = $('a[href*="tiktok.com"]').first().attr('href') || NOT_AVAILABLE;
  }

  // 曝光量只认 "Impressions"/"Показы"，不能取点赞数
  let impressions = 0;
  const impressionPatterns = [
    /Impressions?[:\s]+([\d.,]+[KMB]?)/i,
    /([\d.,]+[KMB]?)\s*Impressions?/i,
    /Показы[:\s]*([\d.,]+[KMB]?)/i
  ];
  for (const pattern of impressionPatterns) {
    const match = pageText.match(pattern);
    const value = match ? parseImpressions(match[1]) : null;
    if (value !== null && value > 0) {
      impressions = value;
      break;
    }
  }

  const script = textAfterLabel($, ['Transcript', 'Анализ транскрипта'], 10) || NOT_AVAILABLE;
  const hook = textAfterLabel($, ['Hook'], 5) || NOT_AVAILABLE;

  let audienceText = labelledText($, ['Target Audience', 'Целевая аудитория'])?.text;
  if (!audienceText) {
    const fallback = normalizeText($('[class*="audience"]').first().text());
    audienceText = fallback || undefined;
  }

  let audienceAge = NOT_AVAILABLE;
  let audiencePlatform = NOT_AVAILABLE;
  let country = NOT_AVAILABLE;
  if (audienceText) {
    const ageMatch = audienceText.match(/(\d{1,2}-\d{1,2})/);
    if (ageMatch) {
      audienceAge = ageMatch[1];
    }

    const device = ['Android', 'iOS', 'iPhone', 'iPad'].find(keyword => audienceText?.includes(keyword));
    if (device) {
      audiencePlatform = device === 'Android' ? 'Android' : 'iOS';
    }

    const countryMatch = COUNTRY_KEYWORDS.find(keyword => containsKeyword(audienceText || '', keyword));
    if (countryMatch) {
      country = countryMatch;
    }
  }

  const firstSeenSection = labelledText($, ['First seen', 'Впервые замечено']);
  const firstSeen = (firstSeenSection && matchFirstDate(firstSeenSection.text, [new RegExp(`(${DATE})`)]))
    || matchFirstDate(pageText, FIRST_SEEN_PATTERNS.slice(0, 2))
    || NOT_AVAILABLE;

  return {
    tiktokUrl,
    impressions,
    script,
    hook,
    audience: formatAudience(audienceAge, audiencePlatform),
    audienceAge,
    audiencePlatform,
    country,
    firstSeen
  };
}

/**
 * 过滤视频：曝光量不低于阈值、日期在范围内；高曝光优先，按曝光量降序
 */
export function filterVideos<T extends { impressions: number; firstSeen: string | null }>(
  videos: T[],
  options: VideoFilterOptions,
  now: Date = new Date()
): T[] {
  const filtered = videos.filter(video => {
    if (video.impressions < options.minImpressions) {
      return false;
    }
    if (!video.firstSeen || video.firstSeen === NOT_AVAILABLE) {
      return true;
    }
    const parsed = parseVideoDate(video.firstSeen);
    // 日期无法解析时只看曝光量
    return parsed ? isDateWithinDays(parsed, options.daysBack, now) : true;
  });

  const rank = (video: T): number => (video.impressions >= options.priorityImpressions ? 0 : 1);
  return filtered.sort((a, b) => rank(a) - rank(b) || b.impressions - a.impressions);
}
