/**
 * 数据标准化
 * 把广告情报站商品与趋势视频转换为统一的商品记录 + 指标快照
 */

import crypto from 'crypto';
import {
  AdProduct,
  EvidenceVideo,
  MetricsSnapshot,
  NOT_AVAILABLE,
  NormalizedProduct,
  PlatformType,
  ProductRecord,
  SourceType,
  TrendingVideo
} from './types/product';
import { daysBetween, parseVideoDate } from './validator';

export interface ProductIdSource {
  platform: string;
  skuId?: string | null;
  url?: string | null;
  name: string;
}

/** 账号名中出现这些词视为品牌官方号 */
const BRANDED_ACCOUNT_PATTERN = /official|shop|store|brand|官方|旗舰/i;

const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function present(value: string | null | undefined): value is string {
  return !!value && value.trim() !== '' && value.trim() !== NOT_AVAILABLE;
}

function normalizeUrl(url: string): string {
  return url.trim().replace(/[?#].*$/, '').replace(/\/+$/, '').toLowerCase();
}

/**
 * 稳定的商品ID：平台+SKU，其次URL，最后平台+名称
 */
export function productIdFor(source: ProductIdSource): string {
  let key: string;
  if (present(source.skuId)) {
    key = `${source.platform}|sku|${source.skuId.trim()}`;
  } else if (present(source.url)) {
    key = `url|${normalizeUrl(source.url)}`;
  } else {
    key = `${source.platform}|name|${source.name.trim().toLowerCase()}`;
  }
  return crypto.createHash('sha1').update(key).digest('hex').slice(0, 16);
}

/**
 * 互动率 ER = (点赞 + 评论) / 播放 * 100，保留两位小数；只有评论时按评论×2估算
 */
export function calculateEr(
  likes: number | null | undefined,
  comments: number | null | undefined,
  views: number | null | undefined
): number | null {
  if (!views || views <= 0) {
    return null;
  }

  let engagement = 0;
  if (likes !== null && likes !== undefined) {
    engagement += likes;
    if (comments !== null && comments !== undefined) {
      engagement += comments;
    }
  } else if (comments !== null && comments !== undefined) {
    engagement = comments * 2;
  }

  return Math.round((engagement / views) * 100 * 100) / 100;
}

/**
 * 从 TikTok 视频链接中取出账号名
 */
export function accountFromUrl(url: string | null | undefined): string | null {
  const match = (url || '').match(/tiktok\.com\/@([^/?#]+)/i);
  return match ? match[1] : null;
}

export function isBrandedAccount(account: string | null | undefined): boolean {
  return !!account && BRANDED_ACCOUNT_PATTERN.test(account);
}

/**
 * 商品页URL中的TikTok Shop商品ID
 */
export function skuFromUrl(url: string): string | null {
  const match = url.match(/tiktok-shop-product\/(\d+)/);
  return match ? match[1] : null;
}

export function formatVideoDate(date: Date): string {
  return `${MONTH_NAMES[date.getMonth()]} ${String(date.getDate()).padStart(2, '0')} ${date.getFullYear()}`;
}

function sumOrNull(values: Array<number | null>): number | null {
  const known = values.filter((value): value is number => value !== null);
  return known.length > 0 ? known.reduce((total, value) => total + value, 0) : null;
}

function earliestAge(dates: Array<Date | null>, now: Date): number | null {
  const known = dates.filter((date): date is Date => date !== null);
  if (known.length === 0) {
    return null;
  }
  const earliest = known.reduce((min, date) => (date.getTime() < min.getTime() ? date : min));
  return Math.max(0, daysBetween(earliest, now));
}

/**
 * 广告情报站商品 -> 标准化商品
 */
export function normalizeAdProduct(source: AdProduct, now: Date = new Date()): NormalizedProduct {
  const skuId = skuFromUrl(source.sourceUrl);
  const platform = PlatformType.TIKTOK_SHOP;
  const id = productIdFor({ platform, skuId, url: source.sourceUrl, name: source.name });

  const product: ProductRecord = {
    id,
    platform,
    source: SourceType.ADS_INTEL,
    name: source.name,
    category: source.category,
    productUrl: source.sourceUrl,
    sellerUrl: null,
    skuId,
    price: null,
    firstDetectedAt: now,
    lastSeenAt: now
  };

  const evidence: EvidenceVideo[] = source.videos.map(video => ({
    url: video.tiktokUrl,
    views: video.impressions > 0 ? video.impressions : null,
    hook: present(video.hook) ? video.hook : null,
    script: present(video.script) ? video.script : null,
    audience: present(video.audience) ? video.audience : null,
    country: present(video.country) ? video.country : null,
    firstSeen: present(video.firstSeen) ? video.firstSeen : null,
    branded: isBrandedAccount(accountFromUrl(video.tiktokUrl))
  }));

  const snapshot: MetricsSnapshot = {
    productId: id,
    capturedAt: now,
    views: null,
    likes: null,
    comments: null,
    shares: null,
    impressions: sumOrNull(source.videos.map(video => (video.impressions > 0 ? video.impressions : null))),
    videoCount: source.videos.length,
    erPercent: null
  };

  return {
    product,
    snapshot,
    evidence,
    listingAgeDays: earliestAge(source.videos.map(video => parseVideoDate(video.firstSeen)), now)
  };
}

export interface VideoSourceOptions {
  platform?: PlatformType;
  source?: SourceType;
}

/**
 * 趋势视频按挂载商品分组 -> 标准化商品；没有挂载商品的视频被忽略
 */
export function normalizeTrendingVideos(
  videos: TrendingVideo[],
  now: Date = new Date(),
  { platform = PlatformType.TIKTOK_SHOP, source = SourceType.TRENDING_API }: VideoSourceOptions = {}
): NormalizedProduct[] {
  const groups = new Map<string, { product: ProductRecord; videos: TrendingVideo[] }>();

  for (const video of videos) {
    if (!video.product) {
      continue;
    }
    const { productId, title, shopUrl, price, category } = video.product;
    const id = productIdFor({ platform, skuId: productId, url: shopUrl, name: title });

    const group = groups.get(id);
    if (group) {
      group.videos.push(video);
      continue;
    }
    groups.set(id, {
      product: {
        id,
        platform,
        source,
        name: title,
        category: category || NOT_AVAILABLE,
        productUrl: shopUrl,
        sellerUrl: null,
        skuId: productId,
        price,
        firstDetectedAt: now,
        lastSeenAt: now
      },
      videos: [video]
    });
  }

  return [...groups.values()].map(({ product, videos: groupVideos }) => {
    const views = sumOrNull(groupVideos.map(video => video.views));
    const likes = sumOrNull(groupVideos.map(video => video.likes));
    const comments = sumOrNull(groupVideos.map(video => video.comments));

    const evidence: EvidenceVideo[] = [...groupVideos]
      .sort((a, b) => (b.views ?? 0) - (a.views ?? 0))
      .map(video => ({
        url: video.url,
        views: video.views,
        hook: null,
        script: video.description || null,
        audience: null,
        country: null,
        firstSeen: video.publishedAt ? formatVideoDate(video.publishedAt) : null,
        branded: isBrandedAccount(video.author)
      }));

    return {
      product,
      snapshot: {
        productId: product.id,
        capturedAt: now,
        views,
        likes,
        comments,
        shares: sumOrNull(groupVideos.map(video => video.shares)),
        impressions: null,
        videoCount: groupVideos.length,
        erPercent: calculateEr(likes, comments, views)
      },
      evidence,
      listingAgeDays: earliestAge(groupVideos.map(video => video.publishedAt), now)
    };
  });
}

/**
 * 快照的信息量：非空指标数
 */
function richness(snapshot: MetricsSnapshot): number {
  return [snapshot.views, snapshot.likes, snapshot.comments, snapshot.shares, snapshot.impressions, snapshot.erPercent]
    .filter(value => value !== null).length;
}

function isRicher(candidate: MetricsSnapshot, current: MetricsSnapshot): boolean {
  const diff = richness(candidate) - richness(current);
  if (diff !== 0) {
    return diff > 0;
  }
  if (candidate.videoCount !== current.videoCount) {
    return candidate.videoCount > current.videoCount;
  }
  return (candidate.views ?? candidate.impressions ?? 0) > (current.views ?? current.impressions ?? 0);
}

/**
 * 按ID合并重复商品，保留信息最丰富的快照，证据视频按URL去重合并
 */
export function deduplicate(products: NormalizedProduct[]): NormalizedProduct[] {
  const merged = new Map<string, NormalizedProduct>();

  for (const item of products) {
    const existing = merged.get(item.product.id);
    if (!existing) {
      merged.set(item.product.id, { ...item, evidence: [...item.evidence] });
      continue;
    }

    const base = isRicher(item.snapshot, existing.snapshot) ? item : existing;
    const other = base === item ? existing : item;
    const evidenceUrls = new Set(base.evidence.map(video => video.url));

    merged.set(item.product.id, {
      product: {
        ...base.product,
        category: base.product.category !== NOT_AVAILABLE ? base.product.category : other.product.category,
        price: base.product.price ?? other.product.price,
        productUrl: base.product.productUrl ?? other.product.productUrl
      },
      snapshot: base.snapshot,
      evidence: [...base.evidence, ...other.evidence.filter(video => !evidenceUrls.has(video.url))],
      listingAgeDays: Math.max(base.listingAgeDays ?? -1, other.listingAgeDays ?? -1) >= 0
        ? Math.max(base.listingAgeDays ?? 0, other.listingAgeDays ?? 0)
        : null
    });
  }

  return [...merged.values()];
}
