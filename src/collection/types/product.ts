/**
 * 统一商品与视频数据模型
 * 用于标准化广告情报站与趋势视频接口采集的数据
 */

/** 平台类型枚举 */
export enum PlatformType {
  TIKTOK = 'tiktok',
  TIKTOK_SHOP = 'tiktok_shop',
  DOUYIN = 'douyin',
  XIAOHONGSHU = 'xiaohongshu'
}

/** 数据来源 */
export enum SourceType {
  /** 广告情报站（HTML页面） */
  ADS_INTEL = 'ads_intel',
  /** 趋势视频数据接口（REST） */
  TRENDING_API = 'trending_api',
  /** 抖音话题搜索页 */
  DOUYIN_SEARCH = 'douyin_search'
}

/** 缺省文本值 */
export const NOT_AVAILABLE = 'N/A';

/**
 * 搜索页上的商品链接
 */
export interface ProductLink {
  name: string;
  category: string;
  url: string;
}

/**
 * 商品页"TikTok Ads"区块里的一张广告卡片
 */
export interface AdCard {
  /** 广告详情页地址（绝对路径） */
  adDetailUrl: string;
  /** 曝光量，未识别为0 */
  impressions: number;
  /** 首次出现日期（"Oct 27 2025"格式），未识别为null */
  firstSeen: string | null;
}

/**
 * 广告详情页解析出的视频数据
 */
export interface AdVideo {
  tiktokUrl: string;
  impressions: number;
  script: string;
  hook: string;
  /** "35-45 Android" 格式 */
  audience: string;
  country: string;
  firstSeen: string;
}

/**
 * 广告情报站上的一个商品及其最佳视频
 */
export interface AdProduct {
  name: string;
  category: string;
  sourceUrl: string;
  videos: AdVideo[];
}

/**
 * 趋势视频接口返回的单条视频
 */
export interface TrendingVideo {
  videoId: string;
  url: string;
  description: string;
  author: string;
  hashtags: string[];
  views: number | null;
  likes: number | null;
  comments: number | null;
  shares: number | null;
  publishedAt: Date | null;
  product: TrendingVideoProduct | null;
}

/**
 * 视频挂载的商品
 */
export interface TrendingVideoProduct {
  productId: string | null;
  title: string;
  price: string | null;
  category: string | null;
  shopUrl: string | null;
}

/**
 * 标准化后的商品记录（products表的一行）
 */
export interface ProductRecord {
  id: string;
  platform: PlatformType;
  source: SourceType;
  name: string;
  category: string;
  productUrl: string | null;
  sellerUrl: string | null;
  skuId: string | null;
  price: string | null;
  firstDetectedAt: Date;
  lastSeenAt: Date;
}

/**
 * 某一时刻的指标快照（metrics_history表的一行）
 */
export interface MetricsSnapshot {
  productId: string;
  capturedAt: Date;
  views: number | null;
  likes: number | null;
  comments: number | null;
  shares: number | null;
  impressions: number | null;
  videoCount: number;
  erPercent: number | null;
}

/**
 * 证据视频（用于报告和LLM提示）
 */
export interface EvidenceVideo {
  url: string;
  views: number | null;
  hook: string | null;
  script: string | null;
  audience: string | null;
  country: string | null;
  firstSeen: string | null;
  /** 是否为品牌官方投放（非UGC） */
  branded: boolean;
}

/**
 * 归一化结果：商品 + 本次快照 + 证据视频
 */
export interface NormalizedProduct {
  product: ProductRecord;
  snapshot: MetricsSnapshot;
  evidence: EvidenceVideo[];
  /** 挂牌时长（天），未知为null */
  listingAgeDays: number | null;
}
