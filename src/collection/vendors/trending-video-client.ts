/**
 * 趋势视频数据接口客户端
 * 兼容不同供应商的字段命名
 */

import { HttpClient, HttpResponse } from '../http/page-fetcher';
import { TrendingVideo, TrendingVideoProduct } from '../types/product';
import { CollectionError, CollectionErrorType, toError } from '../utils/error-handler';
import { isObject, pickCount, pickDate, pickId, pickString } from './json-fields';

export interface TrendingVideoClientConfig {
  baseUrl: string;
  apiKey?: string;
  /** 接口路径 */
  endpoint: string;
}

export interface TrendingQuery {
  region?: string;
  /** 统计周期（天） */
  period?: number;
  limit?: number;
  keyword?: string;
}

const VIEW_KEYS = ['views', 'view_count', 'playCount', 'play_count'];
const LIKE_KEYS = ['likes', 'diggCount', 'like_count', 'digg_count'];
const COMMENT_KEYS = ['comments', 'commentCount', 'comment_count'];
const SHARE_KEYS = ['shares', 'shareCount', 'share_count'];

export type VideoUrlBuilder = (videoId: string, author: string) => string;

export const tiktokVideoUrl: VideoUrlBuilder = (videoId, author) =>
  `https://www.tiktok.com/@${author || 'unknown'}/video/${videoId}`;

/**
 * 把一条原始记录映射为TrendingVideo，缺少可信ID时返回null
 */
export function mapTrendingVideo(raw: unknown, videoUrl: VideoUrlBuilder = tiktokVideoUrl): TrendingVideo | null {
  if (!isObject(raw)) {
    return null;
  }

  const rawStats = isObject(raw.stats) ? raw.stats : raw.statistics;
  const stats = isObject(rawStats) ? { ...rawStats, ...raw } : raw;
  const videoId = pickId(raw, ['id', 'video_id', 'aweme_id', 'videoId']);
  if (!videoId) {
    return null;
  }

  const authorValue = raw.author;
  const author = isObject(authorValue)
    ? pickString(authorValue, ['unique_id', 'uniqueId', 'nickname', 'name']) || ''
    : pickString(raw, ['author', 'author_name', 'authorName']) || '';

  const description = pickString(raw, ['description', 'desc', 'title', 'caption']) || '';

  let hashtags: string[] = [];
  const rawTags = raw.hashtags ?? raw.challenges;
  if (Array.isArray(rawTags)) {
    hashtags = rawTags
      .map(tag => (typeof tag === 'string' ? tag : isObject(tag) ? pickString(tag, ['name', 'title', 'hashtag_name']) : null))
      .filter((tag): tag is string => !!tag)
      .map(tag => (tag.startsWith('#') ? tag : `#${tag}`));
  } else {
    hashtags = description.match(/#[^\s#]+/g) || [];
  }

  const url = pickString(raw, ['url', 'share_url', 'video_url', 'webVideoUrl']) || videoUrl(videoId, author);

  const rawProduct = raw.product;
  const rawProducts = raw.products ?? raw.promotions;
  const firstProduct: unknown = Array.isArray(rawProducts) ? rawProducts[0] : undefined;
  const productSource = isObject(rawProduct) ? rawProduct : isObject(firstProduct) ? firstProduct : null;

  let product: TrendingVideoProduct | null = null;
  if (productSource) {
    const title = pickString(productSource, ['title', 'name', 'product_name']);
    if (title) {
      product = {
        productId: pickId(productSource, ['id', 'product_id', 'productId', 'promotion_id']),
        title,
        price: pickString(productSource, ['price', 'price_text', 'min_price']),
        category: pickString(productSource, ['category', 'category_name']),
        shopUrl: pickString(productSource, ['shop_url', 'shopUrl', 'url', 'product_url'])
      };
    }
  }

  return {
    videoId,
    url,
    description,
    author,
    hashtags,
    views: pickCount(stats, VIEW_KEYS),
    likes: pickCount(stats, LIKE_KEYS),
    comments: pickCount(stats, COMMENT_KEYS),
    shares: pickCount(stats, SHARE_KEYS),
    publishedAt: pickDate(raw, ['create_time', 'createTime', 'published_at', 'publishedAt']),
    product
  };
}

export class TrendingVideoClient {
  private config: TrendingVideoClientConfig;
  private http: HttpClient;

  constructor(config: Partial<TrendingVideoClientConfig> & Pick<TrendingVideoClientConfig, 'baseUrl'>, http: HttpClient) {
    this.config = {
      endpoint: '/trending/videos',
      ...config
    };
    this.http = http;
  }

  /**
   * 拉取趋势视频
   */
  async fetchTrendingVideos(query: TrendingQuery = {}): Promise<TrendingVideo[]> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}${this.config.endpoint}`;
    const params: Record<string, string | number> = {};
    if (query.region) params.region = query.region;
    if (query.period !== undefined) params.period = query.period;
    if (query.limit !== undefined) params.limit = query.limit;
    if (query.keyword) params.keyword = query.keyword;

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    let response: HttpResponse;
    try {
      response = await this.http.get(url, { headers, params });
    } catch (error) {
      throw new CollectionError(
        `趋势接口请求失败: ${toError(error).message}`,
        CollectionErrorType.NETWORK_ERROR,
        'trending_api',
        'fetchTrendingVideos',
        { url, keyword: query.keyword }
      );
    }

    if (response.status < 200 || response.status >= 300) {
      const errorType = response.status === 429
        ? CollectionErrorType.RATE_LIMITED
        : response.status === 401 || response.status === 403
          ? CollectionErrorType.ACCESS_BLOCKED
          : CollectionErrorType.NETWORK_ERROR;
      throw new CollectionError(
        `趋势接口返回 HTTP ${response.status}`,
        errorType,
        'trending_api',
        'fetchTrendingVideos',
        { url, status: response.status, keyword: query.keyword }
      );
    }

    const items = TrendingVideoClient.extractItems(response.data);
    if (!items) {
      throw new CollectionError(
        '趋势接口返回的数据格式无效',
        CollectionErrorType.DATA_PARSING_ERROR,
        'trending_api',
        'fetchTrendingVideos',
        { url }
      );
    }

    const videos = items
      .map(item => mapTrendingVideo(item))
      .filter((video): video is TrendingVideo => video !== null);
    return query.limit !== undefined ? videos.slice(0, query.limit) : videos;
  }

  /**
   * 支持 [...]、{data: [...]}、{videos: [...]}、{data: {videos: [...]}}
   */
  static extractItems(body: unknown): unknown[] | null {
    let data = body;
    if (typeof data === 'string') {
      try {
        data = JSON.parse(data);
      } catch {
        return null;
      }
    }
    if (Array.isArray(data)) {
      return data;
    }
    if (!isObject(data)) {
      return null;
    }
    for (const key of ['data', 'videos', 'items', 'list']) {
      const value = data[key];
      if (Array.isArray(value)) {
        return value;
      }
      if (isObject(value)) {
        const nested = TrendingVideoClient.extractItems(value);
        if (nested) {
          return nested;
        }
      }
    }
    return null;
  }
}
