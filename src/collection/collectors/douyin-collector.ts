/**
 * 抖音话题搜索采集器
 * 按类目从标签库取话题，逐个搜索视频，凑满目标条数即停止
 */

import { BaseCollector, CollectionOptions } from './base-collector';
import { PageFetcher, SleepFunction, sleep } from '../http/page-fetcher';
import { DOUYIN_BASE_URL, buildSearchUrl, parseDouyinSearchPage } from '../parsers/douyin-parser';
import { HashtagBank, hashtagsForCategory } from '../hashtags';
import { PlatformType, TrendingVideo } from '../types/product';
import { CollectionError, CollectionErrorType, toError } from '../utils/error-handler';
import { validateUrl } from '../validator';

export interface DouyinCollectorConfig {
  baseUrl: string;
  /** 标签库中的类目，按顺序轮流取话题 */
  categories: string[];
  /** 目标视频数 */
  target: number;
  /** 最多搜索的话题数 */
  maxKeywords: number;
  maxRetries: number;
}

export class DouyinCollector extends BaseCollector<TrendingVideo> {
  private settings: DouyinCollectorConfig;
  private fetcher: PageFetcher;
  private hashtags: HashtagBank;

  constructor(
    fetcher: PageFetcher,
    hashtags: HashtagBank,
    settings: Partial<DouyinCollectorConfig> = {},
    sleepFn: SleepFunction = sleep
  ) {
    const resolved: DouyinCollectorConfig = {
      baseUrl: DOUYIN_BASE_URL,
      categories: ['face', 'hair', 'body', 'makeup'],
      target: 25,
      maxKeywords: 8,
      maxRetries: 1,
      ...settings
    };
    super({ platform: PlatformType.DOUYIN, name: '抖音话题搜索采集器', maxRetries: resolved.maxRetries }, sleepFn);
    this.settings = resolved;
    this.fetcher = fetcher;
    this.hashtags = hashtags;
  }

  protected async onInitialize(): Promise<void> {
    if (!validateUrl(this.settings.baseUrl)) {
      throw new CollectionError(
        `抖音地址无效: ${this.settings.baseUrl || '(空)'}`,
        CollectionErrorType.CONFIGURATION_ERROR,
        this.platform,
        'initialize'
      );
    }
  }

  /**
   * 默认关键词：各类目话题轮流取，类目话题之后才是通用话题
   */
  defaultKeywords(): string[] {
    const lists = this.settings.categories.map(category =>
      hashtagsForCategory(this.hashtags, PlatformType.DOUYIN, category)
    );
    const keywords = new Set<string>();
    const longest = Math.max(0, ...lists.map(list => list.length));

    for (let index = 0; index < longest && keywords.size < this.settings.maxKeywords; index++) {
      for (const list of lists) {
        if (index < list.length && keywords.size < this.settings.maxKeywords) {
          keywords.add(list[index]);
        }
      }
    }
    return [...keywords];
  }

  protected async executeCollection(options: CollectionOptions): Promise<TrendingVideo[]> {
    const keywords = options.keywords && options.keywords.length > 0 ? options.keywords : this.defaultKeywords();
    const target = options.maxItems ?? this.settings.target;
    const videos = new Map<string, TrendingVideo>();
    const failures: Error[] = [];
    let searched = 0;

    for (const keyword of keywords) {
      if (videos.size >= target) {
        break;
      }
      searched++;

      const url = buildSearchUrl(keyword, this.settings.baseUrl);
      try {
        const html = await this.fetcher.fetchAccessiblePage(url);
        const batch = parseDouyinSearchPage(html);
        for (const video of batch) {
          if (!videos.has(video.videoId)) {
            videos.set(video.videoId, video);
          }
        }
        this.logger.info(`话题 ${keyword} 返回 ${batch.length} 条视频`, { url }, 'search');
      } catch (error) {
        const failure = toError(error);
        failures.push(failure);
        this.logger.warn(`话题 ${keyword} 搜索失败: ${failure.message}`, { url }, 'search');
      }
    }

    // 全部话题失败时向上抛出，交给重试逻辑
    if (searched > 0 && failures.length === searched) {
      const last = failures[failures.length - 1];
      throw last instanceof CollectionError
        ? last
        : new CollectionError(last.message, CollectionErrorType.NETWORK_ERROR, this.platform, 'collect');
    }

    return [...videos.values()].slice(0, target);
  }
}
