/**
 * 趋势视频接口采集器
 * 以标签库中的话题作为关键词拉取趋势视频
 */

import { BaseCollector, CollectionOptions } from './base-collector';
import { SleepFunction, sleep } from '../http/page-fetcher';
import { TrendingVideoClient } from '../vendors/trending-video-client';
import { HashtagBank, allHashtags } from '../hashtags';
import { PlatformType, TrendingVideo } from '../types/product';
import { CollectionError, CollectionErrorType, toError } from '../utils/error-handler';

export interface VendorCollectorConfig {
  region: string;
  period: number;
  /** 每个关键词的条数 */
  limit: number;
  /** 最多查询的关键词数 */
  maxKeywords: number;
  maxRetries: number;
}

export class VendorCollector extends BaseCollector<TrendingVideo> {
  private settings: VendorCollectorConfig;
  private client: TrendingVideoClient;
  private hashtags: HashtagBank;

  constructor(
    client: TrendingVideoClient,
    hashtags: HashtagBank,
    settings: Partial<VendorCollectorConfig> = {},
    sleepFn: SleepFunction = sleep
  ) {
    const resolved: VendorCollectorConfig = {
      region: 'US',
      period: 7,
      limit: 20,
      maxKeywords: 5,
      maxRetries: 1,
      ...settings
    };
    super({ platform: PlatformType.TIKTOK, name: '趋势视频接口采集器', maxRetries: resolved.maxRetries }, sleepFn);
    this.settings = resolved;
    this.client = client;
    this.hashtags = hashtags;
  }

  protected async onInitialize(): Promise<void> {
    return undefined;
  }

  /**
   * 默认关键词：TikTok 标签库
   */
  defaultKeywords(): string[] {
    return allHashtags(this.hashtags, PlatformType.TIKTOK).slice(0, this.settings.maxKeywords);
  }

  protected async executeCollection(options: CollectionOptions): Promise<TrendingVideo[]> {
    const keywords = options.keywords && options.keywords.length > 0 ? options.keywords : this.defaultKeywords();
    const limit = options.maxItems ?? this.settings.limit;
    const videos = new Map<string, TrendingVideo>();
    const failures: Error[] = [];

    for (const keyword of keywords) {
      try {
        const batch = await this.client.fetchTrendingVideos({
          region: this.settings.region,
          period: this.settings.period,
          limit,
          keyword: keyword.replace(/^#/, '')
        });
        for (const video of batch) {
          if (!videos.has(video.videoId)) {
            videos.set(video.videoId, video);
          }
        }
        this.logger.info(`关键词 ${keyword} 返回 ${batch.length} 条视频`, undefined, 'fetchTrendingVideos');
      } catch (error) {
        const failure = toError(error);
        failures.push(failure);
        this.logger.warn(`关键词 ${keyword} 查询失败: ${failure.message}`, undefined, 'fetchTrendingVideos');
      }
    }

    // 全部关键词失败时向上抛出，交给重试逻辑
    if (keywords.length > 0 && failures.length === keywords.length) {
      const last = failures[failures.length - 1];
      throw last instanceof CollectionError
        ? last
        : new CollectionError(last.message, CollectionErrorType.NETWORK_ERROR, this.platform, 'collect');
    }

    return [...videos.values()];
  }
}
