/**
 * 广告情报站采集器
 * 搜索页 -> 商品页 -> TikTok Ads 卡片 -> 过滤 -> 广告详情页
 */

import { BaseCollector, CollectionOptions } from './base-collector';
import { PageFetcher, SleepFunction, sleep } from '../http/page-fetcher';
import {
  DEFAULT_BASE_URL,
  VideoFilterOptions,
  filterVideos,
  parseAdCards,
  parseAdDetailPage,
  parseProductPage,
  parseSearchPage
} from '../parsers/ads-intel-parser';
import { AdCard, AdProduct, AdVideo, NOT_AVAILABLE, ProductLink } from '../types/product';
import { CollectionError, CollectionErrorType, toError } from '../utils/error-handler';
import { validateUrl } from '../validator';

export interface AdsIntelCollectorConfig {
  baseUrl: string;
  startUrl: string;
  productsPerRun: number;
  videosPerProduct: number;
  maxCards: number;
  filters: VideoFilterOptions;
  maxRetries: number;
}

export class AdsIntelCollector extends BaseCollector<AdProduct> {
  private settings: AdsIntelCollectorConfig;
  private fetcher: PageFetcher;
  private clock: () => Date;

  constructor(
    settings: Partial<AdsIntelCollectorConfig> & Pick<AdsIntelCollectorConfig, 'startUrl'>,
    fetcher: PageFetcher,
    sleepFn: SleepFunction = sleep,
    clock: () => Date = () => new Date()
  ) {
    const resolved: AdsIntelCollectorConfig = {
      baseUrl: DEFAULT_BASE_URL,
      productsPerRun: 5,
      videosPerProduct: 3,
      maxCards: 15,
      filters: { minImpressions: 5000, priorityImpressions: 100000, daysBack: 30 },
      maxRetries: 1,
      ...settings
    };
    super({ platform: 'ads_intel', name: '广告情报站采集器', maxRetries: resolved.maxRetries }, sleepFn);
    this.settings = resolved;
    this.fetcher = fetcher;
    this.clock = clock;
  }

  protected async onInitialize(): Promise<void> {
    if (!validateUrl(this.settings.startUrl)) {
      throw new CollectionError(
        `广告情报站起始地址无效: ${this.settings.startUrl || '(空)'}`,
        CollectionErrorType.CONFIGURATION_ERROR,
        this.platform,
        'initialize'
      );
    }
  }

  protected async executeCollection(options: CollectionOptions): Promise<AdProduct[]> {
    const count = options.maxItems ?? this.settings.productsPerRun;
    const searchHtml = await this.fetcher.fetchAccessiblePage(this.settings.startUrl);
    const links = parseSearchPage(searchHtml, count, this.settings.baseUrl);

    if (links.length === 0) {
      throw new CollectionError(
        '搜索页中没有找到商品链接',
        CollectionErrorType.DATA_PARSING_ERROR,
        this.platform,
        'parseSearchPage',
        { url: this.settings.startUrl }
      );
    }
    if (links.length < count) {
      this.logger.warn(`只找到 ${links.length}/${count} 个商品`, undefined, 'parseSearchPage');
    }

    const products: AdProduct[] = [];
    for (const [index, link] of links.entries()) {
      this.logger.info(`处理商品 ${index + 1}/${links.length}: ${link.name}`, { url: link.url }, 'collectProduct');
      try {
        products.push(await this.collectProduct(link));
      } catch (error) {
        // 单个商品失败不影响其他商品
        this.errorHandler.handleError(toError(error), {
          platform: this.platform,
          operation: 'collectProduct',
          details: { url: link.url }
        });
      }
    }

    if (products.length === 0) {
      throw new CollectionError(
        '所有商品都采集失败',
        CollectionErrorType.NETWORK_ERROR,
        this.platform,
        'collect'
      );
    }
    return products;
  }

  /**
   * 采集单个商品及其最佳视频
   */
  async collectProduct(link: ProductLink): Promise<AdProduct> {
    const html = await this.fetcher.fetchAccessiblePage(link.url);
    const page = parseProductPage(html);
    const cards = parseAdCards(html, this.settings.maxCards, this.settings.baseUrl);
    const selected = filterVideos(cards, this.settings.filters, this.clock()).slice(0, this.settings.videosPerProduct);

    this.logger.info(
      `广告卡片 ${cards.length} 张，过滤后保留 ${selected.length} 张`,
      { url: link.url },
      'collectProduct'
    );

    const videos: AdVideo[] = [];
    for (const card of selected) {
      const video = await this.collectVideo(card);
      if (video) {
        videos.push(video);
      }
    }

    return {
      name: page.name !== NOT_AVAILABLE ? page.name : link.name,
      category: page.category !== NOT_AVAILABLE ? page.category : link.category,
      sourceUrl: link.url,
      videos
    };
  }

  /**
   * 采集广告详情页；卡片上的曝光量和日期作为兜底
   */
  private async collectVideo(card: AdCard): Promise<AdVideo | null> {
    try {
      const html = await this.fetcher.fetchAccessiblePage(card.adDetailUrl);
      const detail = parseAdDetailPage(html);
      return {
        tiktokUrl: detail.tiktokUrl,
        impressions: detail.impressions > 0 ? detail.impressions : card.impressions,
        script: detail.script,
        hook: detail.hook,
        audience: detail.audience,
        country: detail.country,
        firstSeen: detail.firstSeen !== NOT_AVAILABLE ? detail.firstSeen : (card.firstSeen || NOT_AVAILABLE)
      };
    } catch (error) {
      this.logger.warn(
        `广告详情页采集失败: ${toError(error).message}`,
        { url: card.adDetailUrl },
        'collectVideo'
      );
      return null;
    }
  }
}
