/**
 * 按配置组装流水线依赖
 */

import { AdsIntelCollector } from '../collection/collectors/ads-intel-collector';
import { VendorCollector } from '../collection/collectors/vendor-collector';
import { DouyinCollector } from '../collection/collectors/douyin-collector';
import { AxiosHttpClient, PageFetcher } from '../collection/http/page-fetcher';
import { TrendingVideoClient } from '../collection/vendors/trending-video-client';
import { loadHashtagBank } from '../collection/hashtags';
import { createPlatformLogger } from '../collection/utils/logger';
import { ClientFactory } from '../analysis/ai-engine/client-factory';
import { OpenAIEmbeddingProvider } from '../analysis/ai-engine/embedding';
import { loadBrandProfile } from '../analysis/brand-profile';
import { SsrRater, loadAnchors } from '../analysis/ssr';
import { RadarDatabase } from '../db';
import { RadarConfig } from '../system/config';
import { PipelineDependencies, RadarPipeline } from './radar-pipeline';

export function createPipelineDependencies(config: RadarConfig, database: RadarDatabase): PipelineDependencies {
  const hashtags = loadHashtagBank();
  const brand = loadBrandProfile(config.brand.profilePath);
  const http = new AxiosHttpClient(config.http.timeout);

  const adsCollector = config.adsIntel.startUrl
    ? new AdsIntelCollector(
      {
        baseUrl: config.adsIntel.baseUrl,
        startUrl: config.adsIntel.startUrl,
        productsPerRun: config.adsIntel.productsPerRun,
        videosPerProduct: config.adsIntel.videosPerProduct,
        maxCards: config.adsIntel.maxCards,
        filters: config.filters
      },
      new PageFetcher(
        {
          timeout: config.http.timeout,
          maxRetries: config.http.maxRetries,
          retryDelayBase: config.http.retryDelayBase,
          delayMin: config.http.delayMin,
          delayMax: config.http.delayMax,
          sessionCookie: config.adsIntel.sessionCookie
        },
        http,
        createPlatformLogger('ads_intel.http')
      )
    )
    : null;

  const vendorCollector = config.vendor.baseUrl
    ? new VendorCollector(
      new TrendingVideoClient({ baseUrl: config.vendor.baseUrl, apiKey: config.vendor.apiKey }, http),
      hashtags,
      { region: config.vendor.region, period: config.vendor.period, limit: config.vendor.limit }
    )
    : null;

  const douyinCollector = config.douyin.enabled
    ? new DouyinCollector(
      new PageFetcher(
        {
          timeout: config.http.timeout,
          maxRetries: config.http.maxRetries,
          retryDelayBase: config.http.retryDelayBase,
          delayMin: config.http.delayMin,
          delayMax: config.http.delayMax,
          sessionCookie: config.douyin.sessionCookie,
          acceptLanguage: 'zh-CN,zh;q=0.9,en;q=0.8'
        },
        http,
        createPlatformLogger('douyin.http')
      ),
      hashtags,
      {
        baseUrl: config.douyin.baseUrl,
        categories: config.douyin.categories,
        target: config.douyin.target,
        maxKeywords: config.douyin.maxKeywords
      }
    )
    : null;

  const llmClient = ClientFactory.createOptional(config.llm);
  const ssr = llmClient && config.embedding.apiKey
    ? new SsrRater(
      new OpenAIEmbeddingProvider({ apiKey: config.embedding.apiKey, model: config.embedding.model }),
      loadAnchors()
    )
    : null;

  return { config, database, brand, adsCollector, vendorCollector, douyinCollector, llmClient, ssr, hashtags };
}

export function createPipeline(config: RadarConfig, database: RadarDatabase): RadarPipeline {
  return new RadarPipeline(createPipelineDependencies(config, database));
}
