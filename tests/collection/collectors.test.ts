/**
 * 采集器测试
 */

import { AdsIntelCollector } from '../../src/collection/collectors/ads-intel-collector';
import { VendorCollector } from '../../src/collection/collectors/vendor-collector';
import { DouyinCollector } from '../../src/collection/collectors/douyin-collector';
import { PageFetcher } from '../../src/collection/http/page-fetcher';
import { TrendingVideoClient } from '../../src/collection/vendors/trending-video-client';
import { HashtagBank } from '../../src/collection/hashtags';
import { CollectionError, CollectionErrorType } from '../../src/collection/utils/error-handler';
import { RoutedHttpClient, FakeRoute, noSleep } from '../helpers/fake-http';

const BASE = 'https://www.pipiads.com';
const START_URL = `${BASE}/search?q=serum`;

const SEARCH_HTML = [
  '<html><body>',
  '<div class="product-card"><a href="/tiktok-shop-product/123"><h3>Search Result Serum</h3></a></div>',
  '<div class="product-card"><a href="/tiktok-shop-product/456"><h3>Broken Product Page</h3></a></div>',
  '</body></html>'
].join('');

const PRODUCT_HTML = [
  '<html><body>',
  '<h1>Glow Vitamin C Serum</h1><div class="category">Beauty</div>',
  '<section><h2>TikTok Ads</h2><ul>',
  '<li><a href="/ad-search/1">View</a><span>Impressions: 170K</span><span>First seen: Oct 27 2025</span></li>',
  '<li><a href="/ad-search/2">View</a><span>Impressions: 3K</span><span>First seen: Oct 28 2025</span></li>',
  '</ul></section>',
  '</body></html>'
].join('');

const AD_DETAIL_HTML = [
  '<html><body>',
  '<div class="post"><span>TikTok Post</span><a href="https://www.tiktok.com/@glowshop/video/7001">Open</a></div>',
  '<div class="transcript"><span>Transcript</span><p>This serum changed my morning routine completely</p></div>',
  '<div class="hook"><span>Hook</span><p>Stop scrolling now</p></div>',
  '<div class="audience"><span>Target Audience</span><p>United States 25-34 iOS</p></div>',
  '</body></html>'
].join('');

function createAdsCollector(routes: Record<string, FakeRoute>, startUrl: string = START_URL) {
  const http = new RoutedHttpClient(routes);
  const fetcher = new PageFetcher({ delayMin: 0, delayMax: 0, maxRetries: 1 }, http, undefined, noSleep);
  const collector = new AdsIntelCollector(
    {
      startUrl,
      baseUrl: BASE,
      filters: { minImpressions: 5000, priorityImpressions: 100000, daysBack: 30 },
      maxRetries: 1
    },
    fetcher,
    noSleep,
    () => new Date(2025, 9, 30)
  );
  return { http, collector };
}

const BANK: HashtagBank = {
  platforms: {
    tiktok: { general: ['#viralbeauty', '#skincare', '#grwm'] },
    douyin: { face: ['#glow', '#acne'], hair: ['#hairloss'], general: ['#dupe'] }
  },
  commercialTriggers: []
};

describe('采集器测试', () => {
  describe('广告情报站采集器', () => {
    test('应该采集商品和通过过滤的视频', async () => {
      const { collector } = createAdsCollector({
        [START_URL]: { status: 200, data: SEARCH_HTML },
        [`${BASE}/tiktok-shop-product/123`]: { status: 200, data: PRODUCT_HTML },
        [`${BASE}/ad-search/1`]: { status: 200, data: AD_DETAIL_HTML }
      });

      await collector.initialize();
      const products = await collector.collect();

      expect(products).toEqual([
        {
          name: 'Glow Vitamin C Serum',
          category: 'Beauty',
          sourceUrl: `${BASE}/tiktok-shop-product/123`,
          videos: [
            {
              tiktokUrl: 'https://www.tiktok.com/@glowshop/video/7001',
              impressions: 170000,
              script: 'This serum changed my morning routine completely',
              hook: 'Stop scrolling now',
              audience: '25-34 iOS',
              country: 'United States',
              firstSeen: 'Oct 27 2025'
            }
          ]
        }
      ]);

      const status = collector.getStatus();
      expect(status.successfulCollections).toBe(1);
      expect(status.totalItemsCollected).toBe(1);
    });

    test('详情页失败时应该保留商品但跳过该视频', async () => {
      const { collector } = createAdsCollector({
        [START_URL]: { status: 200, data: SEARCH_HTML },
        [`${BASE}/tiktok-shop-product/123`]: { status: 200, data: PRODUCT_HTML }
      });

      await collector.initialize();
      const products = await collector.collect({ maxItems: 1 });

      expect(products).toHaveLength(1);
      expect(products[0].videos).toEqual([]);
    });

    test('搜索页没有商品时不应该重试', async () => {
      const { http, collector } = createAdsCollector({
        [START_URL]: { status: 200, data: '<html><head><title>Search</title></head><body><p>empty</p></body></html>' }
      });

      await collector.initialize();
      await expect(collector.collect()).rejects.toMatchObject({ errorType: CollectionErrorType.DATA_PARSING_ERROR });
      expect(http.countFor(START_URL)).toBe(1);
      expect(collector.getStatus().failedCollections).toBe(1);
    });

    test('被拦截时应该按配置重试', async () => {
      const { http, collector } = createAdsCollector({
        [START_URL]: { status: 200, data: '<html><head><title>Sign in</title></head><body></body></html>' }
      });

      await collector.initialize();
      await expect(collector.collect()).rejects.toMatchObject({ errorType: CollectionErrorType.ACCESS_BLOCKED });
      expect(http.countFor(START_URL)).toBe(2);
    });

    test('起始地址无效时初始化应该失败', async () => {
      const { collector } = createAdsCollector({}, 'not-a-url');
      await expect(collector.initialize()).rejects.toMatchObject({ errorType: CollectionErrorType.CONFIGURATION_ERROR });
    });

    test('未初始化时不能采集', async () => {
      const { collector } = createAdsCollector({});
      await expect(collector.collect()).rejects.toThrow('采集器未初始化');
    });
  });

  describe('趋势视频接口采集器', () => {
    const API = 'https://api.example.com/trending/videos';

    function createVendorCollector(route: FakeRoute) {
      const http = new RoutedHttpClient({ [API]: route });
      const client = new TrendingVideoClient({ baseUrl: 'https://api.example.com' }, http);
      const collector = new VendorCollector(client, BANK, { maxKeywords: 2, maxRetries: 0 }, noSleep);
      return { http, collector };
    }

    test('应该合并各关键词结果并按视频ID去重', async () => {
      const { http, collector } = createVendorCollector(options => {
        const keyword = options?.params?.keyword;
        return keyword === 'glow'
          ? { status: 200, data: [{ id: 'v1' }, { id: 'v2' }] }
          : { status: 200, data: { data: { videos: [{ id: 'v2' }, { id: 'v3' }] } } };
      });

      await collector.initialize();
      const videos = await collector.collect({ keywords: ['#glow', '#serum'] });

      expect(videos.map(video => video.videoId)).toEqual(['v1', 'v2', 'v3']);
      expect(http.requests.map(request => request.options?.params?.keyword)).toEqual(['glow', 'serum']);
    });

    test('没有关键词时应该使用TikTok标签库', async () => {
      const { http, collector } = createVendorCollector({ status: 200, data: [] });

      expect(collector.defaultKeywords()).toEqual(['#viralbeauty', '#skincare']);
      await collector.initialize();
      await expect(collector.collect()).resolves.toEqual([]);
      expect(http.requests.map(request => request.options?.params?.keyword)).toEqual(['viralbeauty', 'skincare']);
    });

    test('部分关键词失败时应该返回成功的结果', async () => {
      const { collector } = createVendorCollector(options =>
        options?.params?.keyword === 'glow'
          ? { status: 500, data: '' }
          : { status: 200, data: [{ id: 'v9' }] }
      );

      await collector.initialize();
      const videos = await collector.collect({ keywords: ['glow', 'serum'] });
      expect(videos.map(video => video.videoId)).toEqual(['v9']);
    });

    test('全部关键词失败时应该抛出错误', async () => {
      const { collector } = createVendorCollector({ status: 429, data: '' });

      await collector.initialize();
      const error = await collector.collect({ keywords: ['glow'] }).catch((reason: unknown) => reason);
      expect(error).toBeInstanceOf(CollectionError);
      expect(error).toMatchObject({ errorType: CollectionErrorType.RATE_LIMITED });
    });
  });

  describe('抖音话题搜索采集器', () => {
    const DOUYIN = 'https://www.douyin.com';
    const searchUrl = (term: string) => `${DOUYIN}/search/${term}?type=video`;
    const BLOCKED_HTML = '<html><head><title>登录后查看更多</title></head><body></body></html>';

    function aweme(id: string) {
      return {
        aweme_id: id,
        desc: `视频 ${id} #glow`,
        author: { nickname: '美妆小铺' },
        statistics: { play_count: 1000, digg_count: 50, comment_count: 5, share_count: 2 },
        create_time: 1761523200
      };
    }

    function searchPage(ids: string[]): string {
      const data = { search: { data: ids.map(id => ({ type: 1, aweme_info: aweme(id) })) } };
      return [
        '<html><head><title>抖音搜索</title></head><body>',
        `<script id="RENDER_DATA" type="application/json">${encodeURIComponent(JSON.stringify(data))}</script>`,
        '</body></html>'
      ].join('');
    }

    function createDouyinCollector(routes: Record<string, FakeRoute>, maxKeywords: number = 3, target: number = 3) {
      const http = new RoutedHttpClient(routes);
      const fetcher = new PageFetcher({ delayMin: 0, delayMax: 0, maxRetries: 1 }, http, undefined, noSleep);
      const collector = new DouyinCollector(
        fetcher,
        BANK,
        { categories: ['face', 'hair'], maxKeywords, target, maxRetries: 0 },
        noSleep
      );
      return { http, collector };
    }

    test('默认关键词应该在各类目之间轮流选取', () => {
      expect(createDouyinCollector({}, 4).collector.defaultKeywords()).toEqual(['#glow', '#hairloss', '#acne', '#dupe']);
      expect(createDouyinCollector({}, 3).collector.defaultKeywords()).toEqual(['#glow', '#hairloss', '#acne']);
    });

    test('应该按视频ID去重并在达到目标数后停止', async () => {
      const { http, collector } = createDouyinCollector({
        [searchUrl('glow')]: { status: 200, data: searchPage(['d1', 'd2']) },
        [searchUrl('hairloss')]: { status: 200, data: searchPage(['d2', 'd3', 'd4']) },
        [searchUrl('acne')]: { status: 200, data: searchPage(['d5']) }
      });

      await collector.initialize();
      const videos = await collector.collect();

      expect(videos.map(video => video.videoId)).toEqual(['d1', 'd2', 'd3']);
      expect(videos[0]).toMatchObject({
        url: 'https://www.douyin.com/video/d1',
        author: '美妆小铺',
        views: 1000,
        likes: 50,
        hashtags: ['#glow']
      });
      expect(http.requests.map(request => request.url)).toEqual([searchUrl('glow'), searchUrl('hairloss')]);
      expect(collector.platform).toBe('douyin');
    });

    test('被拦截的话题应该跳过并继续搜索', async () => {
      const { collector } = createDouyinCollector({
        [searchUrl('glow')]: { status: 200, data: BLOCKED_HTML },
        [searchUrl('hairloss')]: { status: 200, data: searchPage(['d7']) }
      }, 2);

      await collector.initialize();
      const videos = await collector.collect();
      expect(videos.map(video => video.videoId)).toEqual(['d7']);
    });

    test('全部话题被拦截时应该抛出access_blocked错误', async () => {
      const { collector } = createDouyinCollector({
        [searchUrl('glow')]: { status: 200, data: BLOCKED_HTML }
      });

      await collector.initialize();
      const error = await collector.collect({ keywords: ['#glow'] }).catch((reason: unknown) => reason);
      expect(error).toBeInstanceOf(CollectionError);
      expect(error).toMatchObject({ errorType: CollectionErrorType.ACCESS_BLOCKED });
    });

    test('地址无效时初始化应该失败', async () => {
      const http = new RoutedHttpClient({});
      const fetcher = new PageFetcher({ delayMin: 0, delayMax: 0 }, http, undefined, noSleep);
      const collector = new DouyinCollector(fetcher, BANK, { baseUrl: 'not a url' }, noSleep);

      await expect(collector.initialize()).rejects.toMatchObject({ errorType: CollectionErrorType.CONFIGURATION_ERROR });
    });
  });
});
