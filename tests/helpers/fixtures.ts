/**
 * 测试用商品数据
 */

import {
  EvidenceVideo,
  NormalizedProduct,
  PlatformType,
  SourceType
} from '../../src/collection/types/product';
import { BrandProfile } from '../../src/analysis/types';

export const FIXED_NOW = new Date(2025, 9, 30, 12, 0, 0);

export function evidenceVideo(overrides: Partial<EvidenceVideo> = {}): EvidenceVideo {
  return {
    url: 'https://www.tiktok.com/@jane/video/1',
    views: 5000,
    hook: 'Stop scrolling now',
    script: 'My honest review of this serum',
    audience: '25-34 iOS',
    country: 'US',
    firstSeen: 'Oct 28 2025',
    branded: false,
    ...overrides
  };
}

export function sampleProduct(id: string, name: string, overrides: Partial<NormalizedProduct> = {}): NormalizedProduct {
  return {
    product: {
      id,
      platform: PlatformType.TIKTOK_SHOP,
      source: SourceType.ADS_INTEL,
      name,
      category: 'Beauty',
      productUrl: `https://shop.example.com/${id}`,
      sellerUrl: null,
      skuId: null,
      price: '$19.99',
      firstDetectedAt: FIXED_NOW,
      lastSeenAt: FIXED_NOW
    },
    snapshot: {
      productId: id,
      capturedAt: FIXED_NOW,
      views: 100000,
      likes: 5000,
      comments: 500,
      shares: 100,
      impressions: null,
      videoCount: 1,
      erPercent: 5.6
    },
    evidence: [evidenceVideo()],
    listingAgeDays: 5,
    ...overrides
  };
}

export const TEST_BRAND: BrandProfile = {
  name: 'Test Brand',
  positioning: 'Affordable skincare',
  targetAudience: { ageRange: '18-35', gender: 'female', markets: ['US', 'UK'] },
  categories: ['skincare', 'body care'],
  priceRange: { min: 8, max: 45, currency: 'USD' },
  values: ['cruelty free'],
  exclusions: ['supplements']
};
