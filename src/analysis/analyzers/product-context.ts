import { NormalizedProduct } from '../../collection/types/product';
import { formatImpressions } from '../../collection/validator';
import { BrandProfile } from '../types';

const MAX_EVIDENCE = 3;

function shorten(text: string, max = 300): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

/**
 * 提示中使用的商品描述
 */
export function describeProduct(item: NormalizedProduct): string {
  const { product, snapshot, evidence } = item;
  const lines = [
    `Product: ${product.name}`,
    `Platform: ${product.platform}`,
    `Category: ${product.category}`,
    `Price: ${product.price ?? 'unknown'}`,
    `Videos: ${snapshot.videoCount}`,
    `Views: ${snapshot.views !== null ? formatImpressions(snapshot.views) : 'unknown'}`,
    `Ad impressions: ${snapshot.impressions !== null ? formatImpressions(snapshot.impressions) : 'unknown'}`,
    `Engagement rate: ${snapshot.erPercent !== null ? `${snapshot.erPercent}%` : 'unknown'}`,
    `Listing age (days): ${item.listingAgeDays ?? 'unknown'}`
  ];

  evidence.slice(0, MAX_EVIDENCE).forEach((video, index) => {
    lines.push(`Video ${index + 1}: ${video.url}`);
    if (video.hook) lines.push(`  Hook: ${shorten(video.hook)}`);
    if (video.script) lines.push(`  Script: ${shorten(video.script)}`);
    if (video.audience) lines.push(`  Audience: ${video.audience}`);
    if (video.country) lines.push(`  Country: ${video.country}`);
  });

  return lines.join('\n');
}

export function describeBrand(brand: BrandProfile): string {
  return [
    `Brand: ${brand.name}`,
    `Positioning: ${brand.positioning}`,
    `Target audience: ${brand.targetAudience.gender}, ${brand.targetAudience.ageRange}, markets ${brand.targetAudience.markets.join(', ')}`,
    `Categories: ${brand.categories.join(', ')}`,
    `Price range: ${brand.priceRange.min}-${brand.priceRange.max} ${brand.priceRange.currency}`,
    `Values: ${brand.values.join(', ')}`,
    `Never sells: ${brand.exclusions.join(', ')}`
  ].join('\n');
}
