/**
 * CSV导出（RFC 4180）
 */

import fs from 'fs';
import path from 'path';
import { RankedProduct } from './types';

export const CSV_COLUMNS = [
  'rank',
  'product_id',
  'name',
  'platform',
  'category',
  'price',
  'views',
  'impressions',
  'er_percent',
  'video_count',
  'trend_score',
  'fit_score',
  'ssr_score',
  'opportunity_score',
  'priority',
  'direction',
  'hooks',
  'recommendation',
  'product_url',
  'top_video_url'
] as const;

type CsvValue = string | number | null;

/**
 * 含逗号、引号或换行的字段加引号，引号加倍
 */
export function escapeCsvField(value: CsvValue): string {
  if (value === null) {
    return '';
  }
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function toRow(item: RankedProduct): CsvValue[] {
  const { product, snapshot, analysis } = item;
  return [
    item.rank,
    product.id,
    product.name,
    product.platform,
    product.category,
    product.price,
    snapshot?.views ?? null,
    snapshot?.impressions ?? null,
    snapshot?.erPercent ?? null,
    snapshot?.videoCount ?? null,
    analysis.trendScore,
    analysis.fitScore,
    analysis.ssrScore,
    analysis.opportunityScore,
    analysis.priority,
    analysis.direction,
    analysis.hooks.join('; '),
    analysis.recommendation,
    product.productUrl,
    item.evidence[0]?.url ?? null
  ];
}

export class CsvExporter {
  toCsv(rows: RankedProduct[]): string {
    const lines = [CSV_COLUMNS.join(',')];
    for (const row of rows) {
      lines.push(toRow(row).map(escapeCsvField).join(','));
    }
    return `${lines.join('\r\n')}\r\n`;
  }

  writeCsv(rows: RankedProduct[], filePath: string): string {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, this.toCsv(rows), 'utf-8');
    return filePath;
  }
}
