/**
 * Markdown报告渲染
 */

import { TREND_DIRECTIONS, TrendDirection, Priority } from '../analysis/types';
import { formatImpressions, formatLocalDate } from '../collection/validator';
import { RadarReport, RankedProduct } from './types';

const DIRECTION_LABELS: Record<TrendDirection, string> = {
  emerging: 'Emerging',
  rising: 'Rising',
  stable: 'Stable',
  declining: 'Declining',
  insufficient_data: 'Insufficient data'
};

const PRIORITIES: Priority[] = ['A', 'B', 'C'];

export function formatDate(date: Date): string {
  return formatLocalDate(date);
}

/**
 * 表格单元格：竖线转义，换行压成空格
 */
export function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\s*[\r\n]+\s*/g, ' ').trim();
}

function score(value: number | null): string {
  return value === null ? '-' : value.toFixed(1);
}

function reach(item: RankedProduct): string {
  const value = item.snapshot?.views ?? item.snapshot?.impressions ?? null;
  return value === null ? '-' : formatImpressions(value);
}

export class MarkdownReportRenderer {
  render(report: RadarReport): string {
    const sections = [
      this.renderHeader(report),
      this.renderSummary(report),
      this.renderTable(report),
      this.renderDetails(report)
    ];
    if (report.errors.length > 0) {
      sections.push(this.renderErrors(report));
    }
    return `${sections.filter(section => section !== '').join('\n\n')}\n`;
  }

  private renderHeader(report: RadarReport): string {
    const sources = Object.entries(report.collected)
      .map(([source, count]) => `${source}: ${count}`)
      .join(', ');
    return [
      `# Product Trend Radar ${formatDate(report.generatedAt)}`,
      '',
      `- Period: ${formatDate(report.periodStart)} to ${formatDate(report.periodEnd)}`,
      `- Brand: ${report.brandName}`,
      `- Collected: ${sources || 'none'}`,
      `- Ranked products: ${report.items.length}`
    ].join('\n');
  }

  private renderSummary(report: RadarReport): string {
    const lines = ['## Summary', '', '| Priority | Products |', '| --- | --- |'];
    for (const priority of PRIORITIES) {
      lines.push(`| ${priority} | ${report.items.filter(item => item.analysis.priority === priority).length} |`);
    }
    lines.push('', '| Trend | Products |', '| --- | --- |');
    for (const direction of TREND_DIRECTIONS) {
      const count = report.items.filter(item => item.analysis.direction === direction).length;
      if (count > 0) {
        lines.push(`| ${DIRECTION_LABELS[direction]} | ${count} |`);
      }
    }
    return lines.join('\n');
  }

  private renderTable(report: RadarReport): string {
    if (report.items.length === 0) {
      return '## Ranking\n\nNo products passed the filters in this period.';
    }

    const lines = [
      '## Ranking',
      '',
      '| # | Product | Platform | Category | Reach | Trend | Fit | Opportunity | Priority | Direction |',
      '| --- | --- | --- | --- | --- | --- | --- | --- | --- | --- |'
    ];
    for (const item of report.items) {
      const { product, analysis } = item;
      const name = product.productUrl ? `[${escapeCell(product.name)}](${product.productUrl})` : escapeCell(product.name);
      lines.push(`| ${[
        String(item.rank),
        name,
        product.platform,
        escapeCell(product.category),
        reach(item),
        score(analysis.trendScore),
        score(analysis.fitScore),
        score(analysis.opportunityScore),
        analysis.priority,
        DIRECTION_LABELS[analysis.direction]
      ].join(' | ')} |`);
    }
    return lines.join('\n');
  }

  private renderDetails(report: RadarReport): string {
    const top = report.items.slice(0, report.topN);
    if (top.length === 0) {
      return '';
    }
    return ['## Top products', ...top.map(item => this.renderProduct(item))].join('\n\n');
  }

  private renderProduct(item: RankedProduct): string {
    const { product, analysis, snapshot } = item;
    const lines = [`### ${item.rank}. ${product.name}`, ''];

    lines.push(`- Platform: ${product.platform} · Category: ${product.category} · Price: ${product.price ?? '-'}`);
    lines.push(`- Trend score ${score(analysis.trendScore)} (priority ${analysis.priority}), direction ${DIRECTION_LABELS[analysis.direction]}`);
    if (analysis.fitScore !== null) {
      const ssr = analysis.ssrScore !== null ? `, SSR ${score(analysis.ssrScore)}` : '';
      lines.push(`- Brand fit ${score(analysis.fitScore)}${ssr}`);
    }
    if (snapshot) {
      lines.push(`- Videos: ${snapshot.videoCount}, ER: ${snapshot.erPercent !== null ? `${snapshot.erPercent}%` : '-'}`);
    }
    if (analysis.recommendation) {
      lines.push(`- Recommendation: ${analysis.recommendation}`);
    }
    if (analysis.reasons.length > 0) {
      lines.push(`- Why it fits: ${analysis.reasons.join('; ')}`);
    }
    if (analysis.risks.length > 0) {
      lines.push(`- Risks: ${analysis.risks.join('; ')}`);
    }
    if (analysis.hooks.length > 0) {
      lines.push(`- Hooks: ${analysis.hooks.map(hook => `"${hook}"`).join(', ')}`);
    }
    if (analysis.offers.length > 0) {
      lines.push(`- Offers: ${analysis.offers.join('; ')}`);
    }
    if (analysis.whyItWorks) {
      lines.push(`- Why it works: ${analysis.whyItWorks}`);
    }

    if (item.evidence.length > 0) {
      lines.push('', 'Evidence videos:');
      for (const video of item.evidence.slice(0, 3)) {
        const views = video.views !== null ? formatImpressions(video.views) : '-';
        const extra = [video.audience, video.country, video.firstSeen].filter(Boolean).join(', ');
        lines.push(`- ${video.url} (${views}${extra ? `, ${extra}` : ''})`);
      }
    }
    return lines.join('\n');
  }

  private renderErrors(report: RadarReport): string {
    return ['## Errors', '', ...report.errors.map(error => `- **${error.step}**: ${error.message}`)].join('\n');
  }
}
