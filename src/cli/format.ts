/**
 * 命令行输出格式化
 */

import { Table } from 'console-table-printer';
import { MetricsSnapshot } from '../collection/types/product';
import { formatDate } from '../report/markdown-renderer';
import { RadarReport } from '../report/types';
import { PipelineResult } from '../pipeline/radar-pipeline';

export function formatCount(value: number | null): string {
  return value === null ? 'N/A' : value.toLocaleString('en-US');
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);

  if (minutes > 0) {
    return `${minutes}m${seconds % 60}s`;
  }
  return `${seconds}s`;
}

export interface HistoryRow {
  date: string;
  views: string;
  impressions: string;
  likes: string;
  comments: string;
  shares: string;
  videos: string;
  er: string;
}

export function toHistoryRows(snapshots: MetricsSnapshot[]): HistoryRow[] {
  return snapshots.map(snapshot => ({
    date: formatDate(snapshot.capturedAt),
    views: formatCount(snapshot.views),
    impressions: formatCount(snapshot.impressions),
    likes: formatCount(snapshot.likes),
    comments: formatCount(snapshot.comments),
    shares: formatCount(snapshot.shares),
    videos: String(snapshot.videoCount),
    er: snapshot.erPercent === null ? 'N/A' : `${snapshot.erPercent.toFixed(2)}%`
  }));
}

export function renderHistoryTable(snapshots: MetricsSnapshot[]): string {
  const table = new Table({
    columns: [
      { name: 'date', title: '日期', alignment: 'left' },
      { name: 'views', title: '播放', alignment: 'right' },
      { name: 'impressions', title: '曝光', alignment: 'right' },
      { name: 'likes', title: '点赞', alignment: 'right' },
      { name: 'comments', title: '评论', alignment: 'right' },
      { name: 'shares', title: '分享', alignment: 'right' },
      { name: 'videos', title: '视频数', alignment: 'right' },
      { name: 'er', title: 'ER', alignment: 'right' }
    ]
  });

  table.addRows(toHistoryRows(snapshots));
  return table.render();
}

function priorityColor(priority: string): 'green' | 'yellow' | 'white' {
  switch (priority) {
    case 'A': return 'green';
    case 'B': return 'yellow';
    default: return 'white';
  }
}

export function renderRankingTable(report: RadarReport): string {
  const table = new Table({
    columns: [
      { name: 'rank', title: '#', alignment: 'right' },
      { name: 'name', title: '商品', alignment: 'left', maxLen: 40 },
      { name: 'platform', title: '平台', alignment: 'left' },
      { name: 'priority', title: '优先级', alignment: 'left' },
      { name: 'trend', title: '趋势分', alignment: 'right' },
      { name: 'direction', title: '方向', alignment: 'left' },
      { name: 'fit', title: '契合度', alignment: 'right' },
      { name: 'opportunity', title: '机会分', alignment: 'right' }
    ]
  });

  for (const item of report.items.slice(0, report.topN)) {
    table.addRow({
      rank: item.rank,
      name: item.product.name,
      platform: item.product.platform,
      priority: item.analysis.priority,
      trend: item.analysis.trendScore.toFixed(1),
      direction: item.analysis.direction,
      fit: item.analysis.fitScore === null ? 'N/A' : String(item.analysis.fitScore),
      opportunity: item.analysis.opportunityScore.toFixed(1)
    }, { color: priorityColor(item.analysis.priority) });
  }

  return table.render();
}

export function summarizeRun(result: PipelineResult): string[] {
  const { counts } = result;
  return [
    `状态: ${result.status}`,
    `耗时: ${formatDuration(result.durationMs)}`,
    `采集: ads_intel ${counts.adsIntel}, vendor ${counts.vendor}, douyin ${counts.douyin}`,
    `标准化: ${counts.normalized}, 入库: ${counts.persisted}, 分析: ${counts.analyzed}, 排名: ${counts.ranked}`
  ];
}
