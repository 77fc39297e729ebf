import { Priority, TREND_DIRECTIONS, TrendDirection } from '../../analysis/types';
import { DatabaseConnectionManager } from '../config/connection';
import { AnalysisRecord, AnalysisRow } from '../types';
import { AnalysisRepository as AnalysisRepositoryInterface } from '../types/repository';

function parseList(value: string): string[] {
  const parsed: unknown = JSON.parse(value);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
}

function toPriority(value: string): Priority {
  return value === 'A' || value === 'C' ? value : 'B';
}

function toDirection(value: string): TrendDirection {
  return TREND_DIRECTIONS.find(direction => direction === value) ?? 'insufficient_data';
}

/**
 * 分析结果数据访问仓库
 */
export class AnalysisRepository implements AnalysisRepositoryInterface {
  private connection: DatabaseConnectionManager;

  constructor(connection: DatabaseConnectionManager) {
    this.connection = connection;
  }

  /**
   * 保存分析结果
   */
  public async save(record: AnalysisRecord): Promise<AnalysisRecord> {
    const db = await this.connection.getConnection();

    const result = await db.run(
      `INSERT INTO analyses (
        product_id, analyzed_at, trend_score, priority, direction, fit_score, ssr_score,
        opportunity_score, reasons, risks, recommendation, hooks, offers, why_it_works,
        reproducibility, sampling_ease, model
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      record.productId,
      record.analyzedAt.toISOString(),
      record.trendScore,
      record.priority,
      record.direction,
      record.fitScore,
      record.ssrScore,
      record.opportunityScore,
      JSON.stringify(record.reasons),
      JSON.stringify(record.risks),
      record.recommendation,
      JSON.stringify(record.hooks),
      JSON.stringify(record.offers),
      record.whyItWorks,
      record.reproducibility,
      record.samplingEase,
      record.model
    );

    return { ...record, id: result.lastID };
  }

  /**
   * 商品最近一次分析
   */
  public async latestForProduct(productId: string): Promise<AnalysisRecord | null> {
    const db = await this.connection.getConnection();
    const row = await db.get<AnalysisRow>(
      'SELECT * FROM analyses WHERE product_id = ? ORDER BY analyzed_at DESC, id DESC LIMIT 1',
      productId
    );
    return row ? this.mapToAnalysis(row) : null;
  }

  /**
   * 每个商品最近一次分析
   */
  public async latestAll(limit?: number): Promise<AnalysisRecord[]> {
    const db = await this.connection.getConnection();
    const sql = `
      SELECT a.* FROM analyses a
      WHERE a.id = (
        SELECT b.id FROM analyses b
        WHERE b.product_id = a.product_id
        ORDER BY b.analyzed_at DESC, b.id DESC
        LIMIT 1
      )
      ORDER BY a.opportunity_score DESC, a.trend_score DESC`;
    const rows = limit !== undefined
      ? await db.all<AnalysisRow[]>(`${sql} LIMIT ?`, limit)
      : await db.all<AnalysisRow[]>(sql);
    return rows.map(row => this.mapToAnalysis(row));
  }

  private mapToAnalysis(row: AnalysisRow): AnalysisRecord {
    return {
      id: row.id,
      productId: row.product_id,
      analyzedAt: new Date(row.analyzed_at),
      trendScore: row.trend_score,
      priority: toPriority(row.priority),
      direction: toDirection(row.direction),
      fitScore: row.fit_score,
      ssrScore: row.ssr_score,
      opportunityScore: row.opportunity_score,
      reasons: parseList(row.reasons),
      risks: parseList(row.risks),
      recommendation: row.recommendation,
      hooks: parseList(row.hooks),
      offers: parseList(row.offers),
      whyItWorks: row.why_it_works,
      reproducibility: row.reproducibility,
      samplingEase: row.sampling_ease,
      model: row.model
    };
  }
}
