import { MetricsSnapshot } from '../../collection/types/product';
import { DatabaseConnectionManager } from '../config/connection';
import { MetricsHistoryRow } from '../types';
import { MetricsHistoryRepository as MetricsHistoryRepositoryInterface } from '../types/repository';

/**
 * 指标历史数据访问仓库
 */
export class MetricsHistoryRepository implements MetricsHistoryRepositoryInterface {
  private connection: DatabaseConnectionManager;

  constructor(connection: DatabaseConnectionManager) {
    this.connection = connection;
  }

  /**
   * 记录一次快照
   */
  public async record(snapshot: MetricsSnapshot): Promise<MetricsSnapshot> {
    const db = await this.connection.getConnection();

    await db.run(
      `INSERT INTO metrics_history (
        product_id, captured_at, views, likes, comments, shares, impressions, video_count, er_percent
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(product_id, captured_at) DO UPDATE SET
        views = excluded.views,
        likes = excluded.likes,
        comments = excluded.comments,
        shares = excluded.shares,
        impressions = excluded.impressions,
        video_count = excluded.video_count,
        er_percent = excluded.er_percent`,
      snapshot.productId,
      snapshot.capturedAt.toISOString(),
      snapshot.views,
      snapshot.likes,
      snapshot.comments,
      snapshot.shares,
      snapshot.impressions,
      snapshot.videoCount,
      snapshot.erPercent
    );

    return snapshot;
  }

  /**
   * 查询商品的指标历史
   */
  public async findByProduct(productId: string, since?: Date): Promise<MetricsSnapshot[]> {
    const db = await this.connection.getConnection();
    const rows = since
      ? await db.all<MetricsHistoryRow[]>(
        'SELECT * FROM metrics_history WHERE product_id = ? AND captured_at >= ? ORDER BY captured_at ASC',
        productId,
        since.toISOString()
      )
      : await db.all<MetricsHistoryRow[]>(
        'SELECT * FROM metrics_history WHERE product_id = ? ORDER BY captured_at ASC',
        productId
      );
    return rows.map(row => this.mapToSnapshot(row));
  }

  /**
   * 最近一次快照
   */
  public async latest(productId: string): Promise<MetricsSnapshot | null> {
    const db = await this.connection.getConnection();
    const row = await db.get<MetricsHistoryRow>(
      'SELECT * FROM metrics_history WHERE product_id = ? ORDER BY captured_at DESC LIMIT 1',
      productId
    );
    return row ? this.mapToSnapshot(row) : null;
  }

  /**
   * 清理旧快照
   */
  public async deleteOlderThan(date: Date): Promise<number> {
    const db = await this.connection.getConnection();
    const result = await db.run('DELETE FROM metrics_history WHERE captured_at < ?', date.toISOString());
    return result.changes ?? 0;
  }

  private mapToSnapshot(row: MetricsHistoryRow): MetricsSnapshot {
    return {
      productId: row.product_id,
      capturedAt: new Date(row.captured_at),
      views: row.views,
      likes: row.likes,
      comments: row.comments,
      shares: row.shares,
      impressions: row.impressions,
      videoCount: row.video_count,
      erPercent: row.er_percent
    };
  }
}
