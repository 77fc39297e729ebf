/**
 * 迁移: 创建商品与指标历史表
 * 版本: 1
 */

import { Database } from 'sqlite';
import { MigrationScript } from '../../types/migration';

const migration: MigrationScript = {
  version: 1,
  description: '创建商品与指标历史表',

  /**
   * 升级操作
   */
  async up(db: Database): Promise<void> {
    // products表: 标准化后的商品
    await db.run(`
      CREATE TABLE IF NOT EXISTS products (
        id TEXT PRIMARY KEY,
        platform TEXT NOT NULL,
        source TEXT NOT NULL,
        name TEXT NOT NULL,
        category TEXT NOT NULL DEFAULT 'N/A',
        product_url TEXT,
        seller_url TEXT,
        sku_id TEXT,
        price TEXT,
        first_detected_at TEXT NOT NULL,
        last_seen_at TEXT NOT NULL
      )
    `);

    // metrics_history表: 每次运行的指标快照
    await db.run(`
      CREATE TABLE IF NOT EXISTS metrics_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        product_id TEXT NOT NULL,
        captured_at TEXT NOT NULL,
        views INTEGER,
        likes INTEGER,
        comments INTEGER,
        shares INTEGER,
        impressions INTEGER,
        video_count INTEGER NOT NULL DEFAULT 0,
        er_percent REAL,

        FOREIGN KEY (product_id) REFERENCES products(id) ON DELETE CASCADE,
        UNIQUE(product_id, captured_at)
      )
    `);

    await db.run('CREATE INDEX IF NOT EXISTS idx_products_platform ON products(platform)');
    await db.run('CREATE INDEX IF NOT EXISTS idx_products_last_seen ON products(last_seen_at)');
    await db.run('CREATE INDEX IF NOT EXISTS idx_metrics_product_time ON metrics_history(product_id, captured_at)');
  },

  /**
   * 降级操作
   */
  async down(db: Database): Promise<void> {
    await db.run('DROP TABLE IF EXISTS metrics_history');
    await db.run('DROP TABLE IF EXISTS products');
  }
};

export default migration;
