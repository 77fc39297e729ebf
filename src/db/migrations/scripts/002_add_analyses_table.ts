/**
 * 迁移: 添加分析结果表
 * 版本: 2
 */

import { Database } from 'sqlite';
import { MigrationScript } from '../../types/migration';

const migration: MigrationScript = {
  version: 2,
  description: '添加分析结果表',

  async up(db: Database): Promise<void> {
    // reasons/risks/hooks/offers 以JSON数组存储
    await db.run(`
      CREATE TABLE IF NOT EXISTS analyses (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        product_id TEXT NOT NULL,
        analyzed_at TEXT NOT NULL,
        trend_score REAL NOT NULL,
        priority TEXT NOT NULL CHECK (priority IN ('A', 'B', 'C')),
        direction TEXT NOT NULL,
        fit_score REAL,
        ssr_score REAL,
        opportunity_score REAL NOT NULL,
        reasons TEXT NOT NULL DEFAULT '[]',
        risks TEXT NOT NULL DEFAULT '[]',
        recommendation TEXT,
        hooks TEXT NOT NULL DEFAULT '[]',
        offers TEXT NOT NULL DEFAULT '[]',
        why_it_works TEXT,
        reproducibility REAL,
        sampling_ease REAL,
        model TEXT,

        FOREIGN KEY (product_id) REFERENCES products(id) ON DELETE CASCADE
      )
    `);

    await db.run('CREATE INDEX IF NOT EXISTS idx_analyses_product_time ON analyses(product_id, analyzed_at)');
  },

  async down(db: Database): Promise<void> {
    await db.run('DROP TABLE IF EXISTS analyses');
  }
};

export default migration;
