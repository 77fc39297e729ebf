/**
 * 数据迁移类型定义
 */

import { Database } from 'sqlite';

/**
 * 迁移方向
 */
export type MigrationDirection = 'up' | 'down';

/**
 * 迁移脚本接口
 */
export interface MigrationScript {
  /** 迁移版本号 */
  version: number;

  /** 迁移描述 */
  description: string;

  /** 升级操作 */
  up(db: Database): Promise<void>;

  /** 降级操作 */
  down(db: Database): Promise<void>;
}

/**
 * 迁移记录
 */
export interface MigrationRecord {
  version: number;
  description: string;
  appliedAt: Date;
  executionTime: number;
}

/**
 * 迁移统计
 */
export interface MigrationStats {
  totalMigrations: number;
  completedMigrations: number;
  pendingMigrations: number;
  currentVersion: number;
  latestVersion: number;
}

/**
 * 迁移错误
 */
export class MigrationError extends Error {
  constructor(
    public version: number,
    public direction: MigrationDirection,
    message: string,
    public originalError?: Error
  ) {
    super(`Migration ${direction} failed for version ${version}: ${message}`);
    this.name = 'MigrationError';
  }
}
