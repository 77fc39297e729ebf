import { DatabaseConnectionManager } from '../config/connection';
import {
  MigrationScript,
  MigrationRecord,
  MigrationDirection,
  MigrationStats,
  MigrationError
} from '../types/migration';
import { migrationScripts } from './scripts';
import { toError } from '../../collection/utils/error-handler';
import { createStorageLogger } from '../../collection/utils/logger';

interface MigrationRow {
  version: number;
  description: string;
  applied_at: string;
  execution_time: number;
}

export interface MigrationResult {
  applied: number;
  rolledBack: number;
  errors: MigrationError[];
}

/**
 * 迁移管理器
 */
export class MigrationManager {
  private connection: DatabaseConnectionManager;
  private migrations: MigrationScript[];
  private tableName: string;
  private logger = createStorageLogger('migration');

  constructor(
    connection: DatabaseConnectionManager,
    migrations: MigrationScript[] = migrationScripts,
    tableName = 'schema_migrations'
  ) {
    this.connection = connection;
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
    this.tableName = tableName;
  }

  /**
   * 初始化迁移系统
   */
  public async initialize(): Promise<void> {
    const db = await this.connection.getConnection();
    await db.run(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        version INTEGER PRIMARY KEY,
        description TEXT NOT NULL,
        applied_at TEXT NOT NULL,
        execution_time INTEGER NOT NULL DEFAULT 0
      )
    `);
  }

  /**
   * 获取已应用的迁移记录
   */
  public async getMigrationRecords(): Promise<MigrationRecord[]> {
    await this.initialize();
    const db = await this.connection.getConnection();
    const rows = await db.all<MigrationRow[]>(`SELECT * FROM ${this.tableName} ORDER BY version`);

    return rows.map(row => ({
      version: row.version,
      description: row.description,
      appliedAt: new Date(row.applied_at),
      executionTime: row.execution_time
    }));
  }

  /**
   * 获取迁移统计
   */
  public async getStats(): Promise<MigrationStats> {
    const records = await this.getMigrationRecords();
    const applied = new Set(records.map(record => record.version));

    return {
      totalMigrations: this.migrations.length,
      completedMigrations: records.length,
      pendingMigrations: this.migrations.filter(migration => !applied.has(migration.version)).length,
      currentVersion: records.length > 0 ? Math.max(...records.map(record => record.version)) : 0,
      latestVersion: this.migrations.length > 0 ? this.migrations[this.migrations.length - 1].version : 0
    };
  }

  /**
   * 执行所有待处理迁移（或升级到指定版本），遇到失败即停止
   */
  public async migrate(targetVersion?: number): Promise<MigrationResult> {
    const records = await this.getMigrationRecords();
    const applied = new Set(records.map(record => record.version));
    const target = targetVersion ?? Number.MAX_SAFE_INTEGER;
    const result: MigrationResult = { applied: 0, rolledBack: 0, errors: [] };

    for (const migration of this.migrations) {
      if (migration.version > target || applied.has(migration.version)) {
        continue;
      }
      try {
        await this.executeMigration(migration, 'up');
        result.applied++;
      } catch (error) {
        const cause = toError(error);
        result.errors.push(new MigrationError(migration.version, 'up', cause.message, cause));
        break;
      }
    }

    if (result.applied > 0) {
      this.logger.info(`已应用 ${result.applied} 个迁移`);
    }
    return result;
  }

  /**
   * 回滚到指定版本（不含），默认回滚最近一个迁移
   */
  public async rollback(targetVersion?: number): Promise<MigrationResult> {
    const records = await this.getMigrationRecords();
    const result: MigrationResult = { applied: 0, rolledBack: 0, errors: [] };
    if (records.length === 0) {
      return result;
    }

    const current = Math.max(...records.map(record => record.version));
    const target = targetVersion ?? current - 1;
    const applied = new Set(records.map(record => record.version));
    const toRollback = this.migrations
      .filter(migration => migration.version > target && applied.has(migration.version))
      .reverse();

    for (const migration of toRollback) {
      try {
        await this.executeMigration(migration, 'down');
        result.rolledBack++;
      } catch (error) {
        const cause = toError(error);
        result.errors.push(new MigrationError(migration.version, 'down', cause.message, cause));
        break;
      }
    }
    return result;
  }

  /**
   * 在事务中执行单个迁移并更新记录
   */
  private async executeMigration(migration: MigrationScript, direction: MigrationDirection): Promise<void> {
    const startTime = Date.now();

    await this.connection.withTransaction(async db => {
      if (direction === 'up') {
        await migration.up(db);
        await db.run(
          `INSERT INTO ${this.tableName} (version, description, applied_at, execution_time) VALUES (?, ?, ?, ?)`,
          migration.version,
          migration.description,
          new Date().toISOString(),
          Date.now() - startTime
        );
      } else {
        await migration.down(db);
        await db.run(`DELETE FROM ${this.tableName} WHERE version = ?`, migration.version);
      }
    });

    this.logger.debug(`迁移 ${direction} 完成: v${migration.version} - ${migration.description} (${Date.now() - startTime}ms)`);
  }
}
