import fs from 'fs';
import path from 'path';
import { open, Database } from 'sqlite';
import { Database as SqliteDriver, OPEN_CREATE, OPEN_READWRITE } from 'sqlite3';
import { CollectionError, CollectionErrorType, toError } from '../../collection/utils/error-handler';
import { createStorageLogger } from '../../collection/utils/logger';

/**
 * 数据库连接状态
 */
export interface ConnectionStatus {
  isConnected: boolean;
  lastError: string | null;
  databasePath: string;
  databaseSize: number;
  lastActivity: Date | null;
}

export const IN_MEMORY = ':memory:';

/**
 * 数据库连接管理器
 * 批处理任务是单线程顺序执行的，整个进程共享一个连接（内存库也依赖这一点）
 */
export class DatabaseConnectionManager {
  private databasePath: string;
  private db: Database | null = null;
  private opening: Promise<Database> | null = null;
  private logger = createStorageLogger('connection');
  private status: ConnectionStatus;

  constructor(databasePath: string) {
    this.databasePath = databasePath;
    this.status = {
      isConnected: false,
      lastError: null,
      databasePath,
      databaseSize: 0,
      lastActivity: null
    };
  }

  /**
   * 获取数据库连接
   */
  public async getConnection(): Promise<Database> {
    if (this.db) {
      this.status.lastActivity = new Date();
      return this.db;
    }
    if (!this.opening) {
      this.opening = this.openConnection().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async openConnection(): Promise<Database> {
    try {
      if (this.databasePath !== IN_MEMORY) {
        fs.mkdirSync(path.dirname(path.resolve(this.databasePath)), { recursive: true });
      }

      const db = await open({
        filename: this.databasePath,
        driver: SqliteDriver,
        mode: OPEN_READWRITE | OPEN_CREATE
      });

      // 配置数据库参数
      await db.run('PRAGMA journal_mode = WAL');
      await db.run('PRAGMA synchronous = NORMAL');
      await db.run('PRAGMA foreign_keys = ON');
      await db.run('PRAGMA busy_timeout = 5000');

      this.db = db;
      this.updateStatus({ isConnected: true, lastError: null, lastActivity: new Date() });
      this.logger.debug(`数据库已连接: ${this.databasePath}`);
      return db;
    } catch (error) {
      const cause = toError(error);
      this.updateStatus({ isConnected: false, lastError: cause.message });
      throw new CollectionError(
        `无法打开数据库: ${cause.message}`,
        CollectionErrorType.STORAGE_ERROR,
        undefined,
        'getConnection',
        { databasePath: this.databasePath }
      );
    }
  }

  /**
   * 执行事务
   */
  public async withTransaction<T>(operation: (db: Database) => Promise<T>): Promise<T> {
    const db = await this.getConnection();

    await db.run('BEGIN TRANSACTION');
    try {
      const result = await operation(db);
      await db.run('COMMIT');
      return result;
    } catch (error) {
      await db.run('ROLLBACK');
      throw error;
    }
  }

  /**
   * 关闭连接
   */
  public async close(): Promise<void> {
    if (!this.db) {
      return;
    }
    const db = this.db;
    this.db = null;
    await db.close();
    this.updateStatus({ isConnected: false });
  }

  /**
   * 获取连接状态
   */
  public getStatus(): ConnectionStatus {
    return { ...this.status };
  }

  /**
   * 检查数据库连接是否健康
   */
  public async healthCheck(): Promise<boolean> {
    try {
      const db = await this.getConnection();
      const result = await db.get<{ health_check: number }>('SELECT 1 as health_check');
      return result?.health_check === 1;
    } catch (error) {
      this.updateStatus({ isConnected: false, lastError: toError(error).message });
      return false;
    }
  }

  private updateStatus(updates: Partial<ConnectionStatus>): void {
    this.status = { ...this.status, ...updates };

    if (this.databasePath !== IN_MEMORY && fs.existsSync(this.databasePath)) {
      this.status.databaseSize = fs.statSync(this.databasePath).size;
    }
  }
}
