/**
 * 存储模块入口
 */

import { DatabaseConnectionManager } from './config/connection';
import { MigrationManager, MigrationResult } from './migrations/migration-manager';
import { ProductRepository } from './repositories/product.repository';
import { MetricsHistoryRepository } from './repositories/metrics-history.repository';
import { AnalysisRepository } from './repositories/analysis.repository';
import { CollectionError, CollectionErrorType } from '../collection/utils/error-handler';

export interface RadarDatabase {
  connection: DatabaseConnectionManager;
  migrations: MigrationManager;
  products: ProductRepository;
  metrics: MetricsHistoryRepository;
  analyses: AnalysisRepository;
}

export function createDatabase(databasePath: string): RadarDatabase {
  const connection = new DatabaseConnectionManager(databasePath);
  return {
    connection,
    migrations: new MigrationManager(connection),
    products: new ProductRepository(connection),
    metrics: new MetricsHistoryRepository(connection),
    analyses: new AnalysisRepository(connection)
  };
}

/**
 * 打开数据库并应用所有待处理迁移
 */
export async function initializeDatabase(databasePath: string): Promise<RadarDatabase & { migrationResult: MigrationResult }> {
  const database = createDatabase(databasePath);
  const migrationResult = await database.migrations.migrate();
  if (migrationResult.errors.length > 0) {
    await database.connection.close();
    throw new CollectionError(
      migrationResult.errors[0].message,
      CollectionErrorType.STORAGE_ERROR,
      undefined,
      'initializeDatabase',
      { databasePath }
    );
  }
  return { ...database, migrationResult };
}

export { DatabaseConnectionManager, MigrationManager, ProductRepository, MetricsHistoryRepository, AnalysisRepository };
export * from './types';
