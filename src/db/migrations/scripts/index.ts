import { MigrationScript } from '../../types/migration';
import initialSchema from './001_initial_schema';
import analysesTable from './002_add_analyses_table';

/**
 * 已注册的迁移脚本，新增脚本时追加到这里
 */
export const migrationScripts: MigrationScript[] = [initialSchema, analysesTable];
