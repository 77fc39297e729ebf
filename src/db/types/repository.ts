/**
 * Repository接口定义
 */

import { MetricsSnapshot, PlatformType, ProductRecord } from '../../collection/types/product';
import { AnalysisRecord } from './index';

/**
 * 商品Repository接口
 */
export interface ProductRepository {
  /**
   * 插入或更新商品，保留首次发现时间
   */
  upsert(product: ProductRecord): Promise<ProductRecord>;

  findById(id: string): Promise<ProductRecord | null>;

  findAll(limit?: number): Promise<ProductRecord[]>;

  findByPlatform(platform: PlatformType): Promise<ProductRecord[]>;

  delete(id: string): Promise<boolean>;

  count(): Promise<number>;
}

/**
 * 指标历史Repository接口
 */
export interface MetricsHistoryRepository {
  /**
   * 记录快照；同一商品同一时刻重复写入时覆盖
   */
  record(snapshot: MetricsSnapshot): Promise<MetricsSnapshot>;

  /**
   * 按时间升序返回商品的快照
   */
  findByProduct(productId: string, since?: Date): Promise<MetricsSnapshot[]>;

  latest(productId: string): Promise<MetricsSnapshot | null>;

  /**
   * 删除早于指定时间的快照，返回删除条数
   */
  deleteOlderThan(date: Date): Promise<number>;
}

/**
 * 分析结果Repository接口
 */
export interface AnalysisRepository {
  save(record: AnalysisRecord): Promise<AnalysisRecord>;

  latestForProduct(productId: string): Promise<AnalysisRecord | null>;

  /**
   * 每个商品最近一次分析，按机会分降序
   */
  latestAll(limit?: number): Promise<AnalysisRecord[]>;
}
