import { PlatformType, ProductRecord, SourceType } from '../../collection/types/product';
import { DatabaseConnectionManager } from '../config/connection';
import { ProductRow } from '../types';
import { ProductRepository as ProductRepositoryInterface } from '../types/repository';

function toPlatform(value: string): PlatformType {
  const platform = Object.values(PlatformType).find(candidate => candidate === value);
  if (!platform) {
    throw new Error(`products 表中存在未知的平台: ${value}`);
  }
  return platform;
}

function toSource(value: string): SourceType {
  const source = Object.values(SourceType).find(candidate => candidate === value);
  if (!source) {
    throw new Error(`products 表中存在未知的来源: ${value}`);
  }
  return source;
}

/**
 * 商品数据访问仓库
 */
export class ProductRepository implements ProductRepositoryInterface {
  private connection: DatabaseConnectionManager;

  constructor(connection: DatabaseConnectionManager) {
    this.connection = connection;
  }

  /**
   * 插入或更新商品
   * 已存在时保留 first_detected_at，空字段不覆盖已有值
   */
  public async upsert(product: ProductRecord): Promise<ProductRecord> {
    const db = await this.connection.getConnection();

    await db.run(
      `INSERT INTO products (
        id, platform, source, name, category, product_url, seller_url, sku_id, price,
        first_detected_at, last_seen_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        platform = excluded.platform,
        source = excluded.source,
        name = excluded.name,
        category = CASE WHEN excluded.category = 'N/A' THEN products.category ELSE excluded.category END,
        product_url = COALESCE(excluded.product_url, products.product_url),
        seller_url = COALESCE(excluded.seller_url, products.seller_url),
        sku_id = COALESCE(excluded.sku_id, products.sku_id),
        price = COALESCE(excluded.price, products.price),
        last_seen_at = excluded.last_seen_at`,
      product.id,
      product.platform,
      product.source,
      product.name,
      product.category,
      product.productUrl,
      product.sellerUrl,
      product.skuId,
      product.price,
      product.firstDetectedAt.toISOString(),
      product.lastSeenAt.toISOString()
    );

    const stored = await this.findById(product.id);
    return stored ?? product;
  }

  /**
   * 根据ID查找商品
   */
  public async findById(id: string): Promise<ProductRecord | null> {
    const db = await this.connection.getConnection();
    const row = await db.get<ProductRow>('SELECT * FROM products WHERE id = ?', id);
    return row ? this.mapToProduct(row) : null;
  }

  /**
   * 查找所有商品（最近出现的在前）
   */
  public async findAll(limit?: number): Promise<ProductRecord[]> {
    const db = await this.connection.getConnection();
    const rows = limit !== undefined
      ? await db.all<ProductRow[]>('SELECT * FROM products ORDER BY last_seen_at DESC, id LIMIT ?', limit)
      : await db.all<ProductRow[]>('SELECT * FROM products ORDER BY last_seen_at DESC, id');
    return rows.map(row => this.mapToProduct(row));
  }

  /**
   * 按平台查找商品
   */
  public async findByPlatform(platform: PlatformType): Promise<ProductRecord[]> {
    const db = await this.connection.getConnection();
    const rows = await db.all<ProductRow[]>(
      'SELECT * FROM products WHERE platform = ? ORDER BY last_seen_at DESC, id',
      platform
    );
    return rows.map(row => this.mapToProduct(row));
  }

  /**
   * 删除商品（级联删除指标历史）
   */
  public async delete(id: string): Promise<boolean> {
    const db = await this.connection.getConnection();
    const result = await db.run('DELETE FROM products WHERE id = ?', id);
    return (result.changes ?? 0) > 0;
  }

  /**
   * 商品总数
   */
  public async count(): Promise<number> {
    const db = await this.connection.getConnection();
    const row = await db.get<{ count: number }>('SELECT COUNT(*) as count FROM products');
    return row?.count ?? 0;
  }

  /**
   * 映射数据库行到ProductRecord
   */
  private mapToProduct(row: ProductRow): ProductRecord {
    return {
      id: row.id,
      platform: toPlatform(row.platform),
      source: toSource(row.source),
      name: row.name,
      category: row.category,
      productUrl: row.product_url,
      sellerUrl: row.seller_url,
      skuId: row.sku_id,
      price: row.price,
      firstDetectedAt: new Date(row.first_detected_at),
      lastSeenAt: new Date(row.last_seen_at)
    };
  }
}
