/**
 * 基础采集器类
 * 提供初始化、重试与状态统计等通用功能
 */

import { CollectionLogger, createPlatformLogger } from '../utils/logger';
import { CollectionError, CollectionErrorType, CollectionErrorHandler, toError } from '../utils/error-handler';
import { SleepFunction, sleep } from '../http/page-fetcher';

// 基础采集器配置
export interface BaseCollectorConfig {
  /** 平台名称 */
  platform: string;
  /** 采集器名称 */
  name: string;
  /** 最大重试次数 */
  maxRetries: number;
  /** 重试基础延迟（毫秒） */
  retryBaseDelay: number;
}

// 采集选项
export interface CollectionOptions {
  /** 最大采集数量 */
  maxItems?: number;
  /** 关键词（趋势接口使用） */
  keywords?: string[];
}

export interface CollectorStatus {
  isInitialized: boolean;
  lastCollectionTime: Date | null;
  totalCollections: number;
  successfulCollections: number;
  failedCollections: number;
  successRate: number;
  totalItemsCollected: number;
}

export abstract class BaseCollector<T> {
  protected config: BaseCollectorConfig;
  protected logger: CollectionLogger;
  protected errorHandler: CollectionErrorHandler;
  protected isInitialized: boolean = false;
  protected sleepFn: SleepFunction;

  /** 采集器状态 */
  protected status: Omit<CollectorStatus, 'isInitialized' | 'successRate'> = {
    lastCollectionTime: null,
    totalCollections: 0,
    successfulCollections: 0,
    failedCollections: 0,
    totalItemsCollected: 0
  };

  constructor(config: Partial<BaseCollectorConfig> & Pick<BaseCollectorConfig, 'platform' | 'name'>, sleepFn: SleepFunction = sleep) {
    this.config = {
      maxRetries: 3,
      retryBaseDelay: 1000,
      ...config
    };

    this.logger = createPlatformLogger(this.config.platform);
    this.errorHandler = new CollectionErrorHandler(this.logger);
    this.sleepFn = sleepFn;

    this.logger.debug(`采集器创建: ${this.config.name} (平台: ${this.config.platform})`);
  }

  /**
   * 初始化采集器
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    this.logger.info('初始化采集器...');

    try {
      await this.onInitialize();
      this.isInitialized = true;
      this.logger.info('采集器初始化完成');
    } catch (error) {
      this.errorHandler.handleError(toError(error), {
        operation: '初始化',
        platform: this.config.platform
      });
      throw error;
    }
  }

  /**
   * 执行采集，可重试的错误按指数退避重试
   */
  async collect(options: CollectionOptions = {}): Promise<T[]> {
    if (!this.isInitialized) {
      throw new CollectionError(
        '采集器未初始化',
        CollectionErrorType.CONFIGURATION_ERROR,
        this.config.platform,
        'collect'
      );
    }

    const startTime = Date.now();
    this.status.totalCollections++;
    this.logger.info('开始数据采集...');

    let lastError: Error | null = null;
    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      if (attempt > 0) {
        // 重试前等待（指数退避）
        const delay = Math.min(this.config.retryBaseDelay * Math.pow(2, attempt - 1), 30000);
        this.logger.info(`采集失败，正在重试 (${attempt}/${this.config.maxRetries})...`);
        await this.sleepFn(delay);
      }

      try {
        const items = await this.executeCollection(options);

        this.status.lastCollectionTime = new Date();
        this.status.successfulCollections++;
        this.status.totalItemsCollected += items.length;

        const elapsedTime = Date.now() - startTime;
        this.logger.info(`数据采集完成，采集到 ${items.length} 条数据，耗时 ${elapsedTime}ms`);
        return items;
      } catch (error) {
        lastError = toError(error);
        this.errorHandler.handleError(lastError, {
          operation: '采集',
          platform: this.config.platform,
          retryCount: attempt
        });

        if (!this.errorHandler.isRetryable(lastError)) {
          break;
        }
      }
    }

    this.status.failedCollections++;
    this.logger.error('所有采集尝试均失败');
    throw lastError || new CollectionError('采集失败', CollectionErrorType.UNKNOWN_ERROR, this.config.platform, 'collect');
  }

  /**
   * 获取采集器状态
   */
  getStatus(): CollectorStatus {
    return {
      isInitialized: this.isInitialized,
      lastCollectionTime: this.status.lastCollectionTime,
      totalCollections: this.status.totalCollections,
      successfulCollections: this.status.successfulCollections,
      failedCollections: this.status.failedCollections,
      successRate: this.status.totalCollections > 0
        ? (this.status.successfulCollections / this.status.totalCollections) * 100
        : 0,
      totalItemsCollected: this.status.totalItemsCollected
    };
  }

  /**
   * 清理资源
   */
  async cleanup(): Promise<void> {
    this.logger.info('清理采集器资源...');
    await this.onCleanup();
    this.isInitialized = false;
  }

  /**
   * 获取平台名称
   */
  get platform(): string {
    return this.config.platform;
  }

  /**
   * 获取采集器名称
   */
  get name(): string {
    return this.config.name;
  }

  /**
   * 子类初始化逻辑
   */
  protected abstract onInitialize(): Promise<void>;

  /**
   * 执行采集逻辑
   */
  protected abstract executeCollection(options: CollectionOptions): Promise<T[]>;

  /**
   * 子类清理逻辑
   */
  protected async onCleanup(): Promise<void> {
    return undefined;
  }
}
