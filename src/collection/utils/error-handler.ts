/**
 * 趋势雷达错误处理工具
 * 提供采集、存储与流水线共用的错误类型
 */

import { CollectionLogger, createPlatformLogger } from './logger';

export enum CollectionErrorType {
  /** 网络错误（超时、连接失败、5xx） */
  NETWORK_ERROR = 'network_error',

  /** 访问被拦截（登录页、验证码、403） */
  ACCESS_BLOCKED = 'access_blocked',

  /** 请求过于频繁（429） */
  RATE_LIMITED = 'rate_limited',

  /** 数据解析错误 */
  DATA_PARSING_ERROR = 'data_parsing_error',

  /** 配置错误 */
  CONFIGURATION_ERROR = 'configuration_error',

  /** 存储错误 */
  STORAGE_ERROR = 'storage_error',

  /** 未知错误 */
  UNKNOWN_ERROR = 'unknown_error',

  /** 致命错误 */
  FATAL_ERROR = 'fatal_error'
}

/** 可以重试的错误类型 */
const RETRYABLE_TYPES: ReadonlySet<CollectionErrorType> = new Set([
  CollectionErrorType.NETWORK_ERROR,
  CollectionErrorType.RATE_LIMITED,
  CollectionErrorType.ACCESS_BLOCKED
]);

export interface CollectionErrorContext {
  /** 错误类型 */
  errorType: CollectionErrorType;

  /** 平台名称 */
  platform?: string;

  /** 采集操作 */
  operation?: string;

  /** 错误发生时间 */
  timestamp: Date;

  /** 重试次数 */
  retryCount?: number;

  /** 错误详情 */
  details?: Record<string, unknown>;
}

export class CollectionError extends Error {
  public readonly context: CollectionErrorContext;

  constructor(
    message: string,
    errorType: CollectionErrorType,
    platform?: string,
    operation?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CollectionError';
    this.context = {
      errorType,
      platform,
      operation,
      timestamp: new Date(),
      details
    };
  }

  get errorType(): CollectionErrorType {
    return this.context.errorType;
  }

  /**
   * 是否值得重试
   */
  isRetryable(): boolean {
    return RETRYABLE_TYPES.has(this.context.errorType);
  }

  /**
   * 转换为可读字符串
   */
  toString(): string {
    return `[${this.context.errorType}] ${this.message} (Platform: ${this.context.platform || 'unknown'}, Operation: ${this.context.operation || 'unknown'})`;
  }
}

/**
 * 把任意抛出值转换为Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export class CollectionErrorHandler {
  private logger: CollectionLogger;

  constructor(logger?: CollectionLogger) {
    this.logger = logger || createPlatformLogger('error-handler');
  }

  /**
   * 处理错误，返回合并后的上下文
   */
  handleError(error: Error, context?: Partial<CollectionErrorContext>): CollectionErrorContext {
    const errorContext: CollectionErrorContext = {
      errorType: CollectionErrorType.UNKNOWN_ERROR,
      timestamp: new Date(),
      ...context
    };

    // 如果是CollectionError，合并上下文
    if (error instanceof CollectionError) {
      errorContext.errorType = error.context.errorType;
      errorContext.platform = error.context.platform || errorContext.platform;
      errorContext.operation = error.context.operation || errorContext.operation;
      errorContext.details = {
        ...error.context.details,
        ...errorContext.details
      };
    }

    this.logError(error, errorContext);
    return errorContext;
  }

  /**
   * 判断错误是否可以重试
   */
  isRetryable(error: Error): boolean {
    if (error instanceof CollectionError) {
      return error.isRetryable();
    }
    // 未分类的错误按可重试处理
    return true;
  }

  /**
   * 根据错误类型记录日志
   */
  private logError(error: Error, context: CollectionErrorContext): void {
    const logData = {
      errorType: context.errorType,
      platform: context.platform,
      operation: context.operation,
      retryCount: context.retryCount,
      details: context.details
    };

    switch (context.errorType) {
      case CollectionErrorType.NETWORK_ERROR:
      case CollectionErrorType.RATE_LIMITED:
        this.logger.warn(`采集 ${context.errorType}: ${error.message}`, logData, context.operation);
        break;

      case CollectionErrorType.ACCESS_BLOCKED:
        this.logger.error(`访问被拦截: ${error.message}`, error, logData, context.operation);
        break;

      case CollectionErrorType.CONFIGURATION_ERROR:
        this.logger.error(`配置错误: ${error.message}`, error, logData, context.operation);
        break;

      case CollectionErrorType.FATAL_ERROR:
        this.logger.fatal(`致命错误: ${error.message}`, error, logData, context.operation);
        break;

      default:
        this.logger.error(`错误: ${error.message}`, error, logData, context.operation);
    }
  }
}
