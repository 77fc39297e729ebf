/**
 * 模型调用的错误处理与重试
 */

import { AIEngineError, AIEngineErrorType } from './interface';
import { CollectionLogger, createAnalysisLogger } from '../../collection/utils/logger';
import { SleepFunction, sleep } from '../../collection/http/page-fetcher';
import { toError } from '../../collection/utils/error-handler';

/**
 * 重试选项
 */
export interface RetryOptions {
  maxRetries?: number;
  /** 基础延迟（毫秒），第n次重试等待 base * 2^(n-1) */
  baseDelay?: number;
  /** 服务端要求等待超过该秒数时不再重试 */
  maxRetryAfter?: number;
  sleepFn?: SleepFunction;
  logger?: CollectionLogger;
}

const DEFAULT_RETRY: Required<Omit<RetryOptions, 'logger'>> = {
  maxRetries: 1,
  baseDelay: 2000,
  maxRetryAfter: 60,
  sleepFn: sleep
};

/**
 * 客户端之外抛出的错误不重试
 */
export function toEngineError(error: unknown): AIEngineError {
  if (error instanceof AIEngineError) {
    return error;
  }
  const cause = toError(error);
  return new AIEngineError(cause.message, AIEngineErrorType.API_ERROR, undefined, false, cause);
}

export function shouldRetry(error: AIEngineError, maxRetryAfter: number = DEFAULT_RETRY.maxRetryAfter): boolean {
  if (!error.retryable || error.type === AIEngineErrorType.AUTHENTICATION_ERROR) {
    return false;
  }
  return error.retryAfter === undefined || error.retryAfter <= maxRetryAfter;
}

/**
 * 重试前的等待时间：优先使用服务端给出的 retry-after
 */
export function retryDelay(error: AIEngineError, attempt: number, baseDelay: number = DEFAULT_RETRY.baseDelay): number {
  if (error.retryAfter !== undefined) {
    return error.retryAfter * 1000;
  }
  return baseDelay * Math.pow(2, attempt - 1);
}

/**
 * 执行带重试的模型调用，最终失败时抛出AIEngineError
 */
export async function executeWithRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const settings = { ...DEFAULT_RETRY, ...options };
  const logger = options.logger ?? createAnalysisLogger('retry');

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const engineError = toEngineError(error);
      if (attempt > settings.maxRetries || !shouldRetry(engineError, settings.maxRetryAfter)) {
        throw engineError;
      }

      const delay = retryDelay(engineError, attempt, settings.baseDelay);
      logger.warn(`模型调用失败，${delay}ms 后重试 (${attempt}/${settings.maxRetries})`, {
        type: engineError.type,
        message: engineError.message,
        cause: engineError.originalError?.message
      }, 'executeWithRetry');
      await settings.sleepFn(delay);
    }
  }
}
