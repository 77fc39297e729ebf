/**
 * 模型调用重试测试
 */

import {
  executeWithRetry,
  retryDelay,
  shouldRetry,
  toEngineError
} from '../../src/analysis/ai-engine/error-handler';
import { AIEngineError, AIEngineErrorType } from '../../src/analysis/ai-engine/interface';

function recordingSleep(): { delays: number[]; sleepFn: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleepFn: async (ms: number) => {
      delays.push(ms);
    }
  };
}

describe('模型调用重试测试', () => {
  describe('重试判断', () => {
    test('网络错误和限流错误应该重试', () => {
      expect(shouldRetry(AIEngineError.networkError('socket hang up'))).toBe(true);
      expect(shouldRetry(AIEngineError.rateLimitError('slow down', 30))).toBe(true);
    });

    test('认证错误和解析错误不应该重试', () => {
      expect(shouldRetry(AIEngineError.authenticationError('bad key'))).toBe(false);
      expect(shouldRetry(AIEngineError.parsingError('not json'))).toBe(false);
    });

    test('等待时间超过上限时不应该重试', () => {
      expect(shouldRetry(AIEngineError.rateLimitError('slow down', 120), 60)).toBe(false);
    });
  });

  describe('重试延迟', () => {
    test('应该优先使用服务端给出的等待秒数', () => {
      expect(retryDelay(AIEngineError.rateLimitError('slow down', 7), 1, 2000)).toBe(7000);
    });

    test('应该按指数退避', () => {
      const error = AIEngineError.networkError('reset');
      expect(retryDelay(error, 1, 2000)).toBe(2000);
      expect(retryDelay(error, 3, 2000)).toBe(8000);
    });
  });

  describe('错误转换', () => {
    test('普通错误应该转换为不可重试的API错误并保留原因', () => {
      const cause = new Error('boom');
      const engineError = toEngineError(cause);
      expect(engineError.type).toBe(AIEngineErrorType.API_ERROR);
      expect(engineError.retryable).toBe(false);
      expect(engineError.originalError).toBe(cause);
    });

    test('引擎错误应该原样返回', () => {
      const original = AIEngineError.networkError('reset');
      expect(toEngineError(original)).toBe(original);
    });
  });

  describe('执行', () => {
    test('可重试错误应该重试一次后成功', async () => {
      const { delays, sleepFn } = recordingSleep();
      const operation = jest.fn()
        .mockRejectedValueOnce(AIEngineError.rateLimitError('slow down', 3))
        .mockResolvedValueOnce('ok');

      await expect(executeWithRetry(operation, { sleepFn })).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(2);
      expect(delays).toEqual([3000]);
    });

    test('超过重试次数时应该抛出最后的错误', async () => {
      const { delays, sleepFn } = recordingSleep();
      const operation = jest.fn().mockRejectedValue(AIEngineError.networkError('reset'));

      await expect(executeWithRetry(operation, { sleepFn, maxRetries: 2, baseDelay: 100 }))
        .rejects.toThrow('reset');
      expect(operation).toHaveBeenCalledTimes(3);
      expect(delays).toEqual([100, 200]);
    });

    test('不可重试错误应该立即抛出', async () => {
      const { delays, sleepFn } = recordingSleep();
      const operation = jest.fn().mockRejectedValue(AIEngineError.authenticationError('bad key'));

      await expect(executeWithRetry(operation, { sleepFn })).rejects.toBeInstanceOf(AIEngineError);
      expect(operation).toHaveBeenCalledTimes(1);
      expect(delays).toEqual([]);
    });
  });
});
