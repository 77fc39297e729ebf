/**
 * HTTP会话测试
 */

import {
  PageFetcher,
  HttpClient,
  HttpRequestOptions,
  HttpResponse,
  detectAccessBlock
} from '../../src/collection/http/page-fetcher';
import { CollectionError, CollectionErrorType } from '../../src/collection/utils/error-handler';

type Reply = HttpResponse | Error;

class FakeHttpClient implements HttpClient {
  public requests: Array<{ url: string; options?: HttpRequestOptions }> = [];

  constructor(private replies: Reply[]) {}

  async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, options });
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error('no more replies');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

function createFetcher(replies: Reply[], sessionCookie?: string) {
  const client = new FakeHttpClient(replies);
  const sleeps: number[] = [];
  const fetcher = new PageFetcher(
    { maxRetries: 3, retryDelayBase: 100, delayMin: 0, delayMax: 0, sessionCookie, userAgents: ['agent-a', 'agent-b'] },
    client,
    undefined,
    async ms => {
      sleeps.push(ms);
    }
  );
  return { client, sleeps, fetcher };
}

async function captureError(work: Promise<unknown>): Promise<CollectionError> {
  try {
    await work;
  } catch (error) {
    if (error instanceof CollectionError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a CollectionError');
}

describe('HTTP会话测试', () => {
  describe('页面获取', () => {
    test('应该返回页面HTML并带上请求头', async () => {
      const { client, fetcher } = createFetcher([{ status: 200, data: '<html>ok</html>' }], 'session=test-secret');

      await expect(fetcher.fetchPage('https://example.com/a')).resolves.toBe('<html>ok</html>');

      const headers = client.requests[0].options?.headers;
      expect(headers?.['User-Agent']).toBe('agent-a');
      expect(headers?.['Cookie']).toBe('session=test-secret');
      expect(headers?.['Accept-Language']).toBe('en-US,en;q=0.9,ru;q=0.8');
    });

    test('非字符串响应应该序列化为JSON', async () => {
      const { fetcher } = createFetcher([{ status: 200, data: { ok: true } }]);
      await expect(fetcher.fetchPage('https://example.com/json')).resolves.toBe('{"ok":true}');
    });

    test('遇到429应该退避后重试', async () => {
      const { client, sleeps, fetcher } = createFetcher([
        { status: 429, data: '' },
        { status: 200, data: 'done' }
      ]);

      await expect(fetcher.fetchPage('https://example.com/b')).resolves.toBe('done');
      expect(client.requests).toHaveLength(2);
      expect(sleeps).toEqual([100]);
    });

    test('网络错误应该重试', async () => {
      const { client, fetcher } = createFetcher([new Error('socket hang up'), { status: 200, data: 'done' }]);

      await expect(fetcher.fetchPage('https://example.com/c')).resolves.toBe('done');
      expect(client.requests).toHaveLength(2);
    });

    test('404不应该重试', async () => {
      const { client, fetcher } = createFetcher([{ status: 404, data: '' }]);

      const error = await captureError(fetcher.fetchPage('https://example.com/missing'));
      expect(error.errorType).toBe(CollectionErrorType.NETWORK_ERROR);
      expect(error.message).toBe('HTTP 404: https://example.com/missing');
      expect(client.requests).toHaveLength(1);
    });

    test('重试耗尽后应该抛出最后一次错误', async () => {
      const { client, sleeps, fetcher } = createFetcher([
        { status: 503, data: '' },
        { status: 503, data: '' },
        { status: 403, data: '' }
      ]);

      const error = await captureError(fetcher.fetchPage('https://example.com/d'));
      expect(error.errorType).toBe(CollectionErrorType.ACCESS_BLOCKED);
      expect(client.requests).toHaveLength(3);
      expect(sleeps).toEqual([100, 200]);
    });

    test('应该轮换用户代理', () => {
      const { fetcher } = createFetcher([]);
      expect([fetcher.nextUserAgent(), fetcher.nextUserAgent(), fetcher.nextUserAgent()])
        .toEqual(['agent-a', 'agent-b', 'agent-a']);
    });

    test('上下限相同时应该等待固定时长', async () => {
      const { sleeps, fetcher } = createFetcher([]);
      await expect(fetcher.humanDelay(10, 10)).resolves.toBe(10);
      expect(sleeps).toEqual([10]);
    });
  });

  describe('拦截检测', () => {
    test('应该识别登录和验证码页面', () => {
      expect(detectAccessBlock('<html><head><title>Log in | Ads</title></head><body></body></html>')).toBe('log in');
      expect(detectAccessBlock('<form><input type="password" name="p"></form>')).toBe('login');
      expect(detectAccessBlock('<div class="geo-captcha-box"></div>')).toBe('captcha');
      expect(detectAccessBlock('   ')).toBe('empty page');
    });

    test('正文中的登录链接不应该被判定为拦截', () => {
      const html = '<html><head><title>Top products</title></head><body><h1>Results</h1><a href="/login">Login</a></body></html>';
      expect(detectAccessBlock(html)).toBeNull();
    });

    test('被拦截时应该抛出access_blocked错误', async () => {
      const { fetcher } = createFetcher([{ status: 200, data: '<title>Verification required</title>' }]);

      const error = await captureError(fetcher.fetchAccessiblePage('https://example.com/e'));
      expect(error.errorType).toBe(CollectionErrorType.ACCESS_BLOCKED);
      expect(error.message).toBe('访问被拦截 (verification)');
    });

    test('应该按状态码判断可重试性和错误类型', () => {
      expect(PageFetcher.isRetryableStatus(429)).toBe(true);
      expect(PageFetcher.isRetryableStatus(502)).toBe(true);
      expect(PageFetcher.isRetryableStatus(404)).toBe(false);
      expect(PageFetcher.errorTypeForStatus(429)).toBe(CollectionErrorType.RATE_LIMITED);
      expect(PageFetcher.errorTypeForStatus(401)).toBe(CollectionErrorType.ACCESS_BLOCKED);
      expect(PageFetcher.errorTypeForStatus(500)).toBe(CollectionErrorType.NETWORK_ERROR);
    });
  });
});
