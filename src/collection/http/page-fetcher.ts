/**
 * HTTP会话
 * 负责请求头、用户代理轮换、人类化延迟、重试与访问拦截检测
 */

import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { CollectionLogger, createPlatformLogger } from '../utils/logger';
import { CollectionError, CollectionErrorType, toError } from '../utils/error-handler';

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  params?: Record<string, string | number>;
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

/**
 * 最小化的HTTP客户端接口，便于在测试中替换
 */
export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

/**
 * 基于axios的HTTP客户端，任何状态码都作为响应返回，由调用方判断
 */
export class AxiosHttpClient implements HttpClient {
  private instance: AxiosInstance;

  constructor(timeout: number = 30000, instance?: AxiosInstance) {
    this.instance = instance || axios.create({
      timeout,
      validateStatus: () => true,
      maxRedirects: 5
    });
  }

  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const response = await this.instance.get<unknown>(url, {
      headers: options.headers,
      params: options.params
    });
    return { status: response.status, data: response.data };
  }
}

export const DEFAULT_USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 Edg/120.0.0.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
];

/** 登录页、验证码等拦截页面的特征词 */
export const BLOCK_INDICATORS: readonly string[] = [
  'login', 'log in', 'sign in', 'captcha', 'verification',
  '登录', '验证', 'blocked', 'access denied'
];

export interface PageFetcherOptions {
  /** 请求超时（毫秒） */
  timeout: number;

  /** 最大尝试次数 */
  maxRetries: number;

  /** 重试基础延迟（毫秒），第n次重试等待 base * 2^n */
  retryDelayBase: number;

  /** 请求前随机延迟下限（毫秒） */
  delayMin: number;

  /** 请求前随机延迟上限（毫秒） */
  delayMax: number;

  /** 登录后的会话Cookie */
  sessionCookie?: string;

  /** 用户代理池 */
  userAgents: readonly string[];

  /** Accept-Language 请求头 */
  acceptLanguage: string;
}

export type SleepFunction = (ms: number) => Promise<void>;

export const sleep: SleepFunction = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * 在页面标题、标题元素和密码表单中查找拦截特征，返回命中的特征词
 */
export function detectAccessBlock(html: string): string | null {
  if (!html || html.trim() === '') {
    return 'empty page';
  }

  const $ = cheerio.load(html);
  if ($('input[type="password"]').length > 0) {
    return 'login';
  }
  if ($('[class*="captcha"], [id*="captcha"], iframe[src*="captcha"]').length > 0) {
    return 'captcha';
  }

  const headline = [$('title').text(), $('h1').first().text(), $('h2').first().text()]
    .join(' ')
    .toLowerCase();
  return BLOCK_INDICATORS.find(indicator => headline.includes(indicator)) || null;
}

export class PageFetcher {
  private options: PageFetcherOptions;
  private client: HttpClient;
  private logger: CollectionLogger;
  private sleepFn: SleepFunction;
  private userAgentIndex = 0;

  constructor(
    options: Partial<PageFetcherOptions> = {},
    client?: HttpClient,
    logger?: CollectionLogger,
    sleepFn: SleepFunction = sleep
  ) {
    this.options = {
      timeout: 30000,
      maxRetries: 3,
      retryDelayBase: 2000,
      delayMin: 2000,
      delayMax: 5000,
      userAgents: DEFAULT_USER_AGENTS,
      acceptLanguage: 'en-US,en;q=0.9,ru;q=0.8',
      ...options
    };
    this.client = client || new AxiosHttpClient(this.options.timeout);
    this.logger = logger || createPlatformLogger('http');
    this.sleepFn = sleepFn;
  }

  /**
   * 轮换用户代理
   */
  nextUserAgent(): string {
    const agents = this.options.userAgents;
    if (agents.length === 0) {
      return DEFAULT_USER_AGENTS[0];
    }
    const agent = agents[this.userAgentIndex % agents.length];
    this.userAgentIndex++;
    return agent;
  }

  /**
   * 构建请求头
   */
  buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.nextUserAgent(),
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
      'Accept-Language': this.options.acceptLanguage
    };
    if (this.options.sessionCookie) {
      headers['Cookie'] = this.options.sessionCookie;
    }
    return headers;
  }

  /**
   * 模拟人类操作的随机延迟，返回实际等待的毫秒数
   */
  async humanDelay(min: number = this.options.delayMin, max: number = this.options.delayMax): Promise<number> {
    if (max <= 0) {
      return 0;
    }
    const low = Math.min(min, max);
    const delay = Math.round(low + Math.random() * (max - low));
    await this.sleepFn(delay);
    return delay;
  }

  /**
   * 获取页面HTML，对429、403、5xx和网络错误按指数退避重试
   */
  async fetchPage(url: string): Promise<string> {
    const { maxRetries, retryDelayBase } = this.options;
    const attempts = Math.max(1, maxRetries);
    let lastError: CollectionError | null = null;

    for (let attempt = 0; attempt < attempts; attempt++) {
      await this.humanDelay();
      this.logger.debug(`请求页面 (尝试 ${attempt + 1}/${attempts})`, { url }, 'fetchPage');

      let status: number;
      let data: unknown;
      try {
        const response = await this.client.get(url, { headers: this.buildHeaders() });
        status = response.status;
        data = response.data;
      } catch (error) {
        const cause = toError(error);
        lastError = new CollectionError(
          `请求失败: ${cause.message}`,
          CollectionErrorType.NETWORK_ERROR,
          'http',
          'fetchPage',
          { url, attempt: attempt + 1 }
        );
        this.logger.warn(`网络错误: ${cause.message}`, { url, attempt: attempt + 1 }, 'fetchPage');
        await this.backoff(attempt, attempts, retryDelayBase);
        continue;
      }

      if (status >= 200 && status < 300) {
        return typeof data === 'string' ? data : JSON.stringify(data);
      }

      const errorType = PageFetcher.errorTypeForStatus(status);
      lastError = new CollectionError(
        `HTTP ${status}: ${url}`,
        errorType,
        'http',
        'fetchPage',
        { url, status, attempt: attempt + 1 }
      );

      if (!PageFetcher.isRetryableStatus(status)) {
        throw lastError;
      }

      this.logger.warn(`收到状态码 ${status}，准备重试`, { url, attempt: attempt + 1 }, 'fetchPage');
      await this.backoff(attempt, attempts, retryDelayBase);
    }

    throw lastError || new CollectionError(
      `请求失败: ${url}`,
      CollectionErrorType.NETWORK_ERROR,
      'http',
      'fetchPage',
      { url }
    );
  }

  /**
   * 获取页面并检查是否被拦截
   */
  async fetchAccessiblePage(url: string): Promise<string> {
    const html = await this.fetchPage(url);
    this.checkAccess(html, url);
    return html;
  }

  /**
   * 检测登录页、验证码等拦截页面，命中时抛出access_blocked错误
   */
  checkAccess(html: string, url?: string): void {
    const indicator = detectAccessBlock(html);
    if (indicator) {
      this.logger.warn(`检测到拦截特征: ${indicator}`, { url }, 'checkAccess');
      throw new CollectionError(
        `访问被拦截 (${indicator})`,
        CollectionErrorType.ACCESS_BLOCKED,
        'http',
        'checkAccess',
        { url, indicator }
      );
    }
  }

  static isRetryableStatus(status: number): boolean {
    return status === 429 || status === 403 || status >= 500;
  }

  static errorTypeForStatus(status: number): CollectionErrorType {
    if (status === 429) {
      return CollectionErrorType.RATE_LIMITED;
    }
    if (status === 401 || status === 403) {
      return CollectionErrorType.ACCESS_BLOCKED;
    }
    return CollectionErrorType.NETWORK_ERROR;
  }

  private async backoff(attempt: number, attempts: number, base: number): Promise<void> {
    if (attempt >= attempts - 1) {
      return;
    }
    await this.sleepFn(base * Math.pow(2, attempt));
  }
}
