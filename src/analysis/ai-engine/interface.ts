/**
 * 语言模型引擎接口定义
 */

/**
 * LLM客户端接口
 */
export interface LLMClient {
  /**
   * 发送聊天完成请求
   */
  chatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;

  /**
   * 获取客户端信息
   */
  getClientInfo(): ClientInfo;
}

/**
 * 聊天完成请求
 */
export interface ChatCompletionRequest {
  messages: ChatMessage[];
  /** 未指定时使用客户端默认模型 */
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * 聊天消息
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * 聊天完成响应
 */
export interface ChatCompletionResponse {
  id: string;
  model: string;
  content: string;
  finishReason: string;
  usage: TokenUsage;
}

/**
 * Token使用情况
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * 客户端信息
 */
export interface ClientInfo {
  provider: string;
  model: string;
  features: string[];
}

/**
 * 错误类型
 */
export enum AIEngineErrorType {
  API_ERROR = 'api_error',
  AUTHENTICATION_ERROR = 'authentication_error',
  RATE_LIMIT_ERROR = 'rate_limit_error',
  NETWORK_ERROR = 'network_error',
  PARSING_ERROR = 'parsing_error',
  CONFIGURATION_ERROR = 'configuration_error'
}

/**
 * AI引擎错误
 */
export class AIEngineError extends Error {
  constructor(
    message: string,
    public type: AIEngineErrorType,
    public code?: string,
    public retryable: boolean = false,
    public originalError?: Error,
    public retryAfter?: number
  ) {
    super(message);
    this.name = 'AIEngineError';
  }

  /**
   * 创建API错误
   */
  static apiError(message: string, code?: string, originalError?: Error): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.API_ERROR, code, true, originalError);
  }

  /**
   * 创建认证错误
   */
  static authenticationError(message: string, code?: string): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.AUTHENTICATION_ERROR, code, false);
  }

  /**
   * 创建速率限制错误
   */
  static rateLimitError(message: string, retryAfter?: number): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.RATE_LIMIT_ERROR, undefined, true, undefined, retryAfter);
  }

  /**
   * 创建网络错误
   */
  static networkError(message: string, originalError?: Error): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.NETWORK_ERROR, undefined, true, originalError);
  }

  /**
   * 创建解析错误
   */
  static parsingError(message: string, originalError?: Error): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.PARSING_ERROR, undefined, false, originalError);
  }

  /**
   * 创建配置错误
   */
  static configurationError(message: string): AIEngineError {
    return new AIEngineError(message, AIEngineErrorType.CONFIGURATION_ERROR, undefined, false);
  }

  /**
   * 按HTTP状态把供应商错误映射为引擎错误
   */
  static fromStatus(
    provider: string,
    status: number | undefined,
    message: string,
    code?: string,
    retryAfter?: string | null,
    originalError?: Error
  ): AIEngineError {
    switch (status) {
      case 401:
      case 403:
        return AIEngineError.authenticationError(`${provider} API authentication failed`, code);
      case 429: {
        const seconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
        return AIEngineError.rateLimitError(
          `${provider} API rate limit exceeded`,
          Number.isNaN(seconds) ? undefined : seconds
        );
      }
      case undefined:
        return AIEngineError.networkError(`${provider} network error: ${message}`, originalError);
      default:
        return AIEngineError.apiError(`${provider} API error (${status}): ${message}`, code, originalError);
    }
  }
}

/**
 * 首个system消息的内容
 */
export function systemPromptOf(messages: ChatMessage[]): string | undefined {
  return messages.find(message => message.role === 'system')?.content;
}
