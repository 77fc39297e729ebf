/**
 * OpenAI API客户端
 */

import OpenAI from 'openai';
import {
  LLMClient,
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
  ClientInfo,
  AIEngineError
} from '../interface';
import { toError } from '../../../collection/utils/error-handler';

/**
 * OpenAI客户端配置
 */
export interface OpenAIClientConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeout: number;
  maxRetries: number;
  defaultMaxTokens: number;
  defaultTemperature: number;
}

export const DEFAULT_OPENAI_CONFIG: Omit<OpenAIClientConfig, 'apiKey'> = {
  model: 'gpt-4o-mini',
  timeout: 60000,
  maxRetries: 2,
  defaultMaxTokens: 2000,
  defaultTemperature: 0.3
};

/**
 * OpenAI客户端
 */
export class OpenAIClient implements LLMClient {
  private client: OpenAI;
  private config: OpenAIClientConfig;

  constructor(config: Partial<OpenAIClientConfig> & Pick<OpenAIClientConfig, 'apiKey'>, client?: OpenAI) {
    this.config = { ...DEFAULT_OPENAI_CONFIG, ...config };

    if (!this.config.apiKey) {
      throw AIEngineError.configurationError('OpenAI API key is required');
    }

    this.client = client ?? new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
      maxRetries: this.config.maxRetries
    });
  }

  /**
   * 发送聊天完成请求
   */
  async chatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    try {
      const response = await this.client.chat.completions.create({
        model: request.model ?? this.config.model,
        messages: request.messages.map(message => this.convertMessage(message)),
        max_tokens: request.maxTokens ?? this.config.defaultMaxTokens,
        temperature: request.temperature ?? this.config.defaultTemperature
      });

      const choice = response.choices[0];
      return {
        id: response.id,
        model: response.model,
        content: choice?.message.content ?? '',
        finishReason: choice?.finish_reason ?? 'stop',
        usage: {
          promptTokens: response.usage?.prompt_tokens ?? 0,
          completionTokens: response.usage?.completion_tokens ?? 0,
          totalTokens: response.usage?.total_tokens ?? 0
        }
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * 转换消息格式
   */
  private convertMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      default:
        return { role: 'user', content: message.content };
    }
  }

  /**
   * 处理错误
   */
  private handleError(error: unknown): AIEngineError {
    if (error instanceof AIEngineError) {
      return error;
    }
    if (error instanceof OpenAI.APIError) {
      return AIEngineError.fromStatus(
        'OpenAI',
        error.status,
        error.message,
        error.code ?? undefined,
        error.headers?.['retry-after'],
        error
      );
    }
    const cause = toError(error);
    return AIEngineError.networkError(`OpenAI request failed: ${cause.message}`, cause);
  }

  /**
   * 获取客户端信息
   */
  getClientInfo(): ClientInfo {
    return {
      provider: 'openai',
      model: this.config.model,
      features: ['chat_completion', 'system_prompt', 'temperature_control', 'max_tokens_limit']
    };
  }
}
