/**
 * Claude API客户端
 */

import Anthropic from '@anthropic-ai/sdk';
import {
  LLMClient,
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
  ClientInfo,
  AIEngineError,
  systemPromptOf
} from '../interface';
import { toError } from '../../../collection/utils/error-handler';

/**
 * Claude客户端配置
 */
export interface ClaudeClientConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeout: number;
  maxRetries: number;
  defaultMaxTokens: number;
  defaultTemperature: number;
}

export const DEFAULT_CLAUDE_CONFIG: Omit<ClaudeClientConfig, 'apiKey'> = {
  model: 'claude-3-5-haiku-20241022',
  timeout: 60000,
  maxRetries: 2,
  defaultMaxTokens: 2000,
  defaultTemperature: 0.3
};

/**
 * Claude客户端
 */
export class ClaudeClient implements LLMClient {
  private client: Anthropic;
  private config: ClaudeClientConfig;

  constructor(config: Partial<ClaudeClientConfig> & Pick<ClaudeClientConfig, 'apiKey'>, client?: Anthropic) {
    this.config = { ...DEFAULT_CLAUDE_CONFIG, ...config };

    if (!this.config.apiKey) {
      throw AIEngineError.configurationError('Claude API key is required');
    }

    this.client = client ?? new Anthropic({
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
      const params: Anthropic.MessageCreateParamsNonStreaming = {
        model: request.model ?? this.config.model,
        messages: this.convertMessages(request.messages),
        max_tokens: request.maxTokens ?? this.config.defaultMaxTokens,
        temperature: request.temperature ?? this.config.defaultTemperature
      };

      // 系统提示单独传递
      const system = systemPromptOf(request.messages);
      if (system) {
        params.system = system;
      }

      const response = await this.client.messages.create(params);
      const content = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('');

      return {
        id: response.id,
        model: response.model,
        content,
        finishReason: response.stop_reason ?? 'stop',
        usage: {
          promptTokens: response.usage.input_tokens,
          completionTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens
        }
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * 转换消息格式（system消息单独处理）
   */
  private convertMessages(messages: ChatMessage[]): Anthropic.MessageParam[] {
    return messages
      .filter(message => message.role !== 'system')
      .map((message): Anthropic.MessageParam => ({
        role: message.role === 'assistant' ? 'assistant' : 'user',
        content: message.content
      }));
  }

  /**
   * 处理错误
   */
  private handleError(error: unknown): AIEngineError {
    if (error instanceof AIEngineError) {
      return error;
    }
    if (error instanceof Anthropic.APIError) {
      return AIEngineError.fromStatus(
        'Claude',
        error.status,
        error.message,
        undefined,
        error.headers?.['retry-after'],
        error
      );
    }
    const cause = toError(error);
    return AIEngineError.networkError(`Claude request failed: ${cause.message}`, cause);
  }

  /**
   * 获取客户端信息
   */
  getClientInfo(): ClientInfo {
    return {
      provider: 'anthropic',
      model: this.config.model,
      features: ['chat_completion', 'system_prompt', 'temperature_control', 'max_tokens_limit']
    };
  }
}
