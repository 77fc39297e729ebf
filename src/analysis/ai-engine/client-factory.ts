/**
 * LLM客户端工厂
 */

import { LLMClient, AIEngineError } from './interface';
import { OpenAIClient } from './clients/openai-client';
import { ClaudeClient } from './clients/claude-client';
import { LLMSettings } from '../../system/config';

/**
 * 客户端工厂
 */
export class ClientFactory {
  /**
   * 按配置创建客户端；缺少API Key时抛出配置错误
   */
  static create(settings: LLMSettings): LLMClient {
    if (!settings.apiKey) {
      throw AIEngineError.configurationError(`${settings.provider} API key is not configured`);
    }

    const common = {
      apiKey: settings.apiKey,
      model: settings.model,
      baseUrl: settings.baseUrl,
      defaultMaxTokens: settings.maxTokens,
      defaultTemperature: settings.temperature
    };

    switch (settings.provider) {
      case 'openai':
        return new OpenAIClient(common);
      case 'anthropic':
        return new ClaudeClient(common);
    }
  }

  /**
   * 未启用或未配置时返回null，调用方据此跳过LLM步骤
   */
  static createOptional(settings: LLMSettings): LLMClient | null {
    if (!settings.enabled || !settings.apiKey) {
      return null;
    }
    return ClientFactory.create(settings);
  }
}
