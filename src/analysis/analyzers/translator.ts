/**
 * 文本翻译
 * 没有可用客户端或调用失败时原样返回
 */

import { LLMClient } from '../ai-engine/interface';
import { createAnalysisLogger } from '../../collection/utils/logger';
import { toError } from '../../collection/utils/error-handler';

export type TranslationContext = 'product_name' | 'hook' | 'offer' | 'description';

const CONTEXT_HINTS: Record<TranslationContext, string> = {
  product_name: 'This is a beauty product name. Translate it naturally, the way a local shop would list it.',
  hook: 'This is a 3-7 word video ad hook. Adapt it for the target audience and keep its emotional tone.',
  offer: 'This is a sales offer. Make it clear for a local shopper.',
  description: 'This is a short marketing explanation.'
};

export class Translator {
  private client: LLMClient | null;
  private logger = createAnalysisLogger('translator');

  constructor(client: LLMClient | null) {
    this.client = client;
  }

  buildPrompt(text: string, context: TranslationContext | undefined, targetLanguage: string): string {
    const parts = [`Translate the following text into ${targetLanguage}: ${text}`];
    if (context) {
      parts.push(CONTEXT_HINTS[context]);
    }
    parts.push('Return ONLY the translation, without explanations.');
    return parts.join('\n\n');
  }

  async translate(text: string, context: TranslationContext | undefined, targetLanguage: string): Promise<string> {
    if (!this.client || !text.trim()) {
      return text;
    }

    try {
      const response = await this.client.chatCompletion({
        messages: [
          { role: 'system', content: 'You are a professional translator specialising in cosmetics and beauty products.' },
          { role: 'user', content: this.buildPrompt(text, context, targetLanguage) }
        ],
        maxTokens: 200,
        temperature: 0.3
      });
      const translated = response.content.trim();
      return translated || text;
    } catch (error) {
      this.logger.error('翻译失败，返回原文', toError(error), { context }, 'translate');
      return text;
    }
  }

  async translateAll(texts: string[], context: TranslationContext | undefined, targetLanguage: string): Promise<string[]> {
    const results: string[] = [];
    for (const text of texts) {
      results.push(await this.translate(text, context, targetLanguage));
    }
    return results;
  }
}
