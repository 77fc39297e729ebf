/**
 * 创意分析：总结证据视频的钩子、优惠和起量原因
 */

import { NormalizedProduct } from '../../collection/types/product';
import { LLMClient } from '../ai-engine/interface';
import { RetryOptions, executeWithRetry } from '../ai-engine/error-handler';
import { ResponseParser, clamp } from '../ai-engine/response-parser';
import { CreativeResult } from '../types';
import { HashtagBank, findCommercialTriggers } from '../../collection/hashtags';
import { createAnalysisLogger } from '../../collection/utils/logger';
import { toError } from '../../collection/utils/error-handler';
import { describeProduct } from './product-context';

const SYSTEM_PROMPT = 'You are a short-video performance marketer. '
  + 'You explain why product videos sell and how easily a brand could reproduce them. Answer with JSON only.';

function score10(value: number | null): number {
  return value === null ? 5 : Math.round(clamp(value, 0, 10) * 10) / 10;
}

export class CreativeAnalyzer {
  private client: LLMClient;
  private hashtags: HashtagBank | null;
  private retry: RetryOptions;
  private logger = createAnalysisLogger('creative');

  constructor(client: LLMClient, hashtags: HashtagBank | null = null, retry: RetryOptions = {}) {
    this.client = client;
    this.hashtags = hashtags;
    this.retry = { logger: this.logger, ...retry };
  }

  buildPrompt(product: NormalizedProduct): string {
    const lines = [
      describeProduct(product),
      '',
      'Analyse the videos above. Respond with a JSON object:',
      '{"hooks": string[] (3-7 word opening hooks), "offers": string[], "whyItWorks": string, '
        + '"risks": string[], "reproducibility": number (0-10, 10 = trivial to film), '
        + '"samplingEase": number (0-10, 10 = samples easy to obtain)}'
    ];

    const triggers = this.detectTriggers(product);
    if (triggers.length > 0) {
      lines.splice(1, 0, `Detected promotion wording: ${triggers.join(', ')}`);
    }
    return lines.join('\n');
  }

  /**
   * 分析单个商品，失败时记录日志并返回null
   */
  async analyze(product: NormalizedProduct): Promise<CreativeResult | null> {
    try {
      const response = await executeWithRetry(() => this.client.chatCompletion({
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: this.buildPrompt(product) }
        ]
      }), this.retry);
      const json = ResponseParser.extractJson(response.content);
      const offers = ResponseParser.getStringList(json, 'offers');

      return {
        hooks: ResponseParser.getStringList(json, 'hooks'),
        offers: offers.length > 0 ? offers : this.detectTriggers(product),
        whyItWorks: ResponseParser.getString(json, 'whyItWorks'),
        risks: ResponseParser.getStringList(json, 'risks'),
        reproducibility: score10(ResponseParser.getNumber(json, 'reproducibility')),
        samplingEase: score10(ResponseParser.getNumber(json, 'samplingEase'))
      };
    } catch (error) {
      this.logger.error(`创意分析失败: ${product.product.name}`, toError(error), { productId: product.product.id }, 'analyze');
      return null;
    }
  }

  /**
   * 证据视频文案中出现的促销话术
   */
  private detectTriggers(product: NormalizedProduct): string[] {
    if (!this.hashtags) {
      return [];
    }
    const text = product.evidence.map(video => `${video.hook ?? ''} ${video.script ?? ''}`).join(' ');
    return findCommercialTriggers(this.hashtags, text);
  }
}
