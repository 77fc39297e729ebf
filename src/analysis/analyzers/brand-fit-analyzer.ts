/**
 * 品牌匹配分析
 * 由模型给出0-100的匹配分；配置了SSR时再让模型以采购者身份自由回答，换算出第二个估计
 */

import { NormalizedProduct } from '../../collection/types/product';
import { LLMClient } from '../ai-engine/interface';
import { RetryOptions, executeWithRetry } from '../ai-engine/error-handler';
import { ResponseParser, clamp } from '../ai-engine/response-parser';
import { SsrRater, toPercent } from '../ssr';
import { BrandFitResult, BrandProfile } from '../types';
import { createAnalysisLogger } from '../../collection/utils/logger';
import { toError } from '../../collection/utils/error-handler';
import { describeBrand, describeProduct } from './product-context';

const SYSTEM_PROMPT = 'You are a product sourcing analyst for a consumer brand. '
  + 'You judge whether trending TikTok Shop products fit the brand and answer with JSON only.';

export class BrandFitAnalyzer {
  private client: LLMClient;
  private ssr: SsrRater | null;
  private retry: RetryOptions;
  private logger = createAnalysisLogger('brand-fit');

  constructor(client: LLMClient, ssr: SsrRater | null = null, retry: RetryOptions = {}) {
    this.client = client;
    this.ssr = ssr;
    this.retry = { logger: this.logger, ...retry };
  }

  buildPrompt(product: NormalizedProduct, brand: BrandProfile): string {
    return [
      describeBrand(brand),
      '',
      describeProduct(product),
      '',
      'Rate how well this product fits the brand on a 0-100 scale.',
      'Respond with a JSON object:',
      '{"fitScore": number, "reasons": string[], "risks": string[], "recommendation": string}'
    ].join('\n');
  }

  /**
   * 分析单个商品，失败时记录日志并返回null
   */
  async analyze(product: NormalizedProduct, brand: BrandProfile): Promise<BrandFitResult | null> {
    try {
      const response = await executeWithRetry(() => this.client.chatCompletion({
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: this.buildPrompt(product, brand) }
        ]
      }), this.retry);
      const json = ResponseParser.extractJson(response.content);
      const score = ResponseParser.getNumber(json, 'fitScore');
      if (score === null) {
        throw new Error('fitScore 缺失');
      }

      return {
        fitScore: Math.round(clamp(score, 0, 100)),
        reasons: ResponseParser.getStringList(json, 'reasons'),
        risks: ResponseParser.getStringList(json, 'risks'),
        recommendation: ResponseParser.getString(json, 'recommendation'),
        ssrScore: await this.rateWithSsr(product, brand)
      };
    } catch (error) {
      this.logger.error(`品牌匹配分析失败: ${product.product.name}`, toError(error), { productId: product.product.id }, 'analyze');
      return null;
    }
  }

  /**
   * SSR估计，失败时只记录警告
   */
  private async rateWithSsr(product: NormalizedProduct, brand: BrandProfile): Promise<number | null> {
    if (!this.ssr) {
      return null;
    }

    try {
      const response = await executeWithRetry(() => this.client.chatCompletion({
        messages: [
          { role: 'system', content: `You are the head buyer of ${brand.name}. Answer in two or three plain sentences.` },
          {
            role: 'user',
            content: `${describeBrand(brand)}\n\n${describeProduct(product)}\n\nWould you add this product to the ${brand.name} assortment? Explain briefly.`
          }
        ]
      }), this.retry);
      const rating = await this.ssr.rate(response.content);
      return toPercent(rating.expected);
    } catch (error) {
      this.logger.warn(`SSR评分失败: ${toError(error).message}`, { productId: product.product.id }, 'rateWithSsr');
      return null;
    }
  }
}
