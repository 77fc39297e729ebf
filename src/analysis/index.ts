/**
 * 分析模块入口：趋势评分、趋势判断、LLM分析与SSR
 */

export * from './types';
export * from './metrics';
export * from './trend-detector';
export * from './ssr';
export * from './brand-profile';
export * from './ai-engine';
export { BrandFitAnalyzer } from './analyzers/brand-fit-analyzer';
export { CreativeAnalyzer } from './analyzers/creative-analyzer';
export { Translator, TranslationContext } from './analyzers/translator';
export { describeProduct, describeBrand } from './analyzers/product-context';
