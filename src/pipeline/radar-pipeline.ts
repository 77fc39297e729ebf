/**
 * 趋势雷达流水线
 * 采集 -> 标准化 -> 去重 -> 入库 -> 历史 -> 趋势检测 -> 趋势分 -> LLM分析 -> 机会排序 -> 报告
 * 每一步的失败都会被记录；单个采集源失败不会中断运行
 */

import { BaseCollector } from '../collection/collectors/base-collector';
import { deduplicate, normalizeAdProduct, normalizeTrendingVideos } from '../collection/normalizer';
import {
  AdProduct,
  MetricsSnapshot,
  NormalizedProduct,
  PlatformType,
  SourceType,
  TrendingVideo
} from '../collection/types/product';
import { createPipelineLogger } from '../collection/utils/logger';
import { toError } from '../collection/utils/error-handler';
import { LLMClient } from '../analysis/ai-engine/interface';
import { BrandFitAnalyzer } from '../analysis/analyzers/brand-fit-analyzer';
import { CreativeAnalyzer } from '../analysis/analyzers/creative-analyzer';
import { Translator } from '../analysis/analyzers/translator';
import { calculateTrendScore, estimateUgcShare, estimateViews72h, TrendScoreBreakdown } from '../analysis/metrics';
import { detectTrend, scoreOpportunity } from '../analysis/trend-detector';
import { SsrRater } from '../analysis/ssr';
import { BrandFitResult, BrandProfile, CreativeResult, TrendAnalysis } from '../analysis/types';
import { HashtagBank } from '../collection/hashtags';
import { RadarDatabase } from '../db';
import { AnalysisRecord } from '../db/types';
import { RadarConfig } from '../system/config';
import { writeReportFiles } from '../report';
import { RadarReport, RankedProduct, ReportFiles, StepError } from '../report/types';

const DAY_MS = 24 * 60 * 60 * 1000;

/** 趋势检测使用的历史窗口（天） */
export const HISTORY_WINDOW_DAYS = 90;

export type PipelineStatus = 'success' | 'partial' | 'failed';

export interface PipelineDependencies {
  config: RadarConfig;
  database: RadarDatabase;
  brand: BrandProfile;
  adsCollector?: BaseCollector<AdProduct> | null;
  vendorCollector?: BaseCollector<TrendingVideo> | null;
  douyinCollector?: BaseCollector<TrendingVideo> | null;
  llmClient?: LLMClient | null;
  ssr?: SsrRater | null;
  hashtags?: HashtagBank | null;
  clock?: () => Date;
}

export interface PipelineRunOptions {
  /** false 时跳过所有LLM步骤 */
  useLlm?: boolean;
  /** 报告中展开详情的商品数 */
  topN?: number;
  /** false 时不写报告文件 */
  writeFiles?: boolean;
}

export interface PipelineCounts {
  adsIntel: number;
  vendor: number;
  douyin: number;
  normalized: number;
  persisted: number;
  analyzed: number;
  ranked: number;
}

export interface PipelineResult {
  status: PipelineStatus;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  counts: PipelineCounts;
  report: RadarReport | null;
  reportFiles: ReportFiles | null;
  errors: StepError[];
}

interface Candidate {
  item: NormalizedProduct;
  history: MetricsSnapshot[];
  trend: TrendAnalysis;
  score: TrendScoreBreakdown;
  creative: CreativeResult | null;
  fit: BrandFitResult | null;
}

export class RadarPipeline {
  private deps: PipelineDependencies;
  private logger = createPipelineLogger();
  private clock: () => Date;

  constructor(deps: PipelineDependencies) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * 执行一次完整运行
   */
  async run(options: PipelineRunOptions = {}): Promise<PipelineResult> {
    const startedAt = this.clock();
    const errors: StepError[] = [];
    const counts: PipelineCounts = { adsIntel: 0, vendor: 0, douyin: 0, normalized: 0, persisted: 0, analyzed: 0, ranked: 0 };
    const finish = (status: PipelineStatus, report: RadarReport | null, reportFiles: ReportFiles | null): PipelineResult => {
      const finishedAt = this.clock();
      const result: PipelineResult = {
        status,
        startedAt,
        finishedAt,
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        counts,
        report,
        reportFiles,
        errors
      };
      this.logger.info(`运行结束: ${status}`, { counts, errors: errors.length, durationMs: result.durationMs }, 'run');
      return result;
    };

    this.logger.info('开始运行趋势雷达', undefined, 'run');

    // 1. 采集
    const { adsCollector, vendorCollector, douyinCollector } = this.deps;
    if (!adsCollector && !vendorCollector && !douyinCollector) {
      errors.push({ step: 'collect', message: '没有配置任何采集源' });
      return finish('failed', null, null);
    }

    const adProducts = adsCollector ? await this.collect(adsCollector, 'collect.ads_intel', errors) : null;
    const videos = vendorCollector ? await this.collect(vendorCollector, 'collect.vendor', errors) : null;
    const douyinVideos = douyinCollector ? await this.collect(douyinCollector, 'collect.douyin', errors) : null;
    counts.adsIntel = adProducts?.length ?? 0;
    counts.vendor = videos?.length ?? 0;
    counts.douyin = douyinVideos?.length ?? 0;

    if (adProducts === null && videos === null && douyinVideos === null) {
      return finish('failed', null, null);
    }

    // 2. 标准化与去重
    const now = startedAt;
    const items = deduplicate([
      ...(adProducts ?? []).map(product => normalizeAdProduct(product, now)),
      ...normalizeTrendingVideos(videos ?? [], now),
      ...normalizeTrendingVideos(douyinVideos ?? [], now, {
        platform: PlatformType.DOUYIN,
        source: SourceType.DOUYIN_SEARCH
      })
    ]);
    counts.normalized = items.length;
    this.logger.info(`标准化后商品 ${items.length} 个`, undefined, 'normalize');

    // 3. 入库
    try {
      counts.persisted = await this.persist(items);
    } catch (error) {
      errors.push({ step: 'persist', message: toError(error).message });
      this.logger.error('写入数据库失败', toError(error), undefined, 'persist');
      return finish('failed', null, null);
    }

    // 4. 历史、趋势与趋势分
    let candidates: Candidate[];
    try {
      candidates = await this.scoreCandidates(items, now);
    } catch (error) {
      errors.push({ step: 'trend', message: toError(error).message });
      return finish('failed', null, null);
    }

    // 5. LLM分析
    const client = options.useLlm === false ? null : this.deps.llmClient ?? null;
    if (client) {
      counts.analyzed = await this.analyzeTop(candidates, client, errors, now);
    }

    // 6. 机会排序并保存分析结果
    const ranked = await this.rank(candidates, now, client, errors);
    counts.ranked = ranked.length;

    // 7. 翻译（可选）与报告
    const language = this.deps.config.report.language;
    if (client && language) {
      await this.translate(ranked.slice(0, this.deps.config.report.analyzeTop), client, language);
    }

    const report: RadarReport = {
      generatedAt: now,
      periodStart: new Date(now.getTime() - this.deps.config.filters.daysBack * DAY_MS),
      periodEnd: now,
      brandName: this.deps.brand.name,
      collected: this.collectedSummary(adProducts, videos, douyinVideos),
      items: ranked,
      topN: options.topN ?? this.deps.config.report.topN,
      errors
    };

    let reportFiles: ReportFiles | null = null;
    if (options.writeFiles !== false) {
      try {
        reportFiles = writeReportFiles(report, this.deps.config.report.outputDir);
        this.logger.info(`报告已生成: ${reportFiles.markdownPath}`, undefined, 'report');
      } catch (error) {
        errors.push({ step: 'report', message: toError(error).message });
        this.logger.error('写入报告失败', toError(error), undefined, 'report');
      }
    }

    return finish(errors.length > 0 ? 'partial' : 'success', report, reportFiles);
  }

  /**
   * 运行单个采集器，失败时记录错误并返回null
   */
  private async collect<T>(collector: BaseCollector<T>, step: string, errors: StepError[]): Promise<T[] | null> {
    try {
      await collector.initialize();
      const items = await collector.collect();
      this.logger.info(`${collector.name} 采集到 ${items.length} 条`, undefined, step);
      return items;
    } catch (error) {
      const cause = toError(error);
      errors.push({ step, message: cause.message });
      this.logger.error(`${collector.name} 采集失败`, cause, undefined, step);
      return null;
    } finally {
      await collector.cleanup();
    }
  }

  private collectedSummary(
    adProducts: AdProduct[] | null,
    videos: TrendingVideo[] | null,
    douyinVideos: TrendingVideo[] | null
  ): Record<string, number> {
    const collected: Record<string, number> = {};
    if (adProducts) {
      collected['ads-intel products'] = adProducts.length;
    }
    if (videos) {
      collected['trending videos'] = videos.length;
    }
    if (douyinVideos) {
      collected['douyin videos'] = douyinVideos.length;
    }
    return collected;
  }

  /**
   * 商品与快照在一个事务中写入
   */
  private async persist(items: NormalizedProduct[]): Promise<number> {
    const { products, metrics, connection } = this.deps.database;
    return connection.withTransaction(async () => {
      for (const item of items) {
        const stored = await products.upsert(item.product);
        item.product = stored;
        await metrics.record(item.snapshot);
      }
      return items.length;
    });
  }

  private async scoreCandidates(items: NormalizedProduct[], now: Date): Promise<Candidate[]> {
    const since = new Date(now.getTime() - HISTORY_WINDOW_DAYS * DAY_MS);
    const allErs = items
      .map(item => item.snapshot.erPercent)
      .filter((er): er is number => er !== null);

    const candidates: Candidate[] = [];
    for (const item of items) {
      const history = await this.deps.database.metrics.findByProduct(item.product.id, since);
      candidates.push({
        item,
        history,
        trend: detectTrend(history),
        score: this.trendScore(item, history, now, allErs, null),
        creative: null,
        fit: null
      });
    }
    return candidates.sort((a, b) => b.score.trendScore - a.score.trendScore);
  }

  private trendScore(
    item: NormalizedProduct,
    history: MetricsSnapshot[],
    now: Date,
    allErs: number[],
    creative: CreativeResult | null
  ): TrendScoreBreakdown {
    const branded = item.evidence.filter(video => video.branded).length;
    return calculateTrendScore({
      platform: item.product.platform,
      views72h: estimateViews72h(history, item.evidence, now),
      totalViews: item.snapshot.views ?? item.snapshot.impressions,
      listingAgeDays: item.listingAgeDays,
      ugcShare: item.evidence.length > 0 ? estimateUgcShare(item.evidence.length, branded) : null,
      erPercent: item.snapshot.erPercent,
      reproducibility: creative?.reproducibility ?? null,
      samplingEase: creative?.samplingEase ?? null
    }, allErs);
  }

  /**
   * 对趋势分最高的商品做创意与品牌匹配分析，返回完成分析的商品数
   */
  private async analyzeTop(candidates: Candidate[], client: LLMClient, errors: StepError[], now: Date): Promise<number> {
    const creativeAnalyzer = new CreativeAnalyzer(client, this.deps.hashtags ?? null);
    const fitAnalyzer = new BrandFitAnalyzer(client, this.deps.ssr ?? null);
    const allErs = candidates
      .map(candidate => candidate.item.snapshot.erPercent)
      .filter((er): er is number => er !== null);
    const top = candidates.slice(0, this.deps.config.report.analyzeTop);

    let analyzed = 0;
    let failed = 0;
    for (const candidate of top) {
      candidate.creative = await creativeAnalyzer.analyze(candidate.item);
      candidate.fit = await fitAnalyzer.analyze(candidate.item, this.deps.brand);

      if (candidate.creative) {
        // 创意分析给出了易复制度，重新计算趋势分
        candidate.score = this.trendScore(candidate.item, candidate.history, now, allErs, candidate.creative);
      }
      if (candidate.creative || candidate.fit) {
        analyzed++;
      }
      if (!candidate.creative || !candidate.fit) {
        failed++;
      }
    }

    if (failed > 0) {
      errors.push({ step: 'analyze', message: `${failed}/${top.length} 个商品的LLM分析未完成` });
    }
    return analyzed;
  }

  private async rank(
    candidates: Candidate[],
    now: Date,
    client: LLMClient | null,
    errors: StepError[]
  ): Promise<RankedProduct[]> {
    const model = client ? client.getClientInfo().model : null;
    const records = candidates.map(candidate => this.toAnalysisRecord(candidate, now, model));

    const order = candidates
      .map((candidate, index) => ({ candidate, record: records[index] }))
      .sort((a, b) => b.record.opportunityScore - a.record.opportunityScore
        || b.record.trendScore - a.record.trendScore);

    try {
      await this.deps.database.connection.withTransaction(async () => {
        for (const { record } of order) {
          const saved = await this.deps.database.analyses.save(record);
          record.id = saved.id;
        }
      });
    } catch (error) {
      errors.push({ step: 'persist.analyses', message: toError(error).message });
      this.logger.error('保存分析结果失败', toError(error), undefined, 'rank');
    }

    return order.map(({ candidate, record }, index) => ({
      rank: index + 1,
      product: { ...candidate.item.product },
      snapshot: candidate.item.snapshot,
      evidence: candidate.item.evidence,
      analysis: record
    }));
  }

  private toAnalysisRecord(candidate: Candidate, now: Date, model: string | null): AnalysisRecord {
    const { creative, fit, trend, score } = candidate;
    const analyzed = creative !== null || fit !== null;
    return {
      productId: candidate.item.product.id,
      analyzedAt: now,
      trendScore: score.trendScore,
      priority: score.priority,
      direction: trend.direction,
      fitScore: fit?.fitScore ?? null,
      ssrScore: fit?.ssrScore ?? null,
      opportunityScore: scoreOpportunity(trend, score.trendScore, fit?.fitScore ?? null),
      reasons: fit?.reasons ?? [],
      risks: [...(fit?.risks ?? []), ...(creative?.risks ?? [])],
      recommendation: fit?.recommendation || null,
      hooks: creative?.hooks ?? [],
      offers: creative?.offers ?? [],
      whyItWorks: creative?.whyItWorks || null,
      reproducibility: creative?.reproducibility ?? null,
      samplingEase: creative?.samplingEase ?? null,
      model: analyzed ? model : null
    };
  }

  /**
   * 翻译报告中展示的商品名、钩子和优惠（不写回数据库）
   */
  private async translate(items: RankedProduct[], client: LLMClient, language: string): Promise<void> {
    const translator = new Translator(client);
    for (const item of items) {
      item.product.name = await translator.translate(item.product.name, 'product_name', language);
      item.analysis = {
        ...item.analysis,
        hooks: await translator.translateAll(item.analysis.hooks, 'hook', language),
        offers: await translator.translateAll(item.analysis.offers, 'offer', language)
      };
    }
  }
}
