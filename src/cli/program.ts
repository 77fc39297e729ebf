/**
 * 趋势雷达命令定义
 * 配置、数据库、流水线和通知都从运行时取得，命令本身不直接接触进程
 */

import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ConfigManager, NotificationSettings, RadarConfig } from '../system/config';
import { NotificationManager, NotificationResult } from '../system/notification';
import { Scheduler, createRadarTask, RADAR_TASK_ID } from '../system/scheduler';
import { defaultLogger } from '../collection/utils/logger';
import { toError } from '../collection/utils/error-handler';
import { initializeDatabase, RadarDatabase } from '../db';
import { createPipeline } from '../pipeline/factory';
import { PipelineResult, PipelineRunOptions } from '../pipeline/radar-pipeline';
import { buildStoredReport } from '../pipeline/stored-report';
import { loadBrandProfile } from '../analysis/brand-profile';
import { writeReportFiles } from '../report';
import { renderHistoryTable, renderRankingTable, summarizeRun } from './format';

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface RunnablePipeline {
  run(options?: PipelineRunOptions): Promise<PipelineResult>;
}

export interface CliRuntime {
  loadConfig(configPath?: string): ConfigManager;
  openDatabase(databasePath: string): Promise<RadarDatabase>;
  createPipeline(config: RadarConfig, database: RadarDatabase): RunnablePipeline;
  createNotifications(settings: NotificationSettings): NotificationManager;
  output: CliOutput;
  setExitCode(code: number): void;
}

type GlobalOptions = {
  config?: string;
};

interface RunOptions {
  llm: boolean;
  top?: number;
  notify: boolean;
}

interface ReportOptions {
  top?: number;
  days: number;
  limit?: number;
}

export const defaultRuntime: CliRuntime = {
  loadConfig: configPath => {
    const manager = new ConfigManager({ configPath });
    const config = manager.getConfig();
    defaultLogger.configure({
      minLevel: config.logLevel,
      fileOutput: true,
      logDir: config.logDir
    });
    return manager;
  },
  openDatabase: databasePath => initializeDatabase(databasePath),
  createPipeline,
  createNotifications: settings => NotificationManager.fromConfig(settings),
  output: {
    log: line => console.log(line),
    error: line => console.error(line)
  },
  setExitCode: code => {
    process.exitCode = code;
  }
};

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('必须是正整数');
  }
  return parsed;
}

function describeErrors(result: PipelineResult): string[] {
  return result.errors.map(error => `${error.step}: ${error.message}`);
}

/**
 * 构建命令行程序。解析错误以 CommanderError 抛出，由调用方决定退出码
 */
export function createProgram(overrides: Partial<CliRuntime> = {}): Command {
  const runtime: CliRuntime = { ...defaultRuntime, ...overrides };
  const out = runtime.output;
  const program = new Command();

  program
    .name('radar')
    .description('商品趋势雷达：采集、趋势判断、品牌契合度评估与排名报告')
    .version('0.1.0')
    .option('-c, --config <path>', '配置文件路径')
    .exitOverride()
    .configureOutput({
      writeOut: text => out.log(text.trimEnd()),
      writeErr: text => out.error(text.trimEnd())
    });

  function loadConfig(): { manager: ConfigManager; config: RadarConfig } {
    const { config: configPath } = program.opts<GlobalOptions>();
    const manager = runtime.loadConfig(configPath);
    return { manager, config: manager.getConfig() };
  }

  async function withDatabase<T>(config: RadarConfig, work: (database: RadarDatabase) => Promise<T>): Promise<T> {
    const database = await runtime.openDatabase(config.database.path);
    try {
      return await work(database);
    } finally {
      await database.connection.close();
    }
  }

  function warnIfUnsent(sent: NotificationResult[]): void {
    if (!sent.some(item => item.success)) {
      out.log(chalk.yellow('⚠ 通知未发送'));
    }
  }

  // 运行一次完整流水线
  program
    .command('run')
    .description('运行一次完整的雷达流水线')
    .option('--no-llm', '跳过所有LLM分析')
    .option('-t, --top <n>', '报告中展开详情的商品数', positiveInt)
    .option('--notify', '运行结束后发送邮件通知', false)
    .action(async (options: RunOptions) => {
      const { config } = loadConfig();
      const notifications = options.notify ? runtime.createNotifications(config.notification) : null;
      out.log(chalk.blue('开始运行雷达流水线...'));

      let result: PipelineResult;
      try {
        result = await withDatabase(config, database =>
          runtime.createPipeline(config, database).run({ useLlm: options.llm, topN: options.top })
        );
      } catch (error) {
        // 流水线未能启动（品牌档案、标签库或数据库不可用）
        const cause = toError(error);
        out.error(chalk.red(`✗ 流水线无法运行: ${cause.message}`));
        if (notifications) {
          warnIfUnsent(await notifications.sendAlert('Radar run failed', [cause.message]));
        }
        runtime.setExitCode(1);
        return;
      }

      if (result.report) {
        out.log(renderRankingTable(result.report));
      }
      summarizeRun(result).forEach(line => out.log(line));
      if (result.reportFiles) {
        out.log(chalk.green(`✓ 报告已写入: ${result.reportFiles.markdownPath}`));
        out.log(chalk.green(`✓ CSV已写入: ${result.reportFiles.csvPath}`));
      }
      result.errors.forEach(error => out.log(chalk.yellow(`⚠ ${error.step}: ${error.message}`)));

      if (notifications) {
        const sent = result.report && result.status !== 'failed'
          ? await notifications.sendReport(result.report, result.reportFiles)
          : await notifications.sendAlert('Radar run failed', describeErrors(result));
        warnIfUnsent(sent);
      }

      if (result.status === 'failed') {
        out.error(chalk.red('✗ 流水线运行失败'));
        runtime.setExitCode(1);
      }
    });

  // 常驻调度
  program
    .command('schedule')
    .description('按配置的cron表达式每周运行雷达')
    .option('--run-now', '启动后立即运行一次', false)
    .action(async (options: { runNow: boolean }) => {
      const { config } = loadConfig();
      const database = await runtime.openDatabase(config.database.path);
      const notifications = runtime.createNotifications(config.notification);
      const scheduler = new Scheduler({ timezone: config.scheduler.timezone });

      scheduler.addTask(createRadarTask({
        settings: config.scheduler,
        run: () => runtime.createPipeline(config, database).run(),
        notifications
      }));
      scheduler.on('taskCompleted', (taskId: string) => out.log(chalk.green(`✓ 任务完成: ${taskId}`)));
      scheduler.on('taskFailed', (taskId: string, message: string) => out.error(chalk.red(`✗ 任务失败: ${taskId}: ${message}`)));

      scheduler.start();
      const timezone = config.scheduler.timezone ? ` (${config.scheduler.timezone})` : '';
      out.log(chalk.blue(`调度已启动: ${config.scheduler.cronExpression}${timezone}`));

      const shutdown = async (): Promise<void> => {
        scheduler.stop();
        await database.connection.close();
        out.log(chalk.blue('调度已停止'));
      };
      const onSignal = (): void => {
        shutdown().catch((error: unknown) => {
          out.error(chalk.red(`✗ 关闭失败: ${toError(error).message}`));
          runtime.setExitCode(1);
        });
      };
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      if (options.runNow) {
        await scheduler.executeTask(RADAR_TASK_ID);
      }
    });

  // 用已保存的分析结果重新生成报告
  program
    .command('report')
    .description('用数据库中最近一次分析结果重新生成报告')
    .option('-t, --top <n>', '展开详情的商品数', positiveInt)
    .option('-d, --days <n>', '报告覆盖的天数', positiveInt, 7)
    .option('-l, --limit <n>', '最多包含的商品数', positiveInt)
    .action(async (options: ReportOptions) => {
      const { config } = loadConfig();
      const brand = loadBrandProfile(config.brand.profilePath);

      const report = await withDatabase(config, database => buildStoredReport(database, {
        brandName: brand.name,
        topN: options.top ?? config.report.topN,
        daysBack: options.days,
        limit: options.limit
      }));

      if (report.items.length === 0) {
        out.log(chalk.yellow('数据库中没有分析结果，请先运行 radar run'));
        return;
      }

      out.log(renderRankingTable(report));
      const files = writeReportFiles(report, path.resolve(config.report.outputDir));
      out.log(chalk.green(`✓ 报告已写入: ${files.markdownPath}`));
      out.log(chalk.green(`✓ CSV已写入: ${files.csvPath}`));
    });

  // 数据库管理
  const db = program
    .command('db')
    .description('数据库管理');

  db
    .command('init')
    .description('创建数据库并应用所有迁移')
    .action(async () => {
      const { config } = loadConfig();
      await withDatabase(config, async database => {
        const stats = await database.migrations.getStats();
        out.log(chalk.green(`✓ 数据库已就绪: ${database.connection.getStatus().databasePath}`));
        out.log(`   当前版本: v${stats.currentVersion} / 最新版本: v${stats.latestVersion}`);
        out.log(`   已完成迁移: ${stats.completedMigrations}, 待处理: ${stats.pendingMigrations}`);
      });
    });

  // 指标历史
  program
    .command('history <productId>')
    .description('显示某个商品的指标历史')
    .action(async (productId: string) => {
      const { config } = loadConfig();
      await withDatabase(config, async database => {
        const product = await database.products.findById(productId);
        if (!product) {
          out.error(chalk.red(`商品不存在: ${productId}`));
          runtime.setExitCode(1);
          return;
        }

        out.log(chalk.blue(`${product.name} (${product.platform}/${product.source})`));
        const history = await database.metrics.findByProduct(productId);
        if (history.length === 0) {
          out.log(chalk.yellow('没有指标历史'));
          return;
        }
        out.log(renderHistoryTable(history));
      });
    });

  // 配置
  program
    .command('config')
    .description('显示并校验当前配置（隐藏密钥）')
    .action(() => {
      const { manager } = loadConfig();
      out.log(JSON.stringify(manager.getMaskedConfig(), null, 2));

      const validation = manager.validateConfig();
      validation.warnings.forEach(warning => out.log(chalk.yellow(`⚠ ${warning}`)));
      validation.errors.forEach(error => out.error(chalk.red(`✗ ${error}`)));

      if (validation.valid) {
        out.log(chalk.green('✓ 配置有效'));
      } else {
        runtime.setExitCode(1);
      }
    });

  return program;
}
