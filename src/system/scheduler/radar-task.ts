/**
 * 每周雷达任务：运行流水线，成功时发送报告，失败时发送告警
 */

import { PipelineResult } from '../../pipeline/radar-pipeline';
import { NotificationManager } from '../notification';
import { SchedulerSettings } from '../config';
import { TaskConfig } from './index';
import { toError } from '../../collection/utils/error-handler';

export const RADAR_TASK_ID = 'weekly-radar';

export interface RadarTaskOptions {
  settings: SchedulerSettings;
  run: () => Promise<PipelineResult>;
  notifications?: NotificationManager | null;
  timeout?: number;
}

export function createRadarTask(options: RadarTaskOptions): TaskConfig {
  const { settings, run, notifications } = options;

  return {
    id: RADAR_TASK_ID,
    name: 'Weekly product trend radar',
    cronExpression: settings.cronExpression,
    timezone: settings.timezone,
    timeout: options.timeout,
    enabled: true,
    handler: async () => {
      let result: PipelineResult;
      try {
        result = await run();
      } catch (error) {
        // 流水线未能启动（配置或数据文件损坏等）
        const cause = toError(error);
        await notifications?.sendAlert('Radar run failed', [cause.message]);
        throw new Error(`Radar run failed: ${cause.message}`);
      }

      const details = result.errors.map(error => `${error.step}: ${error.message}`);

      if (result.status === 'failed' || !result.report) {
        await notifications?.sendAlert('Radar run failed', details);
        throw new Error(`Radar run failed: ${details.join('; ') || 'no report produced'}`);
      }

      await notifications?.sendReport(result.report, result.reportFiles);
      return `${result.status}: ${result.counts.ranked} products ranked`;
    }
  };
}
