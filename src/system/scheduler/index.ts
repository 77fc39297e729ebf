/**
 * Scheduler Module
 *
 * Cron-based in-process task scheduling using node-cron.
 * A task that is still running is never started a second time.
 */

import cron from 'node-cron';
import { EventEmitter } from 'events';
import { toError } from '../../collection/utils/error-handler';
import { createPipelineLogger } from '../../collection/utils/logger';

/**
 * Work performed by a task. The resolved string, if any, is kept as the run output.
 */
export type TaskHandler = () => Promise<string | void>;

export interface TaskConfig {
  id: string;
  name: string;
  cronExpression: string;
  handler: TaskHandler;
  enabled: boolean;
  description?: string;
  timeout?: number; // milliseconds
  timezone?: string;
}

export interface TaskStatus {
  id: string;
  lastRun: Date | null;
  isRunning: boolean;
  isScheduled: boolean;
  lastError: string | null;
  runCount: number;
  successCount: number;
  failureCount: number;
  skippedCount: number;
  lastRunDuration?: number; // milliseconds
}

export interface SchedulerOptions {
  maxConcurrentTasks?: number;
  taskTimeout?: number; // milliseconds
  historyLimit?: number;
  timezone?: string;
}

export interface TaskExecutionResult {
  success: boolean;
  skipped?: boolean;
  output?: string;
  error?: string;
  duration: number; // milliseconds
}

export interface ExecutionRecord extends TaskExecutionResult {
  taskId: string;
  timestamp: Date;
  scheduled: boolean; // true if triggered by cron, false if manual
}

export class Scheduler extends EventEmitter {
  private tasks: Map<string, TaskConfig> = new Map();
  private status: Map<string, TaskStatus> = new Map();
  private cronJobs: Map<string, cron.ScheduledTask> = new Map();
  private runningTasks: Set<string> = new Set();
  private pending: Map<string, Promise<void>> = new Map();
  private history: Map<string, ExecutionRecord[]> = new Map();
  private options: Required<Omit<SchedulerOptions, 'timezone'>> & Pick<SchedulerOptions, 'timezone'>;
  private started = false;
  private logger = createPipelineLogger().createSubLogger('scheduler');

  constructor(options: SchedulerOptions = {}) {
    super();
    this.options = {
      maxConcurrentTasks: 5,
      taskTimeout: 2 * 60 * 60 * 1000, // 2 hours
      historyLimit: 10,
      ...options
    };
  }

  /**
   * Add a new task; it is scheduled right away when the scheduler is running
   */
  addTask(config: TaskConfig): void {
    if (!cron.validate(config.cronExpression)) {
      throw new Error(`Invalid cron expression for task ${config.id}: ${config.cronExpression}`);
    }
    if (this.tasks.has(config.id)) {
      throw new Error(`Task already exists: ${config.id}`);
    }

    this.tasks.set(config.id, config);
    this.status.set(config.id, {
      id: config.id,
      lastRun: null,
      isRunning: false,
      isScheduled: false,
      lastError: null,
      runCount: 0,
      successCount: 0,
      failureCount: 0,
      skippedCount: 0
    });

    if (config.enabled && this.started) {
      this.scheduleTask(config);
    }

    this.emit('taskAdded', config);
  }

  /**
   * Update an existing task
   */
  updateTask(taskId: string, updates: Partial<Omit<TaskConfig, 'id'>>): void {
    const existing = this.tasks.get(taskId);
    if (!existing) {
      throw new Error(`Task not found: ${taskId}`);
    }
    if (updates.cronExpression !== undefined && !cron.validate(updates.cronExpression)) {
      throw new Error(`Invalid cron expression for task ${taskId}: ${updates.cronExpression}`);
    }

    const updated = { ...existing, ...updates };
    this.tasks.set(taskId, updated);

    const needsReschedule = updates.cronExpression !== undefined
      || updates.enabled !== undefined
      || updates.timezone !== undefined
      || updates.handler !== undefined;

    if (needsReschedule && this.started) {
      this.unscheduleTask(taskId);
      if (updated.enabled) {
        this.scheduleTask(updated);
      }
    }

    this.emit('taskUpdated', updated);
  }

  /**
   * Remove a task from the scheduler
   */
  removeTask(taskId: string): void {
    this.unscheduleTask(taskId);
    this.tasks.delete(taskId);
    this.status.delete(taskId);
    this.history.delete(taskId);
    this.emit('taskRemoved', taskId);
  }

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    for (const task of this.tasks.values()) {
      if (task.enabled) {
        this.scheduleTask(task);
      }
    }

    this.emit('schedulerStarted');
    this.logger.info('调度器已启动', { tasks: this.cronJobs.size }, 'start');
  }

  /**
   * Stop the scheduler. Runs already in progress finish on their own.
   */
  stop(): void {
    for (const taskId of Array.from(this.cronJobs.keys())) {
      this.unscheduleTask(taskId);
    }
    this.started = false;

    this.emit('schedulerStopped');
    this.logger.info('调度器已停止', undefined, 'stop');
  }

  isStarted(): boolean {
    return this.started;
  }

  /**
   * Execute a task immediately (manual trigger)
   */
  async executeTask(taskId: string): Promise<TaskExecutionResult> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new Error(`Task not found: ${taskId}`);
    }

    return this.runTask(task, false);
  }

  getTaskStatus(taskId: string): TaskStatus | undefined {
    return this.status.get(taskId);
  }

  getAllStatuses(): TaskStatus[] {
    return Array.from(this.status.values());
  }

  /**
   * Execution history for a task, oldest first
   */
  getExecutionHistory(taskId: string): ExecutionRecord[] {
    return [...(this.history.get(taskId) ?? [])];
  }

  getAllTasks(): TaskConfig[] {
    return Array.from(this.tasks.values());
  }

  private scheduleTask(task: TaskConfig): void {
    this.unscheduleTask(task.id);

    const job = cron.schedule(task.cronExpression, async () => {
      await this.runTask(task, true);
    }, {
      scheduled: true,
      timezone: task.timezone ?? this.options.timezone
    });

    this.cronJobs.set(task.id, job);
    this.updateTaskStatus(task.id, { isScheduled: true });
    this.emit('taskScheduled', task);
  }

  private unscheduleTask(taskId: string): void {
    const job = this.cronJobs.get(taskId);
    if (job) {
      job.stop();
      this.cronJobs.delete(taskId);
      this.updateTaskStatus(taskId, { isScheduled: false });
      this.emit('taskUnscheduled', taskId);
    }
  }

  private async runTask(task: TaskConfig, scheduled: boolean): Promise<TaskExecutionResult> {
    const skipReason = this.runningTasks.has(task.id)
      ? 'Task already running'
      : this.runningTasks.size >= this.options.maxConcurrentTasks
        ? 'Concurrency limit reached'
        : null;

    if (skipReason) {
      const skipped: TaskExecutionResult = { success: false, skipped: true, error: skipReason, duration: 0 };
      this.updateTaskStatus(task.id, {
        skippedCount: (this.status.get(task.id)?.skippedCount ?? 0) + 1
      });
      this.logger.warn(`任务被跳过: ${task.name}`, { taskId: task.id, reason: skipReason }, 'runTask');
      this.emit('taskSkipped', task.id, skipReason);
      this.recordExecution(task.id, skipped, scheduled);
      return skipped;
    }

    this.runningTasks.add(task.id);
    this.updateTaskStatus(task.id, { isRunning: true });

    const startTime = Date.now();
    let result: TaskExecutionResult;
    let settled = false;
    const work = this.invoke(task).finally(() => {
      settled = true;
    });

    try {
      this.emit('taskStarted', task.id);
      this.logger.info(`任务开始: ${task.name}`, { taskId: task.id, scheduled }, 'runTask');

      const output = await this.withTimeout(work, task.timeout ?? this.options.taskTimeout, task.id);

      result = {
        success: true,
        output: output ?? undefined,
        duration: Date.now() - startTime
      };

      const current = this.status.get(task.id);
      this.updateTaskStatus(task.id, {
        lastRun: new Date(),
        isRunning: false,
        runCount: (current?.runCount ?? 0) + 1,
        successCount: (current?.successCount ?? 0) + 1,
        lastRunDuration: result.duration,
        lastError: null
      });

      this.logger.info(`任务完成: ${task.name}`, { taskId: task.id, durationMs: result.duration }, 'runTask');
      this.emit('taskCompleted', task.id, result);
    } catch (error) {
      const cause = toError(error);

      result = {
        success: false,
        error: cause.message,
        duration: Date.now() - startTime
      };

      const current = this.status.get(task.id);
      this.updateTaskStatus(task.id, {
        lastRun: new Date(),
        isRunning: !settled,
        runCount: (current?.runCount ?? 0) + 1,
        failureCount: (current?.failureCount ?? 0) + 1,
        lastRunDuration: result.duration,
        lastError: cause.message
      });

      this.logger.error(`任务失败: ${task.name}`, cause, { taskId: task.id }, 'runTask');
      this.emit('taskFailed', task.id, cause.message);
    } finally {
      if (settled) {
        this.runningTasks.delete(task.id);
      } else {
        // 超时后处理函数仍在运行：结束前一直占用运行槽位，同一任务不会重叠执行
        this.logger.warn(`任务超时后仍在运行: ${task.name}`, { taskId: task.id }, 'runTask');
        this.pending.set(task.id, work.then(
          () => this.release(task.id),
          (error: unknown) => this.release(task.id, toError(error))
        ));
      }
    }

    this.recordExecution(task.id, result, scheduled);
    return result;
  }

  /**
   * 等待超时后仍在运行的处理函数全部结束
   */
  async waitForIdle(): Promise<void> {
    await Promise.all(this.pending.values());
  }

  private invoke(task: TaskConfig): Promise<string | void> {
    try {
      return task.handler();
    } catch (error) {
      return Promise.reject(toError(error));
    }
  }

  private release(taskId: string, lateError?: Error): void {
    this.runningTasks.delete(taskId);
    this.pending.delete(taskId);
    this.updateTaskStatus(taskId, { isRunning: false });
    if (lateError) {
      this.logger.warn(`超时任务的处理函数以错误结束: ${lateError.message}`, { taskId }, 'runTask');
    } else {
      this.logger.info('超时任务的处理函数已结束', { taskId }, 'runTask');
    }
  }

  private withTimeout<T>(work: Promise<T>, timeout: number, taskId: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Task ${taskId} timed out after ${timeout}ms`));
      }, timeout);

      work.then(
        value => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(toError(error));
        }
      );
    });
  }

  private recordExecution(taskId: string, result: TaskExecutionResult, scheduled: boolean): void {
    const history = this.history.get(taskId) ?? [];
    history.push({
      ...result,
      taskId,
      timestamp: new Date(),
      scheduled
    });

    while (history.length > this.options.historyLimit) {
      history.shift();
    }

    this.history.set(taskId, history);
  }

  private updateTaskStatus(taskId: string, updates: Partial<TaskStatus>): void {
    const current = this.status.get(taskId);
    if (current) {
      this.status.set(taskId, { ...current, ...updates });
    }
  }
}

export { createRadarTask, RADAR_TASK_ID } from './radar-task';
export type { RadarTaskOptions } from './radar-task';
