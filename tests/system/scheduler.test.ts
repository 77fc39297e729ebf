import { Scheduler, TaskConfig, createRadarTask, RADAR_TASK_ID } from '../../src/system/scheduler';
import { NotificationManager } from '../../src/system/notification';
import { PipelineResult } from '../../src/pipeline/radar-pipeline';
import { RecordingTransport, TEST_EMAIL } from '../helpers/fake-mail';
import { sampleReport } from '../report/fixtures';

interface Deferred {
  promise: Promise<string>;
  resolve: (value: string) => void;
}

function deferred(): Deferred {
  let resolve: (value: string) => void = () => undefined;
  const promise = new Promise<string>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

function task(overrides: Partial<TaskConfig> = {}): TaskConfig {
  return {
    id: 'test-task',
    name: 'Test Task',
    cronExpression: '0 9 * * 1',
    handler: async () => 'done',
    enabled: false,
    ...overrides
  };
}

describe('Scheduler', () => {
  let scheduler: Scheduler;

  beforeEach(() => {
    scheduler = new Scheduler();
  });

  afterEach(() => {
    scheduler.stop();
  });

  describe('task management', () => {
    it('should add a task', () => {
      const added = jest.fn();
      scheduler.on('taskAdded', added);

      scheduler.addTask(task());

      expect(scheduler.getAllTasks().map(entry => entry.id)).toEqual(['test-task']);
      expect(added).toHaveBeenCalledTimes(1);
      expect(scheduler.getTaskStatus('test-task')).toEqual({
        id: 'test-task',
        lastRun: null,
        isRunning: false,
        isScheduled: false,
        lastError: null,
        runCount: 0,
        successCount: 0,
        failureCount: 0,
        skippedCount: 0
      });
    });

    it('should reject invalid cron expressions and duplicate ids', () => {
      expect(() => scheduler.addTask(task({ cronExpression: 'every day' }))).toThrow(
        'Invalid cron expression for task test-task: every day'
      );

      scheduler.addTask(task());
      expect(() => scheduler.addTask(task())).toThrow('Task already exists: test-task');
    });

    it('should update a task', () => {
      scheduler.addTask(task());

      scheduler.updateTask('test-task', { name: 'Updated Task', cronExpression: '0 8 * * *' });

      expect(scheduler.getAllTasks()[0]).toMatchObject({ name: 'Updated Task', cronExpression: '0 8 * * *' });
      expect(() => scheduler.updateTask('missing', { name: 'x' })).toThrow('Task not found: missing');
      expect(() => scheduler.updateTask('test-task', { cronExpression: 'bad' })).toThrow(
        'Invalid cron expression for task test-task: bad'
      );
    });

    it('should remove a task with its status and history', async () => {
      scheduler.addTask(task());
      await scheduler.executeTask('test-task');

      scheduler.removeTask('test-task');

      expect(scheduler.getAllTasks()).toHaveLength(0);
      expect(scheduler.getTaskStatus('test-task')).toBeUndefined();
      expect(scheduler.getExecutionHistory('test-task')).toEqual([]);
    });
  });

  describe('scheduling', () => {
    it('should schedule enabled tasks on start and unschedule them on stop', () => {
      scheduler.addTask(task({ id: 'on', enabled: true }));
      scheduler.addTask(task({ id: 'off' }));

      scheduler.start();

      expect(scheduler.isStarted()).toBe(true);
      expect(scheduler.getTaskStatus('on')?.isScheduled).toBe(true);
      expect(scheduler.getTaskStatus('off')?.isScheduled).toBe(false);

      scheduler.stop();

      expect(scheduler.isStarted()).toBe(false);
      expect(scheduler.getTaskStatus('on')?.isScheduled).toBe(false);
    });

    it('should schedule tasks added while running and follow enable changes', () => {
      scheduler.start();
      scheduler.addTask(task({ enabled: true }));
      expect(scheduler.getTaskStatus('test-task')?.isScheduled).toBe(true);

      scheduler.updateTask('test-task', { enabled: false });
      expect(scheduler.getTaskStatus('test-task')?.isScheduled).toBe(false);
    });
  });

  describe('execution', () => {
    it('should run a task manually', async () => {
      const completed = jest.fn();
      scheduler.on('taskCompleted', completed);
      scheduler.addTask(task());

      const result = await scheduler.executeTask('test-task');

      expect(result).toMatchObject({ success: true, output: 'done' });
      expect(scheduler.getTaskStatus('test-task')).toMatchObject({
        isRunning: false,
        runCount: 1,
        successCount: 1,
        failureCount: 0,
        lastError: null
      });
      expect(scheduler.getTaskStatus('test-task')?.lastRun).toBeInstanceOf(Date);
      expect(completed).toHaveBeenCalledWith('test-task', result);
      expect(scheduler.getExecutionHistory('test-task')).toEqual([
        expect.objectContaining({ taskId: 'test-task', success: true, scheduled: false })
      ]);
    });

    it('should record failures', async () => {
      const failed = jest.fn();
      scheduler.on('taskFailed', failed);
      scheduler.addTask(task({ handler: async () => { throw new Error('boom'); } }));

      const result = await scheduler.executeTask('test-task');

      expect(result).toMatchObject({ success: false, error: 'boom' });
      expect(scheduler.getTaskStatus('test-task')).toMatchObject({ runCount: 1, failureCount: 1, lastError: 'boom' });
      expect(failed).toHaveBeenCalledWith('test-task', 'boom');
    });

    it('should reject unknown tasks', async () => {
      await expect(scheduler.executeTask('nope')).rejects.toThrow('Task not found: nope');
    });

    it('should skip a task that is still running', async () => {
      const gate = deferred();
      const skipped = jest.fn();
      scheduler.on('taskSkipped', skipped);
      scheduler.addTask(task({ handler: () => gate.promise }));

      const first = scheduler.executeTask('test-task');
      const second = await scheduler.executeTask('test-task');

      expect(second).toEqual({ success: false, skipped: true, error: 'Task already running', duration: 0 });
      expect(scheduler.getTaskStatus('test-task')?.isRunning).toBe(true);

      gate.resolve('finished');
      await expect(first).resolves.toMatchObject({ success: true, output: 'finished' });

      expect(skipped).toHaveBeenCalledWith('test-task', 'Task already running');
      expect(scheduler.getTaskStatus('test-task')).toMatchObject({ runCount: 1, skippedCount: 1 });
      expect(scheduler.getExecutionHistory('test-task').map(record => record.skipped === true)).toEqual([true, false]);
    });

    it('should respect the concurrency limit', async () => {
      const limited = new Scheduler({ maxConcurrentTasks: 1 });
      const gate = deferred();
      limited.addTask(task({ id: 'slow', handler: () => gate.promise }));
      limited.addTask(task({ id: 'fast' }));

      const slow = limited.executeTask('slow');
      const fast = await limited.executeTask('fast');

      expect(fast).toMatchObject({ skipped: true, error: 'Concurrency limit reached' });

      gate.resolve('done');
      await slow;
      limited.stop();
    });

    it('should time out long-running tasks and hold the slot until the handler settles', async () => {
      const gate = deferred();
      scheduler.addTask(task({ timeout: 10, handler: () => gate.promise }));

      const result = await scheduler.executeTask('test-task');

      expect(result).toMatchObject({ success: false, error: 'Task test-task timed out after 10ms' });
      expect(scheduler.getTaskStatus('test-task')).toMatchObject({ isRunning: true, failureCount: 1 });
      await expect(scheduler.executeTask('test-task')).resolves.toMatchObject({
        skipped: true,
        error: 'Task already running'
      });

      gate.resolve('late');
      await scheduler.waitForIdle();

      expect(scheduler.getTaskStatus('test-task')?.isRunning).toBe(false);
      await expect(scheduler.executeTask('test-task')).resolves.toMatchObject({ success: true, output: 'late' });
    });

    it('should count a timed-out task against the concurrency limit', async () => {
      const limited = new Scheduler({ maxConcurrentTasks: 1 });
      const gate = deferred();
      limited.addTask(task({ id: 'slow', timeout: 10, handler: () => gate.promise }));
      limited.addTask(task({ id: 'fast' }));

      await limited.executeTask('slow');
      await expect(limited.executeTask('fast')).resolves.toMatchObject({ error: 'Concurrency limit reached' });

      gate.resolve('done');
      await limited.waitForIdle();
      await expect(limited.executeTask('fast')).resolves.toMatchObject({ success: true, output: 'done' });
      limited.stop();
    });

    it('should keep only the most recent history entries', async () => {
      const limited = new Scheduler({ historyLimit: 2 });
      let run = 0;
      limited.addTask(task({ handler: async () => `run ${++run}` }));

      await limited.executeTask('test-task');
      await limited.executeTask('test-task');
      await limited.executeTask('test-task');

      expect(limited.getExecutionHistory('test-task').map(record => record.output)).toEqual(['run 2', 'run 3']);
      limited.stop();
    });
  });
});

describe('createRadarTask', () => {
  function pipelineResult(overrides: Partial<PipelineResult>): PipelineResult {
    const report = sampleReport({ errors: [] });
    return {
      status: 'success',
      startedAt: report.generatedAt,
      finishedAt: report.generatedAt,
      durationMs: 0,
      counts: { adsIntel: 2, vendor: 0, douyin: 0, normalized: 2, persisted: 2, analyzed: 0, ranked: 2 },
      report,
      reportFiles: null,
      errors: [],
      ...overrides
    };
  }

  it('should build a task from the scheduler settings', () => {
    const config = createRadarTask({
      settings: { cronExpression: '0 9 * * 1', timezone: 'Europe/Moscow' },
      run: async () => pipelineResult({}),
      timeout: 60000
    });

    expect(config).toMatchObject({
      id: RADAR_TASK_ID,
      name: 'Weekly product trend radar',
      cronExpression: '0 9 * * 1',
      timezone: 'Europe/Moscow',
      timeout: 60000,
      enabled: true
    });
  });

  it('should send the report after a successful run', async () => {
    const transport = new RecordingTransport();
    const config = createRadarTask({
      settings: { cronExpression: '0 9 * * 1' },
      run: async () => pipelineResult({}),
      notifications: NotificationManager.fromConfig({ email: TEST_EMAIL }, transport)
    });

    await expect(config.handler()).resolves.toBe('success: 2 products ranked');
    expect(transport.sent.map(message => message.subject)).toEqual(['Product Trend Radar 2025-10-30']);
  });

  it('should alert and fail when the run fails', async () => {
    const transport = new RecordingTransport();
    const config = createRadarTask({
      settings: { cronExpression: '0 9 * * 1' },
      run: async () => pipelineResult({
        status: 'failed',
        report: null,
        errors: [{ step: 'collect.ads_intel', message: 'login required' }]
      }),
      notifications: NotificationManager.fromConfig({ email: TEST_EMAIL }, transport)
    });

    await expect(config.handler()).rejects.toThrow('Radar run failed: collect.ads_intel: login required');
    expect(transport.sent).toEqual([
      expect.objectContaining({ subject: '[Radar alert] Radar run failed', text: 'collect.ads_intel: login required' })
    ]);
  });

  it('should alert and fail when the run cannot start', async () => {
    const transport = new RecordingTransport();
    const config = createRadarTask({
      settings: { cronExpression: '0 9 * * 1' },
      run: async () => {
        throw new Error('Brand profile is missing a name');
      },
      notifications: NotificationManager.fromConfig({ email: TEST_EMAIL }, transport)
    });

    await expect(config.handler()).rejects.toThrow('Radar run failed: Brand profile is missing a name');
    expect(transport.sent).toEqual([
      expect.objectContaining({ subject: '[Radar alert] Radar run failed', text: 'Brand profile is missing a name' })
    ]);
  });

  it('should run without notifications', async () => {
    const config = createRadarTask({
      settings: { cronExpression: '0 9 * * 1' },
      run: async () => pipelineResult({ status: 'failed', report: null })
    });

    await expect(config.handler()).rejects.toThrow('Radar run failed: no report produced');
  });

  it('should run through the scheduler', async () => {
    const scheduler = new Scheduler();
    scheduler.addTask(createRadarTask({
      settings: { cronExpression: '0 9 * * 1' },
      run: async () => pipelineResult({ status: 'partial' })
    }));

    const result = await scheduler.executeTask(RADAR_TASK_ID);

    expect(result).toMatchObject({ success: true, output: 'partial: 2 products ranked' });
    scheduler.stop();
  });
});
