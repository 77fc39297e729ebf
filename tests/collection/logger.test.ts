/**
 * 日志系统测试
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { CollectionLogger, LogLevel, parseLogLevel } from '../../src/collection/utils/logger';

describe('日志系统测试', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'radar-logs-'));
  });

  afterEach(() => {
    jest.useRealTimers();
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  test('日志文件应该按本地日期命名', () => {
    jest.useFakeTimers({ now: new Date(2025, 9, 30, 0, 30, 0) });
    const logger = new CollectionLogger({ consoleOutput: false, fileOutput: true, logDir });

    logger.info('第一条');
    logger.createSubLogger('pipeline').warn('第二条', undefined, 'run');

    expect(fs.readdirSync(logDir)).toEqual(['radar_20251030.log']);
    const lines = fs.readFileSync(path.join(logDir, 'radar_20251030.log'), 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/ INFO  \[radar\] 第一条$/);
    expect(lines[1]).toMatch(/ WARN  \[radar\.pipeline\] \[run\] 第二条$/);
  });

  test('低于最小级别的日志不应该写入', () => {
    const logger = new CollectionLogger({ consoleOutput: false, fileOutput: true, logDir, minLevel: LogLevel.WARN });

    logger.info('忽略');

    expect(fs.readdirSync(logDir)).toEqual([]);
  });

  test('应该解析日志级别', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
