/**
 * 趋势雷达日志系统
 * 提供结构化的日志记录功能
 */

import fs from 'fs';
import path from 'path';
import { formatLocalDate } from '../validator';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export interface LogEntry {
  /** 日志级别 */
  level: LogLevel;

  /** 日志消息 */
  message: string;

  /** 模块名称 */
  module: string;

  /** 操作名称 */
  operation?: string;

  /** 时间戳 */
  timestamp: Date;

  /** 额外数据 */
  data?: Record<string, unknown>;

  /** 错误对象 */
  error?: Error;
}

export interface LoggerOptions {
  /** 最小日志级别 */
  minLevel?: LogLevel;

  /** 是否启用控制台输出 */
  consoleOutput?: boolean;

  /** 是否启用文件输出 */
  fileOutput?: boolean;

  /** 日志目录，按天生成 radar_YYYYMMDD.log */
  logDir?: string;

  /** 模块名称 */
  moduleName?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

/**
 * 把字符串解析为日志级别，无法识别时返回undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized);
}

export class CollectionLogger {
  private options: Required<Omit<LoggerOptions, 'logDir'>> & Pick<LoggerOptions, 'logDir'>;
  private parent?: CollectionLogger;

  constructor(options: LoggerOptions = {}, parent?: CollectionLogger) {
    this.parent = parent;
    this.options = {
      minLevel: LogLevel.INFO,
      consoleOutput: true,
      fileOutput: false,
      moduleName: 'radar',
      ...options
    };
  }

  /**
   * 记录调试日志
   */
  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  /**
   * 记录信息日志
   */
  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  /**
   * 记录警告日志
   */
  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  /**
   * 记录错误日志
   */
  error(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation, error);
  }

  /**
   * 记录致命错误日志
   */
  fatal(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.FATAL, message, data, operation, error);
  }

  /**
   * 调整配置（最小级别、文件输出等）
   */
  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  getModuleName(): string {
    return this.options.moduleName;
  }

  /**
   * 创建子模块日志器，子日志器与父日志器共享后续的配置变更
   */
  createSubLogger(moduleName: string): CollectionLogger {
    return new CollectionLogger(
      { moduleName: `${this.options.moduleName}.${moduleName}` },
      this
    );
  }

  /**
   * 当前生效的配置：子日志器只保留自己的模块名，其余沿用父日志器
   */
  private resolveOptions(): LoggerOptions {
    if (!this.parent) {
      return this.options;
    }
    return { ...this.parent.resolveOptions(), moduleName: this.options.moduleName };
  }

  /**
   * 格式化一条日志
   */
  static format(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(5);
    const operationStr = entry.operation ? ` [${entry.operation}]` : '';

    let line = `${timestamp} ${levelStr} [${entry.module}]${operationStr} ${entry.message}`;

    if (entry.error) {
      line += `\nError: ${entry.error.message}`;
      if (entry.error.stack) {
        line += `\nStack: ${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      line += `\nData: ${JSON.stringify(entry.data)}`;
    }

    return line;
  }

  /**
   * 通用日志记录方法
   */
  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string,
    error?: Error
  ): void {
    const options = this.resolveOptions();
    const minLevel = options.minLevel ?? LogLevel.INFO;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: options.moduleName ?? 'radar',
      operation,
      timestamp: new Date(),
      data,
      error
    };

    if (options.consoleOutput) {
      this.writeToConsole(entry);
    }

    if (options.fileOutput && options.logDir) {
      this.writeToFile(entry, options.logDir);
    }
  }

  /**
   * 写入控制台
   */
  private writeToConsole(entry: LogEntry): void {
    const line = CollectionLogger.format(entry);

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      case LogLevel.INFO:
        console.info(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(line);
        break;
    }
  }

  /**
   * 追加写入当天的日志文件
   */
  private writeToFile(entry: LogEntry, logDir: string): void {
    const day = formatLocalDate(entry.timestamp, '');
    const filePath = path.join(logDir, `radar_${day}.log`);

    try {
      fs.mkdirSync(logDir, { recursive: true });
      fs.appendFileSync(filePath, CollectionLogger.format(entry) + '\n', 'utf-8');
    } catch (error) {
      // 写入失败后关闭整棵日志树的文件输出
      let root: CollectionLogger = this;
      while (root.parent) {
        root = root.parent;
      }
      root.configure({ fileOutput: false });
      console.error(`写入日志文件失败: ${filePath}`, error);
    }
  }
}

/**
 * 默认日志器实例
 */
export const defaultLogger = new CollectionLogger();

/**
 * 创建平台采集器日志器
 */
export function createPlatformLogger(platform: string): CollectionLogger {
  return defaultLogger.createSubLogger(`collector.${platform}`);
}

/**
 * 创建分析模块日志器
 */
export function createAnalysisLogger(name: string): CollectionLogger {
  return defaultLogger.createSubLogger(`analysis.${name}`);
}

/**
 * 创建存储模块日志器
 */
export function createStorageLogger(name: string): CollectionLogger {
  return defaultLogger.createSubLogger(`storage.${name}`);
}

/**
 * 创建流水线日志器
 */
export function createPipelineLogger(): CollectionLogger {
  return defaultLogger.createSubLogger('pipeline');
}
