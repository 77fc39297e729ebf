#!/usr/bin/env node

/**
 * 趋势雷达命令行工具
 */

import { CommanderError } from 'commander';
import chalk from 'chalk';
import { toError } from '../collection/utils/error-handler';
import { createProgram } from './program';

createProgram().parseAsync(process.argv).catch((error: unknown) => {
  // 帮助、版本与参数错误已由commander输出
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
    return;
  }
  console.error(chalk.red('✗ 执行失败:'), toError(error).message);
  process.exitCode = 1;
});
