#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import path from 'path';
import fs from 'fs/promises';
import { ARCHIVE_ENV, CliOptions, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, TARGET_ENV, parseCliOptions } from './config.js';
import { logger, setLogLevel } from './logger.js';
import { organizeMediaLibrary } from './organizer.js';

const program = new Command();

program
  .name('anime-arranger')
  .version('1.0.0')
  .description('把番剧发布文件夹整理为 Jellyfin/Plex 可刮削的标准结构（硬链接），并归档原文件夹。')
  .argument('<names...>', '一个或多个待整理的番剧文件夹')
  .option('--dry-run', '只显示整理计划，不修改任何文件')
  .option('--log-level <level>', '日志级别 (DEBUG, INFO, WARNING, ERROR, CRITICAL)', 'INFO')
  .option('-t, --target <path>', `媒体库根目录（默认取环境变量 ${TARGET_ENV}）`, process.env[TARGET_ENV])
  .option('-a, --archive <path>', `整理成功后原文件夹的归档目录（默认取环境变量 ${ARCHIVE_ENV}）`, process.env[ARCHIVE_ENV])
  .option('-c, --concurrency <number>', '同时创建硬链接的数量', '10')
  .helpOption('-h, --help', '显示帮助信息')
  .exitOverride();

/**
 * 执行预检，返回可以继续处理的文件夹
 */
async function preflightCheck(options: CliOptions): Promise<{ folders: string[]; missing: string[]; targetOk: boolean }> {
  logger.info('--- 开始执行预检 ---');
  const folders: string[] = [];
  const missing: string[] = [];

  for (const name of options.names) {
    const folder = path.resolve(name);
    try {
      const stat = await fs.stat(folder);
      if (stat.isDirectory()) {
        folders.push(folder);
      } else {
        logger.error(`[预检失败] 不是目录: ${name}`);
        missing.push(folder);
      }
    } catch {
      logger.error(`[预检失败] 路径不存在: ${name}`);
      missing.push(folder);
    }
  }

  // dry-run 不创建任何目录
  if (options.dryRun) {
    return { folders, missing, targetOk: true };
  }

  const targetDir = path.resolve(options.target);
  try {
    await fs.mkdir(targetDir, { recursive: true });
    const testFile = path.join(targetDir, `.permission_test_${Date.now()}`);
    await fs.writeFile(testFile, 'test');
    await fs.unlink(testFile);
    logger.info('[预检通过] 目标目录存在且可写。');
  } catch (error) {
    logger.error(`[预检失败] 无法写入目标目录: ${targetDir}: ${String(error)}`);
    return { folders, missing, targetOk: false };
  }

  return { folders, missing, targetOk: true };
}

async function main(): Promise<number> {
  try {
    program.parse(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw error;
  }

  const parsed = parseCliOptions({ ...program.opts(), names: program.args });
  if (!parsed.ok) {
    console.error(parsed.error);
    return EXIT_USAGE;
  }
  const options = parsed.options;
  setLogLevel(options.logLevel);

  logger.debug({ options }, '命令行参数');
  const { folders, missing, targetOk } = await preflightCheck(options);
  if (!targetOk) {
    return EXIT_FAILURE;
  }

  const stats = await organizeMediaLibrary(folders, {
    targetRoot: path.resolve(options.target),
    archiveRoot: options.archive ? path.resolve(options.archive) : undefined,
    dryRun: options.dryRun,
    concurrency: options.concurrency,
  });
  missing.forEach(folder => stats.addFailedFolder(folder));
  stats.printReport();

  return stats.failedFolderCount > 0 ? EXIT_FAILURE : EXIT_OK;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    logger.fatal({ err: error }, '发生意外错误');
    process.exitCode = EXIT_FAILURE;
  });
