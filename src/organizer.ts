import fs from 'fs/promises';
import path from 'path';
import { dryRunLogger, logger as defaultLogger, Logger } from './logger.js';
import { planBatch } from './planner.js';
import { StatsCollector } from './stats.js';
import { FolderInput, OrganizePlan, PlanWarning, PlannedOperation, RawEntry } from './types.js';

const IGNORED_EXTENSIONS = new Set(['.zip', '.rar', '.7z', '.tar', '.gz', '.xz', '.png', '.txt']);
const IGNORED_FILES = new Set(['.DS_Store', 'Thumbs.db']);

export interface OrganizeOptions {
  targetRoot: string; // 媒体库根目录
  archiveRoot?: string; // 整理成功后原文件夹移动到这里
  dryRun: boolean;
  concurrency: number;
  logger?: Logger;
}

// 只看 code 字段，fs 的错误不一定来自当前 realm 的 Error
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * 递归扫描一个番剧文件夹，先处理当前目录的文件，再进入子目录。按名称排序，保证结果稳定。
 */
export async function scanFolder(folderPath: string): Promise<FolderInput> {
  const root = path.resolve(folderPath);
  const folderName = path.basename(root);
  const entries: RawEntry[] = [];

  async function walk(dir: string, subpath: string[]): Promise<void> {
    const dirents = (await fs.readdir(dir, { withFileTypes: true })).sort(byName);
    for (const dirent of dirents) {
      if (!dirent.isFile()) continue;
      if (IGNORED_FILES.has(dirent.name) || IGNORED_EXTENSIONS.has(path.extname(dirent.name).toLowerCase())) {
        continue;
      }
      entries.push({
        sourcePath: path.join(dir, dirent.name),
        sourceRoot: root,
        folderName,
        fileName: dirent.name,
        relativeSubpath: subpath,
        extension: path.extname(dirent.name).slice(1),
      });
    }
    for (const dirent of dirents) {
      if (dirent.isDirectory()) {
        await walk(path.join(dir, dirent.name), [...subpath, dirent.name]);
      }
    }
  }

  await walk(root, []);
  return { folderName, entries };
}

type LinkOutcome = 'created' | 'exists';

/**
 * 创建硬链接。目标已存在时视为之前已经整理过
 */
async function createLink(source: string, destination: string): Promise<LinkOutcome> {
  await fs.mkdir(path.dirname(destination), { recursive: true });
  try {
    await fs.link(source, destination);
    return 'created';
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') return 'exists';
    throw error;
  }
}

function describeWarning(warning: PlanWarning): string | null {
  switch (warning.type) {
    case 'UnrecognizedPattern':
      return `${warning.message}，已归入 extras`;
    case 'MalformedCompoundTag':
      return `无法识别复合特典标签 "${warning.token}" 中的 "${warning.segment}"，按 OTHER 处理: ${warning.sourcePath}`;
    // 空文件夹在扫描阶段已报告，冲突在链接阶段逐条报告
    case 'EmptyFolder':
    case 'DuplicateTarget':
      return null;
  }
}

/**
 * 按计划创建硬链接。冲突条目不做任何操作；单个文件失败不影响其他文件。
 */
export async function executePlan(
  plan: OrganizePlan,
  options: OrganizeOptions,
  stats: StatsCollector,
  log: Logger,
): Promise<void> {
  plan.operations.forEach((operation, i) => {
    const num = String(i + 1).padStart(2, '0');
    const source = path.basename(operation.sourcePath);
    if (operation.operation === 'skip-duplicate') {
      const first = plan.operations.findIndex(other => other.targetPath === operation.targetPath) + 1;
      log.warn(`${num}. 与 ${String(first).padStart(2, '0')}. 目标重复，跳过: ${operation.targetPath} <- ${source}`);
    } else {
      log.info(`${num}. ${operation.targetPath} <- ${source}`);
    }
    log.debug({ metadata: operation.metadata, record: operation.record }, `源文件: ${operation.sourcePath}`);
  });

  const duplicates = plan.operations.filter(operation => operation.operation === 'skip-duplicate');
  duplicates.forEach(() => stats.addDuplicate());

  const tasks = plan.operations.filter(operation => operation.operation === 'hardlink');
  if (options.dryRun) {
    log.info(`共 ${tasks.length} 个文件将被链接到 ${options.targetRoot}`);
    return;
  }

  for (let i = 0; i < tasks.length; i += options.concurrency) {
    const chunk = tasks.slice(i, i + options.concurrency);
    const results = await Promise.allSettled(
      chunk.map(operation => createLink(operation.sourcePath, path.join(options.targetRoot, operation.targetPath))),
    );

    results.forEach((result, j) => {
      const operation: PlannedOperation = chunk[j];
      if (result.status === 'fulfilled') {
        if (result.value === 'created') {
          stats.addLink();
        } else {
          stats.addExisting();
          log.warn(`目标已存在，跳过: ${operation.targetPath}`);
        }
        return;
      }
      const message = errorMessage(result.reason);
      log.error(`链接失败 ${operation.sourcePath} -> ${operation.targetPath}: ${message}`);
      stats.addFailure({ sourcePath: operation.sourcePath, sourceRoot: operation.sourceRoot, targetPath: operation.targetPath, message });
      stats.addFailedFolder(operation.sourceRoot);
    });
  }
}

/**
 * 把整理完成的原文件夹移动到归档目录，跨设备时退回到复制后删除
 */
export async function archiveFolder(folderPath: string, archiveRoot: string, dryRun: boolean, log: Logger): Promise<void> {
  const destination = path.join(archiveRoot, path.basename(folderPath));
  log.info(`移动原文件夹到: ${destination}`);
  if (dryRun) return;

  try {
    await fs.access(destination);
    log.warn(`归档目录已存在，保留原文件夹: ${destination}`);
    return;
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
  }

  await fs.mkdir(archiveRoot, { recursive: true });
  try {
    await fs.rename(folderPath, destination);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') throw error;
    await fs.cp(folderPath, destination, { recursive: true });
    await fs.rm(folderPath, { recursive: true, force: true });
  }
}

/**
 * 主流程：扫描 -> 生成整理计划 -> 创建硬链接 -> 归档原文件夹
 */
export async function organizeMediaLibrary(sourceDirs: readonly string[], options: OrganizeOptions): Promise<StatsCollector> {
  const base = options.logger ?? defaultLogger;
  const log = options.dryRun ? dryRunLogger(base) : base;
  const stats = new StatsCollector();

  log.info('--- 阶段 1: 开始扫描源文件夹 ---');
  const folders: FolderInput[] = [];
  const roots: string[] = [];
  for (const sourceDir of sourceDirs) {
    const root = path.resolve(sourceDir);
    try {
      const folder = await scanFolder(root);
      stats.addFolder();
      if (folder.entries.length === 0) {
        log.error(`文件夹中没有可整理的文件: ${root}`);
        stats.addFailedFolder(root);
      } else {
        log.info(`源文件夹: ${root}（${folder.entries.length} 个文件）`);
        roots.push(root);
      }
      folders.push(folder);
    } catch (error) {
      log.error(`无法读取文件夹 ${root}: ${errorMessage(error)}`);
      stats.addFailedFolder(root);
    }
  }

  log.info('--- 阶段 2: 生成整理计划 ---');
  const plan = planBatch(folders);
  stats.addWarnings(plan.warnings);
  for (const warning of plan.warnings) {
    const message = describeWarning(warning);
    if (message) log.warn(message);
  }

  log.info(`--- 阶段 3: 开始链接文件 (目标目录: ${options.targetRoot}) ---`);
  await executePlan(plan, options, stats, log);

  if (options.archiveRoot) {
    log.info('--- 阶段 4: 归档原文件夹 ---');
    const skipped = new Set(
      plan.operations.filter(operation => operation.operation === 'skip-duplicate').map(operation => operation.sourceRoot),
    );
    for (const root of roots) {
      if (stats.isFailed(root)) {
        log.warn(`存在链接失败的文件，不归档: ${root}`);
        continue;
      }
      if (skipped.has(root)) {
        log.warn(`存在因目标冲突被跳过的文件，不归档: ${root}`);
        continue;
      }
      try {
        await archiveFolder(root, options.archiveRoot, options.dryRun, log);
      } catch (error) {
        log.error(`归档失败 ${root}: ${errorMessage(error)}`);
        stats.addFailedFolder(root);
      }
    }
  }

  return stats;
}
