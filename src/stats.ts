import { PlanWarning } from './types.js';

export interface IoFailure {
  sourcePath: string;
  sourceRoot: string;
  targetPath: string;
  message: string;
}

/**
 * 收集一次运行的处理结果，并在结束时输出汇总。
 */
export class StatsCollector {
  private foldersProcessed = 0;
  private readonly failedFolders: string[] = [];
  private linksCreated = 0;
  private duplicatesSkipped = 0;
  private existingTargets = 0;
  private readonly ioFailures: IoFailure[] = [];
  private readonly warnings: PlanWarning[] = [];

  public addFolder(): void {
    this.foldersProcessed++;
  }

  public addFailedFolder(folder: string): void {
    if (!this.failedFolders.includes(folder)) this.failedFolders.push(folder);
  }

  public addLink(): void {
    this.linksCreated++;
  }

  public addDuplicate(): void {
    this.duplicatesSkipped++;
  }

  public addExisting(): void {
    this.existingTargets++;
  }

  public addFailure(failure: IoFailure): void {
    this.ioFailures.push(failure);
  }

  public addWarnings(warnings: readonly PlanWarning[]): void {
    this.warnings.push(...warnings);
  }

  public isFailed(folder: string): boolean {
    return this.failedFolders.includes(folder);
  }

  public get failures(): readonly IoFailure[] {
    return this.ioFailures;
  }

  public get failedFolderCount(): number {
    return this.failedFolders.length;
  }

  public get linkCount(): number {
    return this.linksCreated;
  }

  public get duplicateCount(): number {
    return this.duplicatesSkipped;
  }

  public get existingCount(): number {
    return this.existingTargets;
  }

  public get warningCount(): number {
    return this.warnings.length;
  }

  /**
   * 在控制台打印一份格式化好的统计报告。
   */
  public printReport(): void {
    console.log('\n--- 整理结果统计 ---');
    console.log(`处理文件夹: ${this.foldersProcessed}，失败: ${this.failedFolders.length}`);
    console.log(`新建硬链接: ${this.linksCreated}`);
    console.log(`  - 目标冲突跳过: ${this.duplicatesSkipped}`);
    console.log(`  - 目标已存在: ${this.existingTargets}`);
    console.log(`  - 链接失败: ${this.ioFailures.length}`);
    console.log(`警告: ${this.warningCount}`);
    for (const folder of this.failedFolders) {
      console.log(`  [失败] ${folder}`);
    }
    console.log('------------------------');
  }
}
