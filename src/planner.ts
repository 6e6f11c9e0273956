import { detectCollisions } from './collisions.js';
import { MetadataComposer } from './nameParser.js';
import { buildTargetPath } from './pathBuilder.js';
import { FolderInput, OrganizePlan, PlanWarning, PlannedOperation } from './types.js';

/**
 * 把一次运行中的所有文件夹转换为整理计划。纯计算，不做任何 I/O。
 * 所有文件夹共用同一个冲突检测集合，因为不同文件夹可能输出到同一个目标。
 */
export function planBatch(folders: readonly FolderInput[], composer: MetadataComposer = new MetadataComposer()): OrganizePlan {
  const operations: PlannedOperation[] = [];
  const warnings: PlanWarning[] = [];

  for (const folder of folders) {
    if (folder.entries.length === 0) {
      warnings.push({ type: 'EmptyFolder', folderName: folder.folderName });
      continue;
    }
    const context = composer.resolveFolder(folder.folderName);
    for (const entry of folder.entries) {
      const { metadata, record, warnings: entryWarnings } = composer.compose(entry, context);
      warnings.push(...entryWarnings);
      operations.push({
        sourcePath: entry.sourcePath,
        sourceRoot: entry.sourceRoot,
        targetPath: buildTargetPath(metadata),
        operation: 'hardlink',
        metadata,
        record,
      });
    }
  }

  const collisions = detectCollisions(operations);
  for (const operation of operations) {
    const sources = collisions.get(operation.targetPath);
    if (!sources) continue;
    operation.operation = 'skip-duplicate';
    warnings.push({
      type: 'DuplicateTarget',
      sourcePath: operation.sourcePath,
      targetPath: operation.targetPath,
      conflictsWith: sources.filter(source => source !== operation.sourcePath),
    });
  }

  return { operations, warnings };
}
