/**
 * 找出整批计划中目标路径完全相同的条目。
 * 返回 目标路径 -> 源路径列表，只包含发生冲突的目标。
 */
export function detectCollisions(items: ReadonlyArray<{ sourcePath: string; targetPath: string }>): Map<string, string[]> {
  const byTarget = new Map<string, string[]>();
  for (const item of items) {
    const sources = byTarget.get(item.targetPath);
    if (sources) {
      sources.push(item.sourcePath);
    } else {
      byTarget.set(item.targetPath, [item.sourcePath]);
    }
  }
  for (const [target, sources] of byTarget) {
    if (sources.length < 2) byTarget.delete(target);
  }
  return byTarget;
}
