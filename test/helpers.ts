import path from 'path';
import { RawEntry } from '../src/types.js';

/**
 * 构造测试用的 RawEntry，源路径统一放在 /media/incoming 下
 */
export function rawEntry(folderName: string, fileName: string, relativeSubpath: string[] = []): RawEntry {
  const sourceRoot = `/media/incoming/${folderName}`;
  return {
    sourcePath: [sourceRoot, ...relativeSubpath, fileName].join('/'),
    sourceRoot,
    folderName,
    fileName,
    relativeSubpath,
    extension: path.extname(fileName).slice(1),
  };
}
