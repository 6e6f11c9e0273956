import { renderSpecialName } from './specialContent.js';
import { SeriesMetadata } from './types.js';

export const EXTRAS_DIR = 'extras';

export function padNumber(value: number): string {
  return String(value).padStart(2, '0');
}

export function seasonDirName(season: number): string {
  return `Season ${padNumber(season)}`;
}

/**
 * 生成相对于媒体库根目录的目标路径（统一使用 / 分隔）：
 *   正片: <Title>/Season 01/<Title> S01E05.zh-TW.ass
 *   特典: <Title>/extras/NCED1.mkv
 */
export function buildTargetPath(metadata: SeriesMetadata): string {
  const suffix =
    metadata.languageTags.map(tag => `.${tag.normalized}`).join('') +
    (metadata.extension ? `.${metadata.extension}` : '');

  if (metadata.isSpecial) {
    return `${metadata.title}/${EXTRAS_DIR}/${renderSpecialName(metadata.specialTag)}${suffix}`;
  }
  const season = padNumber(metadata.season);
  const episode = padNumber(metadata.episode);
  return `${metadata.title}/${seasonDirName(metadata.season)}/${metadata.title} S${season}E${episode}${suffix}`;
}
