import { FOLDER_SEASON_PATTERNS, Pattern, bracketEpisode, standardEpisode } from './episodePatterns.js';
import { LanguageTagClassifier } from './languageTags.js';
import { SpecialContentClassifier } from './specialContent.js';
import { NO_NAME, cleanName, findGroupTag, renderToken, tokenize } from './tokenizer.js';
import { Token } from './types.js';
import { DEFAULT_VOCABULARY, EPISODE_RANGE_RE, Vocabulary, isFormatTag } from './vocabulary.js';

export interface TitleResolverDeps {
  vocabulary?: Vocabulary;
  language?: LanguageTagClassifier;
  special?: SpecialContentClassifier;
  seasonPatterns?: readonly Pattern[];
}

/**
 * 从番剧文件夹名中解析出系列标题。同一个文件夹下的所有文件共用这个结果。
 */
export class TitleResolver {
  private readonly vocabulary: Vocabulary;
  private readonly language: LanguageTagClassifier;
  private readonly special: SpecialContentClassifier;
  private readonly seasonPatterns: readonly Pattern[];

  constructor(deps: TitleResolverDeps = {}) {
    this.vocabulary = deps.vocabulary ?? DEFAULT_VOCABULARY;
    this.language = deps.language ?? new LanguageTagClassifier(this.vocabulary);
    this.special = deps.special ?? new SpecialContentClassifier(this.vocabulary);
    this.seasonPatterns = deps.seasonPatterns ?? FOLDER_SEASON_PATTERNS;
  }

  resolve(folderName: string): string {
    const tokens = tokenize(folderName, 'folder');
    const group = findGroupTag(tokens);
    const removed = this.classifiedPositions(tokens, group);

    const residual = tokens.filter(token => !removed.has(token.position) && token.bracket !== 'square');
    const title = cleanName(residual.map(renderToken).join(' '));
    if (title) return title;

    // [Group][Title][01] 这类写法，标题本身在方括号里
    const bracketed = tokens.find(token => !removed.has(token.position) && token.bracket !== null);
    const candidate = bracketed ? cleanName(bracketed.text) : '';
    if (candidate) return candidate;

    return fallbackTitle(folderName, tokens, group);
  }

  /**
   * 字幕组、格式、语言、特典、季数与集数 token 的位置
   */
  private classifiedPositions(tokens: readonly Token[], group: Token | null): Set<number> {
    const removed = new Set<number>();
    if (group) removed.add(group.position);

    // 文件夹名中只剔除括号内的语言标签
    for (const token of tokens) {
      if (token.bracket !== null && !removed.has(token.position) && this.language.match(token.text)) {
        removed.add(token.position);
      }
    }
    for (const position of this.special.classify(tokens, removed).positions) removed.add(position);

    for (const pattern of [...this.seasonPatterns, bracketEpisode, standardEpisode]) {
      const remaining = tokens.filter(token => !removed.has(token.position));
      const match = pattern.match(remaining);
      if (match) match.positions.forEach(position => removed.add(position));
    }

    for (const token of tokens) {
      if (EPISODE_RANGE_RE.test(token.text) || isFormatTag(token.text, token.bracket !== null, this.vocabulary)) {
        removed.add(token.position);
      }
    }
    return removed;
  }
}

// 解析不出标题时，使用去掉字幕组和括号后的文件夹名
function fallbackTitle(folderName: string, tokens: readonly Token[], group: Token | null): string {
  const rest = tokens.filter(token => token !== group).map(token => token.text).join(' ');
  return cleanName(rest) || (group ? cleanName(group.text) : '') || cleanName(folderName) || NO_NAME;
}
