import { LanguageTag, Token } from './types.js';
import { DEFAULT_VOCABULARY, Vocabulary } from './vocabulary.js';

const HYPHENATED_RE = /^([A-Za-z]{2})-([A-Za-z]{2,4})$/;
const COMPACT_RE = /^([A-Za-z]{2})([A-Za-z]{2})$/;

export interface LanguageClassification {
  tags: LanguageTag[];
  positions: Set<number>;
}

/**
 * 识别语言标签：zh-TW / zh-Hant 这类带连字符的写法，以及 JPTC / ENCN 这类四字母拼写
 */
export class LanguageTagClassifier {
  constructor(private readonly vocabulary: Vocabulary = DEFAULT_VOCABULARY) {}

  match(text: string): LanguageTag | null {
    const hyphenated = HYPHENATED_RE.exec(text);
    if (hyphenated) {
      // 连字符写法原样输出
      return this.vocabulary.languageCodes.has(hyphenated[1].toLowerCase())
        ? { raw: text, normalized: text }
        : null;
    }
    const compact = COMPACT_RE.exec(text);
    if (
      compact &&
      this.vocabulary.compactCodes.has(compact[1].toUpperCase()) &&
      this.vocabulary.compactCodes.has(compact[2].toUpperCase())
    ) {
      return { raw: text, normalized: text.toUpperCase() };
    }
    return null;
  }

  /**
   * 收集名称末尾（扩展名之前）连续出现的语言标签，按出现顺序返回。
   * 标题中间的 Jade、Deus 这类单词不会被当作语言标签。excluded 中的位置（字幕组标签）不参与匹配。
   */
  classify(tokens: readonly Token[], excluded: ReadonlySet<number> = new Set()): LanguageClassification {
    const trailing: Array<{ tag: LanguageTag; position: number }> = [];
    for (let i = tokens.length - 1; i >= 0; i--) {
      const token = tokens[i];
      const tag = excluded.has(token.position) ? null : this.match(token.text);
      if (!tag) break;
      trailing.unshift({ tag, position: token.position });
    }
    return {
      tags: trailing.map(item => item.tag),
      positions: new Set(trailing.map(item => item.position)),
    };
  }
}
