import { Token } from './types.js';

export type Convention =
  | 'bracket'
  | 'standard'
  | 'japanese'
  | 'absolute'
  | 'season-word'
  | 'season-ordinal'
  | 'season-short'
  | 'season-standard'
  | 'season-japanese';

export interface ExtractedValue {
  convention: Convention;
  value: number;
  // 被这条规则消耗掉的 token 位置，标题解析时会剔除
  positions: number[];
}

/**
 * 一种命名习惯。按顺序尝试，第一个命中的规则生效
 */
export interface Pattern {
  readonly convention: Convention;
  match(tokens: readonly Token[]): ExtractedValue | null;
}

const CHINESE_DIGITS = new Map<string, number>([
  ['零', 0], ['〇', 0], ['一', 1], ['二', 2], ['两', 2], ['三', 3], ['四', 4],
  ['五', 5], ['六', 6], ['七', 7], ['八', 8], ['九', 9],
]);
const CHINESE_UNITS = new Map<string, number>([['十', 10], ['百', 100], ['千', 1000]]);

/**
 * 解析中文数字，如 十三 -> 13、二十 -> 20、一百零五 -> 105
 */
export function parseChineseNumeral(text: string): number | null {
  if (!text) return null;
  let total = 0;
  let current = 0;
  for (const ch of text) {
    const digit = CHINESE_DIGITS.get(ch);
    if (digit !== undefined) {
      current = digit;
      continue;
    }
    const unit = CHINESE_UNITS.get(ch);
    if (unit === undefined) return null;
    total += (current || 1) * unit;
    current = 0;
  }
  return total + current;
}

/**
 * 解析阿拉伯数字（含全角）或中文数字
 */
export function parseNumeral(text: string): number | null {
  const ascii = text.replace(/[０-９]/g, ch => String.fromCharCode(ch.charCodeAt(0) - 0xfee0));
  if (/^\d+$/.test(ascii)) return parseInt(ascii, 10);
  return parseChineseNumeral(ascii);
}

const NUMERAL = '[0-9０-９零〇一二两三四五六七八九十百千]+';

/**
 * 在每个 token 的文本中查找正则，第一组捕获为数值
 */
function textPattern(convention: Convention, re: RegExp, accept: (token: Token) => boolean = () => true): Pattern {
  return {
    convention,
    match(tokens) {
      for (const token of tokens) {
        if (!accept(token)) continue;
        const m = re.exec(token.text);
        const value = m ? parseNumeral(m[1]) : null;
        if (value !== null) return { convention, value, positions: [token.position] };
      }
      return null;
    },
  };
}

// [05]、[12v2]；[01-12] 这类范围不会命中
export const bracketEpisode = textPattern(
  'bracket',
  /^(\d{1,3})(?:v\d+)?$/i,
  token => token.bracket === 'square' || token.bracket === 'lenticular',
);

// S01E05、S2E5
export const standardEpisode = textPattern('standard', /(?:^|[^A-Za-z0-9])S\d{1,2}E(\d{1,3})(?:v\d+)?(?!\d)/i);

// 第08話、第8话、第十三話、第5集
export const japaneseEpisode = textPattern('japanese', new RegExp(`第(${NUMERAL})[話话集]`));

// "Show - 05" 这类以空格或连字符分隔的裸数字，取最后一个
export const absoluteEpisode: Pattern = {
  convention: 'absolute',
  match(tokens) {
    for (let i = tokens.length - 1; i > 0; i--) {
      const token = tokens[i];
      const m = token.bracket === null ? /^(\d{2,3})(?:v\d+)?$/i.exec(token.text) : null;
      if (m) return { convention: 'absolute', value: parseInt(m[1], 10), positions: [token.position] };
    }
    return null;
  },
};

// Season 2、Season2、[Season 2]，以及被拆开的 "Season" "2"
export const seasonWord: Pattern = {
  convention: 'season-word',
  match(tokens) {
    for (let i = 0; i < tokens.length; i++) {
      const inline = /(?:^|\s)Season\s*(\d{1,2})$/i.exec(tokens[i].text);
      if (inline) return { convention: 'season-word', value: parseInt(inline[1], 10), positions: [tokens[i].position] };
      const next = tokens[i + 1];
      if (next && /^Season$/i.test(tokens[i].text) && /^\d{1,2}$/.test(next.text)) {
        return { convention: 'season-word', value: parseInt(next.text, 10), positions: [tokens[i].position, next.position] };
      }
    }
    return null;
  },
};

// 2nd Season、[3rd Season]
export const seasonOrdinal: Pattern = {
  convention: 'season-ordinal',
  match(tokens) {
    for (let i = 0; i < tokens.length; i++) {
      const inline = /^(\d{1,2})(?:st|nd|rd|th)\s+Season$/i.exec(tokens[i].text);
      if (inline) return { convention: 'season-ordinal', value: parseInt(inline[1], 10), positions: [tokens[i].position] };
      const ordinal = /^(\d{1,2})(?:st|nd|rd|th)$/i.exec(tokens[i].text);
      const next = tokens[i + 1];
      if (ordinal && next && /^Season$/i.test(next.text)) {
        return { convention: 'season-ordinal', value: parseInt(ordinal[1], 10), positions: [tokens[i].position, next.position] };
      }
    }
    return null;
  },
};

// 单独的 S2、S02
export const seasonShort = textPattern('season-short', /^S(\d{1,2})$/i);

// S02E23 中的季数
export const seasonStandard = textPattern('season-standard', /(?:^|[^A-Za-z0-9])S(\d{1,2})E\d{1,3}(?:v\d+)?(?!\d)/i);

// 第2期、第二季
export const seasonJapanese = textPattern('season-japanese', new RegExp(`第(${NUMERAL})[期季]`));

export const FILE_EPISODE_PATTERNS: readonly Pattern[] = [bracketEpisode, standardEpisode, japaneseEpisode, absoluteEpisode];

export const FILE_SEASON_PATTERNS: readonly Pattern[] = [seasonStandard];

export const FOLDER_SEASON_PATTERNS: readonly Pattern[] = [seasonWord, seasonStandard, seasonShort, seasonJapanese, seasonOrdinal];

/**
 * 依次尝试各规则，返回第一个命中的结果
 */
export function firstMatch(patterns: readonly Pattern[], tokens: readonly Token[]): ExtractedValue | null {
  for (const pattern of patterns) {
    const value = pattern.match(tokens);
    if (value) return value;
  }
  return null;
}
