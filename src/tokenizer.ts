import { BracketStyle, Token, TokenSource } from './types.js';

const BRACKET_PAIRS = new Map<string, { close: string; style: BracketStyle }>([
  ['[', { close: ']', style: 'square' }],
  ['(', { close: ')', style: 'round' }],
  ['【', { close: '】', style: 'lenticular' }],
]);

// 括号外的分隔符：空白、点、下划线。连字符只有单独出现时才算分隔符（"Show - 05"）
const DELIMITER_RE = /[\s._]+/;
const PUNCTUATION_ONLY_RE = /^[-~+,、]+$/;

export const NO_NAME = 'NO_NAME';

/**
 * 把名称切分为有序的 token 序列。括号内容整体保留为一个 token，
 * 没有闭合的括号按普通字符处理。
 */
export function tokenize(name: string, sourceField: TokenSource): Token[] {
  const tokens: Token[] = [];
  let buffer = '';

  const push = (text: string, bracket: BracketStyle | null) => {
    tokens.push({ text, sourceField, position: tokens.length, bracket });
  };
  const flush = () => {
    for (const piece of buffer.split(DELIMITER_RE)) {
      if (piece && !PUNCTUATION_ONLY_RE.test(piece)) push(piece, null);
    }
    buffer = '';
  };

  let i = 0;
  while (i < name.length) {
    const pair = BRACKET_PAIRS.get(name[i]);
    const end = pair ? name.indexOf(pair.close, i + 1) : -1;
    if (pair && end !== -1) {
      flush();
      const inner = name.slice(i + 1, end).trim();
      if (inner) push(inner, pair.style);
      i = end + 1;
      continue;
    }
    buffer += name[i];
    i++;
  }
  flush();
  return tokens;
}

/**
 * 字幕组标签：约定为名称开头的方括号（或【】）token
 */
export function findGroupTag(tokens: readonly Token[]): Token | null {
  const first = tokens[0];
  if (first && (first.bracket === 'square' || first.bracket === 'lenticular')) {
    return first;
  }
  return null;
}

/**
 * 把 token 还原为书写形式，圆括号与【】保留原括号
 */
export function renderToken(token: Token): string {
  switch (token.bracket) {
    case 'square':
      return `[${token.text}]`;
    case 'round':
      return `(${token.text})`;
    case 'lenticular':
      return `【${token.text}】`;
    default:
      return token.text;
  }
}

/**
 * 去掉文件名中的扩展名部分
 */
export function stripExtension(fileName: string, extension: string): string {
  if (!extension) return fileName;
  const suffix = `.${extension}`;
  return fileName.endsWith(suffix) ? fileName.slice(0, -suffix.length) : fileName;
}

/**
 * 去掉文件系统不允许的字符并合并空白
 */
export function cleanName(name: string): string {
  return name
    .replace(/[<>:"/\\|?*]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .trim();
}
