import { NO_NAME, cleanName } from './tokenizer.js';
import { SpecialContentTag, SpecialKind, Token } from './types.js';
import { DEFAULT_VOCABULARY, Vocabulary } from './vocabulary.js';

// "第十三话ED" 中的集数前缀只说明所属集数，不影响特典类型
const ORDINAL_PREFIX_RE = /^第[0-9０-９零〇一二两三四五六七八九十百千]+[話话集]\s*/;
const SEGMENT_RE = /^(.*?)(\d+)?$/;
const LATIN_RE = /^[A-Za-z]+$/;

interface Segment {
  text: string;
  kindText: string;
  kind?: SpecialKind;
  index?: number;
  // 序号的原始写法，保留前导零（SP01）
  digits?: string;
}

export interface SpecialParse {
  tags: SpecialContentTag[];
  // 无法确定类型或序号、被归为 OTHER 的段
  malformed: string[];
}

export interface SpecialClassification {
  tag?: SpecialContentTag;
  token?: Token;
  positions: Set<number>;
  malformed: string[];
}

/**
 * 识别 OP/ED/NCOP/NCED/PV/CM/MENU/SP/OVA/OAD 及日文特典标记，支持 & 连接的复合写法
 */
export class SpecialContentClassifier {
  private readonly markers: Map<string, SpecialKind>;

  constructor(vocabulary: Vocabulary = DEFAULT_VOCABULARY) {
    this.markers = new Map();
    for (const [marker, kind] of vocabulary.specialMarkers) {
      this.markers.set(marker.toUpperCase(), kind);
    }
  }

  /**
   * 解析单个 token。括号外的 token 必须是全大写才算标记，避免把标题里的 "Menu" 之类当成特典。
   * 返回 null 表示该 token 不含任何特典标记。
   */
  parse(text: string, bracketed: boolean): SpecialParse | null {
    const body = text.replace(ORDINAL_PREFIX_RE, '');
    if (!body) return null;

    const segments = body.split('&').map(raw => this.parseSegment(raw.trim(), bracketed));
    if (!segments.some(segment => segment.kind !== undefined)) return null;

    const malformed: string[] = [];
    const tags = segments.map((segment, i): SpecialContentTag => {
      const isIndexOnly = segment.kindText === '' && segment.index !== undefined;
      const kind = segment.kind ?? (isIndexOnly ? inheritKind(segments, i) : undefined);
      if (kind === undefined) {
        malformed.push(segment.text);
        return { kind: 'OTHER', label: cleanName(segment.text) || NO_NAME, compoundWith: [] };
      }
      // 自身没有序号时，取后面最近一个带序号的段
      const index = segment.index ?? segments.slice(i + 1).find(next => next.index !== undefined)?.index;
      const base = isIndexOnly ? '' : LATIN_RE.test(segment.kindText) ? kind : segment.kindText;
      const tag: SpecialContentTag = {
        kind,
        label: cleanName(`${base}${segment.digits ?? ''}`) || kind,
        compoundWith: [],
      };
      if (index !== undefined) tag.index = index;
      return tag;
    });

    return { tags, malformed };
  }

  /**
   * 在 token 序列中找到第一个特典标记，复合标签的其余段挂在 compoundWith 下
   */
  classify(tokens: readonly Token[], excluded: ReadonlySet<number> = new Set()): SpecialClassification {
    for (const token of tokens) {
      if (excluded.has(token.position)) continue;
      const parsed = this.parse(token.text, token.bracket !== null);
      if (!parsed) continue;
      const [primary, ...rest] = parsed.tags;
      return {
        tag: { ...primary, compoundWith: rest },
        token,
        positions: new Set([token.position]),
        malformed: parsed.malformed,
      };
    }
    return { positions: new Set(), malformed: [] };
  }

  private parseSegment(text: string, bracketed: boolean): Segment {
    const match = SEGMENT_RE.exec(text);
    const kindText = (match?.[1] ?? text).trim();
    const digits = match?.[2];
    const segment: Segment = { text, kindText };
    const kind = kindText ? this.lookup(kindText, bracketed) : undefined;
    if (kind !== undefined) segment.kind = kind;
    if (digits !== undefined) {
      segment.digits = digits;
      segment.index = parseInt(digits, 10);
    }
    return segment;
  }

  private lookup(text: string, bracketed: boolean): SpecialKind | undefined {
    const upper = text.toUpperCase();
    if (!bracketed && text !== upper) return undefined;
    return this.markers.get(upper);
  }
}

// 纯数字段沿用前面最近的类型（NCOP1&2），前面没有时沿用后面的（1&2ED）
function inheritKind(segments: readonly Segment[], i: number): SpecialKind | undefined {
  for (let j = i - 1; j >= 0; j--) {
    const kind = segments[j].kind;
    if (kind !== undefined) return kind;
  }
  return segments.slice(i + 1).find(next => next.kind !== undefined)?.kind;
}

/**
 * 特典在 extras 目录下的文件名主体，复合标签还原为原来的 & 连接形式
 */
export function renderSpecialName(tag: SpecialContentTag): string {
  return [tag, ...tag.compoundWith].map(member => member.label).join('&');
}
