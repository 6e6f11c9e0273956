import { SpecialKind } from './types.js';

/**
 * 分类器使用的固定词表。通过构造函数注入，测试时可以替换
 */
export interface Vocabulary {
  // 特典标记 -> 类型，键保持原始写法
  readonly specialMarkers: ReadonlyMap<string, SpecialKind>;
  // 子目录名（小写），位于其中的文件一律视为特典
  readonly specialFolders: ReadonlySet<string>;
  // zh-TW 这类写法中连字符前的语言代码（小写）
  readonly languageCodes: ReadonlySet<string>;
  // JPTC 这类写法由两个两字母代码拼成（大写）
  readonly compactCodes: ReadonlySet<string>;
  // 分辨率、编码、片源等格式标签
  readonly formatTags: readonly RegExp[];
}

const SPECIAL_MARKERS: ReadonlyArray<[string, SpecialKind]> = [
  ['OP', 'OP'],
  ['ED', 'ED'],
  ['NCOP', 'NCOP'],
  ['NCED', 'NCED'],
  ['PV', 'PV'],
  ['CM', 'CM'],
  ['MENU', 'MENU'],
  ['SP', 'SP'],
  ['SPs', 'SP'],
  ['Special', 'SP'],
  ['Specials', 'SP'],
  ['OVA', 'OVA'],
  ['OAD', 'OAD'],
  ['映像特典', 'SP'],
  ['特典', 'SP'],
];

const FORMAT_TAGS: readonly RegExp[] = [
  /^\d{3,4}[pi]$/i,
  /^\d{3,4}x\d{3,4}$/i,
  /^[48]K$/i,
  /^[xh]\.?26[45]$/i,
  /^(?:HEVC|AVC|AV1|VP9|Hi10P?|Ma10p)$/i,
  /^(?:8|10|12)[-_]?bits?$/i,
  /^(?:AAC|FLAC|AC3|E-?AC3|DTS(?:-HD)?|OPUS|MP3|TrueHD)(?:\d(?:\.\d)?)?$/i,
  /^(?:BD|BDRip|BluRay|Blu-ray|BDMV|Remux|WEB|WEB-?DL|WEB-?Rip|HDTV|HDRip|DVD|DVDRip|TVRip)$/i,
  /^(?:CHS|CHT|GB|BIG5|SUB|SUBS|Dual(?:-Audio)?)$/i,
  /^(?:MKV|MP4|AVI)$/i,
  /^(?:Batch|Complete|Fin|END)$/i,
  /^[0-9A-F]{8}$/,
];

export const DEFAULT_VOCABULARY: Vocabulary = Object.freeze({
  specialMarkers: new Map(SPECIAL_MARKERS),
  specialFolders: new Set(['sps', '映像特典', '特典', 'ova', 'oad', 'specials', 'extras', 'bonus']),
  languageCodes: new Set(['ja', 'jp', 'en', 'zh', 'ko', 'fr', 'de', 'es', 'it', 'ru', 'pt']),
  compactCodes: new Set(['JP', 'JA', 'EN', 'ZH', 'CN', 'TW', 'HK', 'SC', 'TC', 'US', 'GB', 'KR', 'KO', 'FR', 'DE', 'ES', 'IT', 'RU', 'PT', 'BR']),
  formatTags: FORMAT_TAGS,
});

/**
 * 批量范围（01-12、01~26）只说明这是合集，不能当作单集集数
 */
export const EPISODE_RANGE_RE = /^\d{1,3}\s*[-~]\s*\d{1,3}$/;

/**
 * 判断一个 token 是否为格式标签。括号内可能含有多个词（如 "BDRip 1080p HEVC"），任意一个命中即可
 */
export function isFormatTag(text: string, bracketed: boolean, vocabulary: Vocabulary = DEFAULT_VOCABULARY): boolean {
  const words = bracketed ? text.split(/[\s_+]+/).filter(Boolean) : [text];
  return words.some(word => vocabulary.formatTags.some(re => re.test(word)));
}
