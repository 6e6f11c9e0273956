/**
 * 目录扫描得到的原始条目，每个源文件对应一个
 */
export interface RawEntry {
  sourcePath: string; // 源文件完整路径
  sourceRoot: string; // 命令行传入的番剧文件夹（绝对路径）
  folderName: string; // 番剧文件夹的名称，如 "[Group] Show [1080p]"
  fileName: string; // 含扩展名的文件名
  relativeSubpath: readonly string[]; // 文件夹与文件之间的子目录，如 ['SPs']
  extension: string; // 不含点号的扩展名，保留原大小写
}

export type TokenSource = 'folder' | 'file';

export type BracketStyle = 'square' | 'round' | 'lenticular';

/**
 * 分词结果。括号内的内容整体作为一个 token，bracket 记录括号类型
 */
export interface Token {
  readonly text: string;
  readonly sourceField: TokenSource;
  readonly position: number;
  readonly bracket: BracketStyle | null;
}

export interface LanguageTag {
  raw: string;
  normalized: string; // 如 zh-TW、JPTC
}

export type SpecialKind = 'OP' | 'ED' | 'NCOP' | 'NCED' | 'PV' | 'CM' | 'MENU' | 'SP' | 'OVA' | 'OAD' | 'OTHER';

/**
 * 特典标签。复合标签（PV&CM4）的第一段为主标签，其余段放在 compoundWith 中
 */
export interface SpecialContentTag {
  kind: SpecialKind;
  index?: number;
  // 输出文件名中这一段的写法，如 NCED1、映像特典
  label: string;
  compoundWith: SpecialContentTag[];
}

export type Confidence = 'filename' | 'foldername' | 'default';

export interface EpisodeRecord {
  season?: number;
  episode?: number;
  confidence: Confidence;
}

interface MetadataBase {
  title: string;
  season: number;
  languageTags: LanguageTag[];
  extension: string;
}

export interface EpisodeMetadata extends MetadataBase {
  isSpecial: false;
  episode: number;
}

export interface SpecialMetadata extends MetadataBase {
  isSpecial: true;
  specialTag: SpecialContentTag;
}

/**
 * 一个文件最终的结构化信息，season 已经确定，特典没有集数
 */
export type SeriesMetadata = EpisodeMetadata | SpecialMetadata;

/**
 * 一个番剧文件夹及其扫描出的全部文件
 */
export interface FolderInput {
  folderName: string;
  entries: RawEntry[];
}

export type OperationKind = 'hardlink' | 'skip-duplicate';

export interface PlannedOperation {
  sourcePath: string;
  sourceRoot: string;
  targetPath: string; // 相对于媒体库根目录
  operation: OperationKind;
  metadata: SeriesMetadata;
  record: EpisodeRecord;
}

export type PlanWarning =
  | { type: 'UnrecognizedPattern'; sourcePath: string; message: string }
  | { type: 'DuplicateTarget'; sourcePath: string; targetPath: string; conflictsWith: string[] }
  | { type: 'MalformedCompoundTag'; sourcePath: string; token: string; segment: string }
  | { type: 'EmptyFolder'; folderName: string };

/**
 * 一次运行的完整整理计划
 */
export interface OrganizePlan {
  operations: PlannedOperation[];
  warnings: PlanWarning[];
}
