import {
  ExtractedValue,
  FILE_EPISODE_PATTERNS,
  FILE_SEASON_PATTERNS,
  FOLDER_SEASON_PATTERNS,
  Pattern,
  firstMatch,
} from './episodePatterns.js';
import { LanguageTagClassifier } from './languageTags.js';
import { SpecialContentClassifier } from './specialContent.js';
import { TitleResolver } from './titleResolver.js';
import { NO_NAME, cleanName, findGroupTag, stripExtension, tokenize } from './tokenizer.js';
import { EpisodeRecord, PlanWarning, RawEntry, SeriesMetadata, SpecialContentTag, Token } from './types.js';
import { DEFAULT_VOCABULARY, EPISODE_RANGE_RE, Vocabulary, isFormatTag } from './vocabulary.js';

/**
 * 文件夹级别的解析结果，文件夹内所有文件共用
 */
export interface FolderContext {
  folderName: string;
  title: string;
  season?: number;
}

export interface ComposedEntry {
  metadata: SeriesMetadata;
  record: EpisodeRecord;
  warnings: PlanWarning[];
}

export interface ComposerOptions {
  vocabulary?: Vocabulary;
  episodePatterns?: readonly Pattern[];
  fileSeasonPatterns?: readonly Pattern[];
  folderSeasonPatterns?: readonly Pattern[];
}

/**
 * 把分词、语言、特典、季/集、标题各部分的结果合并成每个文件的 SeriesMetadata
 */
export class MetadataComposer {
  private readonly vocabulary: Vocabulary;
  private readonly language: LanguageTagClassifier;
  private readonly special: SpecialContentClassifier;
  private readonly titles: TitleResolver;
  private readonly episodePatterns: readonly Pattern[];
  private readonly fileSeasonPatterns: readonly Pattern[];
  private readonly folderSeasonPatterns: readonly Pattern[];

  constructor(options: ComposerOptions = {}) {
    this.vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;
    this.language = new LanguageTagClassifier(this.vocabulary);
    this.special = new SpecialContentClassifier(this.vocabulary);
    this.episodePatterns = options.episodePatterns ?? FILE_EPISODE_PATTERNS;
    this.fileSeasonPatterns = options.fileSeasonPatterns ?? FILE_SEASON_PATTERNS;
    this.folderSeasonPatterns = options.folderSeasonPatterns ?? FOLDER_SEASON_PATTERNS;
    this.titles = new TitleResolver({
      vocabulary: this.vocabulary,
      language: this.language,
      special: this.special,
      seasonPatterns: this.folderSeasonPatterns,
    });
  }

  /**
   * 每个文件夹只解析一次标题和季数
   */
  resolveFolder(folderName: string): FolderContext {
    const context: FolderContext = { folderName, title: this.titles.resolve(folderName) };
    const season = this.matchFolderSeason(folderName);
    if (season !== undefined) context.season = season;
    return context;
  }

  compose(entry: RawEntry, context: FolderContext): ComposedEntry {
    const warnings: PlanWarning[] = [];
    const tokens = tokenize(stripExtension(entry.fileName, entry.extension), 'file');
    const group = findGroupTag(tokens);

    const excluded = new Set<number>(group ? [group.position] : []);
    const language = this.language.classify(tokens, excluded);
    language.positions.forEach(position => excluded.add(position));
    const residual = tokens.filter(token => !excluded.has(token.position));

    const special = this.special.classify(residual);
    for (const segment of special.malformed) {
      warnings.push({ type: 'MalformedCompoundTag', sourcePath: entry.sourcePath, token: special.token?.text ?? '', segment });
    }

    // 特典文件不提取集数
    const episode: ExtractedValue | null = special.tag ? null : firstMatch(this.episodePatterns, residual);
    const fileSeason = firstMatch(this.fileSeasonPatterns, residual)?.value;
    const folderSeason = this.matchSubpathSeason(entry.relativeSubpath) ?? context.season;
    const season = fileSeason ?? folderSeason ?? 1;

    const record: EpisodeRecord = {
      confidence: fileSeason !== undefined || episode ? 'filename' : folderSeason !== undefined ? 'foldername' : 'default',
    };
    if (fileSeason !== undefined || folderSeason !== undefined) record.season = season;

    const base = {
      title: context.title,
      season,
      languageTags: language.tags,
      extension: entry.extension,
    };

    if (special.tag) {
      return { metadata: { ...base, isSpecial: true, specialTag: special.tag }, record, warnings };
    }

    if (episode && !this.inSpecialFolder(entry)) {
      record.episode = episode.value;
      return { metadata: { ...base, isSpecial: false, episode: episode.value }, record, warnings };
    }

    // 特典目录中的文件，或者没有集数的文件，都放进 extras
    if (!this.inSpecialFolder(entry)) {
      warnings.push({
        type: 'UnrecognizedPattern',
        sourcePath: entry.sourcePath,
        message: `无法从文件名中识别集数: ${entry.fileName}`,
      });
    }
    return {
      metadata: { ...base, isSpecial: true, specialTag: this.unclassifiedTag(residual) },
      record,
      warnings,
    };
  }

  private inSpecialFolder(entry: RawEntry): boolean {
    return entry.relativeSubpath.some(dir => this.vocabulary.specialFolders.has(dir.toLowerCase()));
  }

  private matchFolderSeason(name: string): number | undefined {
    return firstMatch(this.folderSeasonPatterns, tokenize(name, 'folder'))?.value;
  }

  // 由内向外查找 "Season 2" 这类子目录
  private matchSubpathSeason(subpath: readonly string[]): number | undefined {
    for (let i = subpath.length - 1; i >= 0; i--) {
      const season = this.matchFolderSeason(subpath[i]);
      if (season !== undefined) return season;
    }
    return undefined;
  }

  /**
   * 无法分类的特典：取第一个非格式的括号内容，其次取剩余文本
   */
  private unclassifiedTag(residual: readonly Token[]): SpecialContentTag {
    const bracketed = residual.find(
      token => token.bracket !== null && !EPISODE_RANGE_RE.test(token.text) && !isFormatTag(token.text, true, this.vocabulary),
    );
    const label =
      (bracketed ? cleanName(bracketed.text) : '') ||
      cleanName(residual.filter(token => token.bracket === null).map(token => token.text).join(' ')) ||
      NO_NAME;
    return { kind: 'OTHER', label, compoundWith: [] };
  }
}
