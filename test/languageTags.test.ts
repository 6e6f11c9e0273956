import { LanguageTagClassifier } from '../src/languageTags.js';
import { tokenize } from '../src/tokenizer.js';
import { DEFAULT_VOCABULARY } from '../src/vocabulary.js';

describe('LanguageTagClassifier', () => {
  const classifier = new LanguageTagClassifier();

  describe('match()', () => {
    it('should keep hyphenated codes as written', () => {
      expect(classifier.match('zh-TW')).toEqual({ raw: 'zh-TW', normalized: 'zh-TW' });
      expect(classifier.match('zh-Hant')).toEqual({ raw: 'zh-Hant', normalized: 'zh-Hant' });
      expect(classifier.match('ZH-tw')).toEqual({ raw: 'ZH-tw', normalized: 'ZH-tw' });
    });

    it('should upper-case compact codes', () => {
      expect(classifier.match('JPTC')).toEqual({ raw: 'JPTC', normalized: 'JPTC' });
      expect(classifier.match('encn')).toEqual({ raw: 'encn', normalized: 'ENCN' });
    });

    it('should reject ordinary words', () => {
      expect(classifier.match('Love')).toBeNull();
      expect(classifier.match('Erai-raws')).toBeNull();
      expect(classifier.match('No-Name')).toBeNull();
      expect(classifier.match('S01E01')).toBeNull();
    });
  });

  describe('classify()', () => {
    it('should collect tags in appearance order', () => {
      const tokens = tokenize('[Group] Show S01E01.zh-TW.JPSC', 'file');
      const result = classifier.classify(tokens, new Set([0]));
      expect(result.tags).toEqual([
        { raw: 'zh-TW', normalized: 'zh-TW' },
        { raw: 'JPSC', normalized: 'JPSC' },
      ]);
      expect([...result.positions]).toEqual([3, 4]);
    });

    it('should skip excluded positions', () => {
      const result = classifier.classify(tokenize('[JPTC]', 'file'), new Set([0]));
      expect(result.tags).toEqual([]);
    });

    it('should only take tags from the end of the name', () => {
      expect(classifier.classify(tokenize('[Group] Jade Dynasty [05]', 'file'), new Set([0])).tags).toEqual([]);
      const result = classifier.classify(tokenize('[Group] Deus Ex Machina - 03.zh-TW', 'file'), new Set([0]));
      expect(result.tags).toEqual([{ raw: 'zh-TW', normalized: 'zh-TW' }]);
      expect([...result.positions]).toEqual([5]);
    });
  });

  it('should use an injected vocabulary', () => {
    const narrow = new LanguageTagClassifier({ ...DEFAULT_VOCABULARY, compactCodes: new Set(['JP']) });
    expect(narrow.match('JPTC')).toBeNull();
    expect(narrow.match('JPJP')).toEqual({ raw: 'JPJP', normalized: 'JPJP' });
  });
});
