import { findGroupTag, renderToken, stripExtension, tokenize } from '../src/tokenizer.js';

describe('tokenize()', () => {
  it('should keep bracket contents as single tokens in order', () => {
    expect(tokenize('[Group] Show [05] [1080p]', 'file')).toEqual([
      { text: 'Group', sourceField: 'file', position: 0, bracket: 'square' },
      { text: 'Show', sourceField: 'file', position: 1, bracket: null },
      { text: '05', sourceField: 'file', position: 2, bracket: 'square' },
      { text: '1080p', sourceField: 'file', position: 3, bracket: 'square' },
    ]);
  });

  it('should split dot-separated names', () => {
    expect(tokenize('Tower.of.God.S02E23', 'file').map(t => t.text)).toEqual(['Tower', 'of', 'God', 'S02E23']);
  });

  it('should drop standalone dashes but keep hyphenated words', () => {
    expect(tokenize('[Erai-raws] Series - NCED1', 'file').map(t => t.text)).toEqual(['Erai-raws', 'Series', 'NCED1']);
  });

  it('should recognize round and lenticular brackets', () => {
    const tokens = tokenize('【字幕组】 Title (2019) [01-12]', 'folder');
    expect(tokens.map(t => [t.text, t.bracket])).toEqual([
      ['字幕组', 'lenticular'],
      ['Title', null],
      ['2019', 'round'],
      ['01-12', 'square'],
    ]);
    expect(tokens.every(t => t.sourceField === 'folder')).toBe(true);
  });

  it('should not split inside brackets', () => {
    expect(tokenize('[BDRip 1080p HEVC]', 'folder')[0].text).toBe('BDRip 1080p HEVC');
  });

  it('should treat an unclosed bracket as text', () => {
    expect(tokenize('Show [05', 'file').map(t => t.text)).toEqual(['Show', '[05']);
  });

  it('should separate language suffixes after a bracket', () => {
    expect(tokenize('[Group] Show [03].JPTC.zh-Hant', 'file').map(t => t.text)).toEqual([
      'Group',
      'Show',
      '03',
      'JPTC',
      'zh-Hant',
    ]);
  });
});

describe('findGroupTag()', () => {
  it('should return the leading bracket token', () => {
    expect(findGroupTag(tokenize('[Group] Show', 'folder'))?.text).toBe('Group');
  });

  it('should return null when the name does not start with a bracket', () => {
    expect(findGroupTag(tokenize('Show [Group]', 'folder'))).toBeNull();
  });
});

describe('helpers', () => {
  it('should render tokens with their original brackets', () => {
    const tokens = tokenize('Show (2019) [x] 【y】', 'folder');
    expect(tokens.map(renderToken)).toEqual(['Show', '(2019)', '[x]', '【y】']);
  });

  it('should strip only the given extension', () => {
    expect(stripExtension('Show S01E01.zh-TW.ass', 'ass')).toBe('Show S01E01.zh-TW');
    expect(stripExtension('README', '')).toBe('README');
  });
});
