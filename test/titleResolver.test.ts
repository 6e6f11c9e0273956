import { TitleResolver } from '../src/titleResolver.js';
import { cleanName } from '../src/tokenizer.js';

describe('TitleResolver', () => {
  const resolver = new TitleResolver();

  it('should strip the group and format tags', () => {
    expect(resolver.resolve('[Group] Show [1080p]')).toBe('Show');
    expect(resolver.resolve('[Group] Show [BDRip 1080p HEVC FLAC]')).toBe('Show');
  });

  it('should strip season markers', () => {
    expect(resolver.resolve('[Group] Show Season 2')).toBe('Show');
    expect(resolver.resolve('[Group] Show 2nd Season [1080p]')).toBe('Show');
    expect(resolver.resolve('Tower.of.God.S02.1080p.WEB-DL')).toBe('Tower of God');
    expect(resolver.resolve('[Group] Show 第2期')).toBe('Show');
  });

  it('should only strip language tags inside brackets', () => {
    expect(resolver.resolve('[Group] Jade Dynasty')).toBe('Jade Dynasty');
    expect(resolver.resolve('[Group] Show (JPTC)')).toBe('Show');
  });

  it('should keep round brackets that are not format tags', () => {
    expect(resolver.resolve('[Group] Show (2019) [BDRip 1080p]')).toBe('Show (2019)');
  });

  it('should take the title from a bracket when nothing else remains', () => {
    expect(resolver.resolve('[Nekomoe kissaten][Tower of God][01-12][1080p]')).toBe('Tower of God');
  });

  it('should fall back to the bracket-stripped folder name', () => {
    expect(resolver.resolve('[Show]')).toBe('Show');
    expect(resolver.resolve('[Group][1080p]')).toBe('1080p');
  });

  it('should keep Japanese titles', () => {
    expect(resolver.resolve('[Snow-Raws] ばらかもん')).toBe('ばらかもん');
  });
});

describe('cleanName()', () => {
  it('should remove characters that are not allowed in paths', () => {
    expect(cleanName('Re: Zero / Part?')).toBe('Re Zero Part');
    expect(cleanName('  ..Show..  ')).toBe('Show');
  });
});
