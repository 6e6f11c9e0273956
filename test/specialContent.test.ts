import { SpecialContentClassifier, renderSpecialName } from '../src/specialContent.js';
import { tokenize } from '../src/tokenizer.js';

describe('SpecialContentClassifier', () => {
  const classifier = new SpecialContentClassifier();

  describe('parse()', () => {
    it('should parse a simple marker with an index', () => {
      expect(classifier.parse('NCED1', false)).toEqual({
        tags: [{ kind: 'NCED', index: 1, label: 'NCED1', compoundWith: [] }],
        malformed: [],
      });
    });

    it('should give NCOP1&2 two NCOP entries with their own indices', () => {
      expect(classifier.parse('NCOP1&2', false)?.tags).toEqual([
        { kind: 'NCOP', index: 1, label: 'NCOP1', compoundWith: [] },
        { kind: 'NCOP', index: 2, label: '2', compoundWith: [] },
      ]);
    });

    it('should expand CM1&2&3 into three CM entries', () => {
      const tags = classifier.parse('CM1&2&3', false)?.tags ?? [];
      expect(tags.map(t => [t.kind, t.index])).toEqual([
        ['CM', 1],
        ['CM', 2],
        ['CM', 3],
      ]);
    });

    it('should take a missing index from the next segment that has one', () => {
      expect(classifier.parse('PV&CM4', false)?.tags).toEqual([
        { kind: 'PV', index: 4, label: 'PV', compoundWith: [] },
        { kind: 'CM', index: 4, label: 'CM4', compoundWith: [] },
      ]);
    });

    it('should leave indices unset when no segment has one', () => {
      expect(classifier.parse('OP&ED', false)?.tags).toEqual([
        { kind: 'OP', label: 'OP', compoundWith: [] },
        { kind: 'ED', label: 'ED', compoundWith: [] },
      ]);
    });

    it('should take the kind from the last segment when only it carries one', () => {
      expect(classifier.parse('1&ED2', false)?.tags.map(t => [t.kind, t.index])).toEqual([
        ['ED', 1],
        ['ED', 2],
      ]);
    });

    it('should ignore a leading episode ordinal', () => {
      expect(classifier.parse('第十三话ED', false)?.tags).toEqual([{ kind: 'ED', label: 'ED', compoundWith: [] }]);
    });

    it('should recognize Japanese extras markers', () => {
      expect(classifier.parse('映像特典', false)?.tags).toEqual([{ kind: 'SP', label: '映像特典', compoundWith: [] }]);
    });

    it('should only accept mixed-case markers inside brackets', () => {
      expect(classifier.parse('Menu', false)).toBeNull();
      expect(classifier.parse('Menu01', true)?.tags).toEqual([{ kind: 'MENU', index: 1, label: 'MENU01', compoundWith: [] }]);
    });

    it('should classify unknown segments as OTHER', () => {
      expect(classifier.parse('OP&XYZ', false)).toEqual({
        tags: [
          { kind: 'OP', label: 'OP', compoundWith: [] },
          { kind: 'OTHER', label: 'XYZ', compoundWith: [] },
        ],
        malformed: ['XYZ'],
      });
    });

    it('should keep the index digits as written', () => {
      expect(classifier.parse('SP01', true)?.tags).toEqual([{ kind: 'SP', index: 1, label: 'SP01', compoundWith: [] }]);
    });

    it('should remove characters that are not allowed in paths from labels', () => {
      expect(classifier.parse('OP&What?', false)).toEqual({
        tags: [
          { kind: 'OP', label: 'OP', compoundWith: [] },
          { kind: 'OTHER', label: 'What', compoundWith: [] },
        ],
        malformed: ['What?'],
      });
    });

    it('should return null for tokens without markers', () => {
      expect(classifier.parse('Series', false)).toBeNull();
      expect(classifier.parse('01', true)).toBeNull();
      expect(classifier.parse('1080p', true)).toBeNull();
      expect(classifier.parse('第08話', false)).toBeNull();
    });
  });

  describe('classify()', () => {
    it('should attach the remaining segments as compound members', () => {
      const result = classifier.classify(tokenize('[Group] Series - PV&CM', 'file'), new Set([0]));
      expect(result.tag).toEqual({
        kind: 'PV',
        label: 'PV',
        compoundWith: [{ kind: 'CM', label: 'CM', compoundWith: [] }],
      });
      expect([...result.positions]).toEqual([2]);
      expect(result.tag && renderSpecialName(result.tag)).toBe('PV&CM');
    });

    it('should report nothing for a regular episode', () => {
      const result = classifier.classify(tokenize('[Group] Show [05] [1080p]', 'file'), new Set([0]));
      expect(result.tag).toBeUndefined();
      expect(result.positions.size).toBe(0);
    });
  });

  it('should reproduce the joined form of compound tags', () => {
    const tags = classifier.parse('NCOP1&2', false)?.tags ?? [];
    const [primary, ...rest] = tags;
    expect(renderSpecialName({ ...primary, compoundWith: rest })).toBe('NCOP1&2');
  });
});
