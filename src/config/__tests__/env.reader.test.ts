import { describe, it, expect } from 'vitest';
import { EnvReader } from '../env.reader';

describe('EnvReader', () => {
  describe('float', () => {
    it('parses numeric values', () => {
      expect(new EnvReader({ BTC_DOM_THRESHOLD: '42.5' }).float('BTC_DOM_THRESHOLD', 45)).toBe(42.5);
    });

    it('falls back to the default with a warning for garbage', () => {
      const reader = new EnvReader({ BTC_DOM_THRESHOLD: 'abc' });

      expect(reader.float('BTC_DOM_THRESHOLD', 45)).toBe(45);
      expect(reader.warnings).toEqual(['BTC_DOM_THRESHOLD="abc" is not a number, using 45']);
    });

    it('treats empty and blank values as unset', () => {
      const reader = new EnvReader({ A: '', B: '   ' });

      expect(reader.float('A', 1)).toBe(1);
      expect(reader.float('B', 2)).toBe(2);
      expect(reader.float('MISSING', 3)).toBe(3);
      expect(reader.warnings).toEqual([]);
    });
  });

  describe('int', () => {
    it('accepts signed integers', () => {
      expect(new EnvReader({ N: '+4' }).int('N', 1)).toBe(4);
      expect(new EnvReader({ N: ' 7 ' }).int('N', 1)).toBe(7);
    });

    it('rejects fractional values', () => {
      const reader = new EnvReader({ TRENDS_HITS_REQ: '2.5' });

      expect(reader.int('TRENDS_HITS_REQ', 2)).toBe(2);
      expect(reader.warnings).toEqual(['TRENDS_HITS_REQ="2.5" is not an integer, using 2']);
    });
  });

  describe('list', () => {
    it('splits on commas and drops empty items', () => {
      expect(new EnvReader({ T: ' bitcoin, , NFT ' }).list('T', ['x'])).toEqual(['bitcoin', 'NFT']);
    });

    it('uses the default when nothing is left', () => {
      expect(new EnvReader({ T: ', ,' }).list('T', ['crypto'])).toEqual(['crypto']);
    });
  });

  describe('bool', () => {
    it('understands common spellings', () => {
      const reader = new EnvReader({ A: 'YES', B: 'off', C: '1', D: 'false' });

      expect(reader.bool('A', false)).toBe(true);
      expect(reader.bool('B', true)).toBe(false);
      expect(reader.bool('C', false)).toBe(true);
      expect(reader.bool('D', true)).toBe(false);
    });

    it('falls back for anything else', () => {
      const reader = new EnvReader({ DRY_RUN: 'maybe' });

      expect(reader.bool('DRY_RUN', false)).toBe(false);
      expect(reader.warnings).toEqual(['DRY_RUN="maybe" is not a boolean, using false']);
    });
  });

  it('returns raw strings trimmed', () => {
    expect(new EnvReader({ HISTORY_FILE: ' data/h.json ' }).string('HISTORY_FILE', 'x')).toBe('data/h.json');
  });
});
