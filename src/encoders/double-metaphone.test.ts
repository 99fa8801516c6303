import { describe, it, expect } from 'vitest';
import { DoubleMetaphone } from './double-metaphone.js';

describe('DoubleMetaphone', () => {
  const encoder = new DoubleMetaphone();

  it.each([
    ['testing', 'TSTN'],
    ['The', '0'],
    ['quick', 'KK'],
    ['brown', 'PRN'],
    ['fox', 'FKS'],
    ['jumped', 'JMPT'],
    ['over', 'AFR'],
    ['lazy', 'LS'],
    ['dogs', 'TKS'],
    ['MacCafferey', 'MKFR'],
    ['Stephan', 'STFN'],
    ['Kuczewski', 'KSSK'],
    ['McClelland', 'MKLL'],
    ['san jose', 'SNHS'],
    ['xenophobia', 'SNFP'],
    ['Thomas', 'TMS'],
    ['Schmidt', 'XMT'],
  ])('encodes %s as %s', (input, expected) => {
    expect(encoder.encode(input)).toBe(expected);
  });

  it.each([
    ['testing', 'TSTN'],
    ['The', 'T'],
    ['jumped', 'AMPT'],
    ['Kutchefski', 'KXFS'],
    ['Fokker', 'FKR'],
    ['Joqqi', 'AK'],
    ['Hovvi', 'HF'],
    ['Czerny', 'XRN'],
    ['Wasserman', 'FSRM'],
    ['Schmidt', 'SMT'],
  ])('gives %s the alternate code %s', (input, expected) => {
    expect(encoder.encodeAlternate(input)).toBe(expected);
  });

  it('returns both codes at once', () => {
    const result = encoder.doubleMetaphone('Czerny');
    expect(result.primary).toBe('SRN');
    expect(result.alternate).toBe('XRN');
  });

  it('returns empty codes for blank input', () => {
    expect(encoder.encode('')).toBe('');
    expect(encoder.encode(' ')).toBe('');
    expect(encoder.encode('\t\n\r ')).toBe('');
  });

  it('codes c-cedilla and n-tilde', () => {
    expect(encoder.isEncodedEquals('ç', 'S')).toBe(true);
    expect(encoder.isEncodedEquals('ñ', 'N')).toBe(true);
  });

  it.each([
    ['Case', 'case'],
    ['caSe', 'cAsE'],
    ['cookie', 'quick'],
    ['Brian', 'Bryan'],
    ['Auto', 'Otto'],
    ['Steven', 'Stefan'],
    ['Philipowitz', 'Filipowicz'],
  ])('matches %s with %s on both codes', (first, second) => {
    expect(encoder.isDoubleMetaphoneEqual(first, second)).toBe(true);
    expect(encoder.isDoubleMetaphoneEqual(second, first)).toBe(true);
    expect(encoder.isDoubleMetaphoneEqual(first, second, true)).toBe(true);
    expect(encoder.isDoubleMetaphoneEqual(second, first, true)).toBe(true);
  });

  it('matches on the alternate code only when asked', () => {
    expect(encoder.isDoubleMetaphoneEqual('Jablonski', 'Yablonsky', true)).toBe(true);
    expect(encoder.isDoubleMetaphoneEqual('Jablonski', 'Yablonsky')).toBe(false);
  });

  it('tells different names apart', () => {
    expect(encoder.isDoubleMetaphoneEqual('Brain', 'Band')).toBe(false);
    expect(encoder.isDoubleMetaphoneEqual('Band', 'Brain', true)).toBe(false);
  });

  it('treats empty input as equal only to empty input', () => {
    expect(encoder.isDoubleMetaphoneEqual('', '')).toBe(true);
    expect(encoder.isDoubleMetaphoneEqual('', '', true)).toBe(true);
    expect(encoder.isDoubleMetaphoneEqual('aa', '')).toBe(false);
    expect(encoder.isDoubleMetaphoneEqual('', 'aa', true)).toBe(false);
  });

  it('honours the maximum code length', () => {
    expect(encoder.maxCodeLength).toBe(4);
    const short = new DoubleMetaphone({ maxCodeLength: 3 });
    expect(short.encode('jumped')).toBe('JMP');
    expect(short.encodeAlternate('jumped')).toBe('AMP');
  });
});
