import { describe, it, expect } from 'vitest';
import { Metaphone } from './metaphone.js';

describe('Metaphone', () => {
  const metaphone = new Metaphone();

  it.each([
    ['howl', 'HL'],
    ['testing', 'TSTN'],
    ['The', '0'],
    ['quick', 'KK'],
    ['brown', 'BRN'],
    ['fox', 'FKS'],
    ['jumped', 'JMPT'],
    ['over', 'OFR'],
    ['lazy', 'LS'],
    ['dogs', 'TKS'],
  ])('encodes %s as %s', (input, expected) => {
    expect(metaphone.encode(input)).toBe(expected);
  });

  it('handles silent and irregular initials', () => {
    expect(metaphone.encode('WHY')).toBe('');
    expect(metaphone.encode('SCHEDULE')).toBe('SKTL');
    expect(metaphone.encode('CIAPO')).toBe('XP');
    expect(metaphone.encode('SCIENCE')).toBe('SNS');
  });

  it('returns short input upper-cased', () => {
    expect(metaphone.encode('')).toBe('');
    expect(metaphone.encode('a')).toBe('A');
  });

  it('honours the maximum code length', () => {
    expect(new Metaphone({ maxCodeLength: 2 }).encode('testing')).toBe('TS');
  });
});
