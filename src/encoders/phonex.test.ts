import { describe, it, expect } from 'vitest';
import { Phonex } from './phonex.js';

describe('Phonex', () => {
  const phonex = new Phonex();

  it.each([
    ['Lee', 'L000'],
    ['Ashcraft', 'A261'],
    ['Kuhne', 'C500'],
    ['Meyer-Lansky', 'M452'],
  ])('encodes %s as %s', (input, expected) => {
    expect(phonex.encode(input)).toBe(expected);
  });

  it('drops trailing S and rewrites initial letters', () => {
    expect(phonex.encode('Knuts')).toBe('N300');
    expect(phonex.encode('Phil')).toBe('F400');
  });

  it('keeps the first letter when it skips the following one', () => {
    expect(phonex.encode('Ngata')).toBe('N300');
  });

  it('pads input without letters to a zero code', () => {
    expect(phonex.encode('')).toBe('0000');
    expect(phonex.encode('SSS')).toBe('0000');
    expect(phonex.encode('sss')).toBe('0000');
  });
});
