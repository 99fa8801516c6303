import { describe, it, expect } from 'vitest';
import { Caverphone1, Caverphone2 } from './caverphone.js';

describe('Caverphone1', () => {
  const caverphone = new Caverphone1();

  it.each([
    ['David', 'TFT111'],
    ['Whittle', 'WTL111'],
    ['Lee', 'L11111'],
    ['Thompson', 'TMPSN1'],
    ['mbmb', 'MPM111'],
  ])('encodes %s as %s', (input, expected) => {
    expect(caverphone.encode(input)).toBe(expected);
  });
});

describe('Caverphone2', () => {
  const caverphone = new Caverphone2();

  it.each([
    ['Peter', 'PTA1111111'],
    ['ready', 'RTA1111111'],
    ['social', 'SSA1111111'],
    ['able', 'APA1111111'],
    ['Tedder', 'TTA1111111'],
    ['Karleen', 'KLN1111111'],
    ['Dyun', 'TN11111111'],
    ['Stevenson', 'STFNSN1111'],
    ['mb', 'M111111111'],
  ])('encodes %s as %s', (input, expected) => {
    expect(caverphone.encode(input)).toBe(expected);
  });

  it('matches names sharing a code', () => {
    expect(caverphone.isEncodedEquals('Peter', 'ready')).toBe(false);
    expect(caverphone.isEncodedEquals('Peter', 'peter')).toBe(true);
  });
});
