import { describe, it, expect } from 'vitest';
import { RefinedSoundex } from './refined-soundex.js';

describe('RefinedSoundex', () => {
  const refined = new RefinedSoundex();

  it.each([
    ['testing', 'T6036084'],
    ['The', 'T60'],
    ['quick', 'Q503'],
    ['brown', 'B1908'],
    ['fox', 'F205'],
    ['jumped', 'J408106'],
    ['over', 'O0209'],
    ['lazy', 'L7050'],
    ['dogs', 'D6043'],
  ])('encodes %s as %s', (input, expected) => {
    expect(refined.encode(input)).toBe(expected);
  });

  it('counts matching code positions', () => {
    expect(refined.difference('dogs', 'dogs')).toBe(5);
    expect(refined.difference('', 'dogs')).toBe(0);
  });
});
