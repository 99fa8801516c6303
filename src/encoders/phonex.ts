import { BaseEncoder } from '../encoder.js';
import { cleanLetters } from './soundex-utils.js';

const VOWELS = 'AEIOUY';

export interface PhonexOptions {
  /** Code length, 4 by default. Codes are padded with `0`. */
  maxCodeLength?: number;
}

// Initial pairs and letters rewritten before coding.
const INITIAL_PAIRS: Record<string, string> = { KN: 'N', PH: 'F', WR: 'R' };
const INITIAL_LETTERS: Record<string, string> = {
  E: 'A',
  I: 'A',
  O: 'A',
  U: 'A',
  Y: 'A',
  P: 'B',
  V: 'F',
  K: 'C',
  Q: 'C',
  J: 'G',
  Z: 'S',
};

function preprocess(value: string): string {
  let input = cleanLetters(value).replace(/S+$/, '');

  const pair = INITIAL_PAIRS[input.slice(0, 2)];
  if (pair !== undefined) input = pair + input.slice(2);
  if (input.startsWith('H')) input = input.slice(1);

  const letter = INITIAL_LETTERS[input.slice(0, 1)];
  if (letter !== undefined) input = letter + input.slice(1);

  return input;
}

interface Transcoded {
  code: string;
  skipNext: boolean;
}

function transcode(current: string, next: string | undefined, isLast: boolean): Transcoded {
  const nextIsVowel = next !== undefined && VOWELS.includes(next);
  switch (current) {
    case 'B':
    case 'P':
    case 'F':
    case 'V':
      return { code: '1', skipNext: false };
    case 'C':
    case 'S':
    case 'K':
    case 'G':
    case 'J':
    case 'Q':
    case 'X':
    case 'Z':
      return { code: '2', skipNext: false };
    case 'D':
    case 'T':
      return { code: next === 'C' ? '0' : '3', skipNext: false };
    case 'L':
      return { code: nextIsVowel || isLast ? '4' : '0', skipNext: false };
    case 'M':
    case 'N':
      return { code: '5', skipNext: next === 'D' || next === 'G' };
    case 'R':
      return { code: nextIsVowel || isLast ? '6' : '0', skipNext: false };
    default:
      return { code: '0', skipNext: false };
  }
}

/**
 * Phonex (Lait & Randell, 1996): Soundex and Phonix combined.
 *
 * @example new Phonex().encode('Ashcraft') → 'A261'
 */
export class Phonex extends BaseEncoder {
  readonly name = 'phonex';
  readonly maxCodeLength: number;

  constructor(options: PhonexOptions = {}) {
    super();
    this.maxCodeLength = options.maxCodeLength ?? 4;
  }

  encode(value: string): string {
    const chars = Array.from(preprocess(value));

    let result = '';
    let last = '';
    let i = 0;

    while (i < chars.length && result.length < this.maxCodeLength) {
      const current = chars[i] ?? '';
      const isFirst = i === 0;
      const { code, skipNext } = transcode(current, chars[i + 1], i === chars.length - 1);
      if (skipNext) i++;

      if (isFirst) {
        result += current;
        last = code;
      } else {
        if (code !== last && code !== '0') result += code;
        last = result.slice(-1);
      }
      i++;
    }

    return result.padEnd(this.maxCodeLength, '0');
  }
}
