import { BaseEncoder } from '../encoder.js';

const VOWELS = 'AEIOU';
const FRONT_VOWELS = 'EIY';
const VARSON = 'CSPTG';

export interface MetaphoneOptions {
  /** Maximum code length, 4 by default. */
  maxCodeLength?: number;
}

/**
 * Metaphone (Lawrence Philips, 1990) for English words.
 *
 * @example new Metaphone().encode('testing') → 'TSTN'
 */
export class Metaphone extends BaseEncoder {
  readonly name = 'metaphone';
  readonly maxCodeLength: number;

  constructor(options: MetaphoneOptions = {}) {
    super();
    this.maxCodeLength = options.maxCodeLength ?? 4;
  }

  encode(value: string): string {
    if (value.length === 0) return '';
    const upper = value.toUpperCase();
    if (value.length === 1) return upper;

    const word = fixInitials(upper);
    const length = word.length;
    const charAt = (index: number): string => word[index] ?? '';
    const isVowel = (index: number): boolean => index >= 0 && index < length && VOWELS.includes(charAt(index));
    const isFrontVowel = (index: number): boolean =>
      index >= 0 && index < length && FRONT_VOWELS.includes(charAt(index));
    const isPrevious = (index: number, char: string): boolean => index > 0 && charAt(index - 1) === char;
    const isNext = (index: number, char: string): boolean => index + 1 < length && charAt(index + 1) === char;
    const isLast = (index: number): boolean => index + 1 === length;
    const regionMatch = (index: number, test: string): boolean => word.startsWith(test, index);

    let code = '';
    let n = 0;

    while (code.length < this.maxCodeLength && n < length) {
      const symbol = charAt(n);

      // Drop repeated letters except C.
      if (symbol !== 'C' && isPrevious(n, symbol)) {
        n++;
        continue;
      }

      switch (symbol) {
        case 'A':
        case 'E':
        case 'I':
        case 'O':
        case 'U':
          if (n === 0) code += symbol;
          break;
        case 'B':
          // silent in a final MB
          if (!(isPrevious(n, 'M') && isLast(n))) code += 'B';
          break;
        case 'C':
          if (isPrevious(n, 'S') && !isLast(n) && isFrontVowel(n + 1)) break;
          if (regionMatch(n, 'CIA')) {
            code += 'X';
          } else if (!isLast(n) && isFrontVowel(n + 1)) {
            code += 'S';
          } else if (isPrevious(n, 'S') && isNext(n, 'H')) {
            code += 'K';
          } else if (isNext(n, 'H')) {
            code += n === 0 && length >= 3 && isVowel(2) ? 'K' : 'X';
          } else {
            code += 'K';
          }
          break;
        case 'D':
          if (!isLast(n + 1) && isNext(n, 'G') && isFrontVowel(n + 2)) {
            code += 'J';
            n += 2;
          } else {
            code += 'T';
          }
          break;
        case 'G':
          if (isLast(n + 1) && isNext(n, 'H')) break;
          if (!isLast(n + 1) && isNext(n, 'H') && !isVowel(n + 2)) break;
          if (n > 0 && (regionMatch(n, 'GN') || regionMatch(n, 'GNED'))) break;
          code += !isLast(n) && isFrontVowel(n + 1) && !isPrevious(n, 'G') ? 'J' : 'K';
          break;
        case 'H':
          if (isLast(n)) break;
          if (n > 0 && VARSON.includes(charAt(n - 1))) break;
          if (isVowel(n + 1)) code += 'H';
          break;
        case 'F':
        case 'J':
        case 'L':
        case 'M':
        case 'N':
        case 'R':
          code += symbol;
          break;
        case 'K':
          if (n === 0 || !isPrevious(n, 'C')) code += 'K';
          break;
        case 'P':
          code += isNext(n, 'H') ? 'F' : 'P';
          break;
        case 'Q':
          code += 'K';
          break;
        case 'S':
          code += regionMatch(n, 'SH') || regionMatch(n, 'SIO') || regionMatch(n, 'SIA') ? 'X' : 'S';
          break;
        case 'T':
          if (regionMatch(n, 'TIA') || regionMatch(n, 'TIO')) {
            code += 'X';
          } else if (!regionMatch(n, 'TCH')) {
            code += regionMatch(n, 'TH') ? '0' : 'T';
          }
          break;
        case 'V':
          code += 'F';
          break;
        case 'W':
        case 'Y':
          if (!isLast(n) && isVowel(n + 1)) code += symbol;
          break;
        case 'X':
          code += 'KS';
          break;
        case 'Z':
          code += 'S';
          break;
        default:
          break;
      }
      n++;
    }

    return code.slice(0, this.maxCodeLength);
  }
}

/** Rewrite the silent or irregular initial letter pairs: KN, GN, PN, AE, WR, WH, X. */
function fixInitials(word: string): string {
  const [first, second] = word;
  switch (first) {
    case 'K':
    case 'G':
    case 'P':
      return second === 'N' ? word.slice(1) : word;
    case 'A':
      return second === 'E' ? word.slice(1) : word;
    case 'W':
      if (second === 'R') return word.slice(1);
      if (second === 'H') return `W${word.slice(2)}`;
      return word;
    case 'X':
      return `S${word.slice(1)}`;
    default:
      return word;
  }
}
