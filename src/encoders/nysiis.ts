import { BaseEncoder } from '../encoder.js';
import { cleanLetters } from './soundex-utils.js';

const STRICT_LENGTH = 6;

const PREFIX_RULES: readonly [RegExp, string][] = [
  [/^MAC/, 'MCC'],
  [/^KN/, 'NN'],
  [/^K/, 'C'],
  [/^(PH|PF)/, 'FF'],
  [/^SCH/, 'SSS'],
];

const SUFFIX_RULES: readonly [RegExp, string][] = [
  [/(EE|IE)$/, 'Y'],
  [/(DT|RT|RD|NT|ND)$/, 'D'],
];

const isVowel = (char: string): boolean => 'AEIOU'.includes(char) && char.length === 1;

/**
 * Replacement for `current` given its neighbours; may be longer than one
 * character, in which case it overwrites the following characters too.
 */
function transcode(previous: string, current: string, next: string, afterNext: string): string {
  if (current === 'E' && next === 'V') return 'AF';
  if (isVowel(current)) return 'A';
  switch (current) {
    case 'Q':
      return 'G';
    case 'Z':
      return 'S';
    case 'M':
      return 'N';
    case 'K':
      return next === 'N' ? 'NN' : 'C';
  }
  if (current === 'S' && next === 'C' && afterNext === 'H') return 'SSS';
  if (current === 'P' && next === 'H') return 'FF';
  if (current === 'H' && (!isVowel(previous) || !isVowel(next))) return previous;
  if (current === 'W' && isVowel(previous)) return previous;
  return current;
}

export interface NysiisOptions {
  /** Truncate codes to six characters (default true). */
  strict?: boolean;
}

/**
 * New York State Identification and Intelligence System phonetic code.
 *
 * @example new Nysiis().encode('Brown') → 'BRAN'
 */
export class Nysiis extends BaseEncoder {
  readonly name = 'nysiis';
  readonly strict: boolean;

  constructor(options: NysiisOptions = {}) {
    super();
    this.strict = options.strict ?? true;
  }

  encode(value: string): string {
    let text = cleanLetters(value);
    if (text.length === 0) return '';

    for (const [pattern, replacement] of [...PREFIX_RULES, ...SUFFIX_RULES]) {
      text = text.replace(pattern, replacement);
    }

    const chars = Array.from(text);
    let key = chars[0] ?? '';

    for (let i = 1; i < chars.length; i++) {
      const transcoded = transcode(chars[i - 1] ?? '', chars[i] ?? '', chars[i + 1] ?? ' ', chars[i + 2] ?? ' ');
      Array.from(transcoded).forEach((char, offset) => {
        if (i + offset < chars.length) chars[i + offset] = char;
      });
      if (chars[i] !== chars[i - 1]) key += chars[i];
    }

    key = trimEnding(key);
    return this.strict ? key.slice(0, STRICT_LENGTH) : key;
  }
}

/** Drop a final S, turn a final AY into Y, then drop a final A. */
function trimEnding(key: string): string {
  if (key.length <= 1) return key;

  let result = key.endsWith('S') ? key.slice(0, -1) : key;
  if (result.length > 2 && result.endsWith('AY')) {
    result = `${result.slice(0, -2)}Y`;
  }
  if (result.endsWith('A')) {
    result = result.slice(0, -1);
  }
  return result;
}
