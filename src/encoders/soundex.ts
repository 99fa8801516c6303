import { BaseEncoder, differenceEncoded, type DifferenceEncoder } from '../encoder.js';
import { InvalidOptionsError } from '../errors.js';
import { cleanLetters, mappedCode } from './soundex-utils.js';

/** Letter codes for A–Z as published by the US census. */
export const US_ENGLISH_MAPPING = '01230120022455012623010202';

/** Variant for genealogy: vowels and H, W, Y are silent (`-`). */
export const US_ENGLISH_GENEALOGY_MAPPING = '-123-12--22455-12623-1-2-2';

const SILENT = '-';
const CODE_LENGTH = 4;

export interface SoundexOptions {
  /** 26 characters, one per letter A–Z; `-` marks a silent letter. */
  mapping?: string;
  /**
   * Skip H and W between consonants with the same code. Defaults to true
   * unless the mapping has silent letters.
   */
  specialCaseHW?: boolean;
}

/**
 * Soundex: the first letter followed by three digits.
 *
 * @example new Soundex().encode('Robert') → 'R163'
 */
export class Soundex extends BaseEncoder implements DifferenceEncoder {
  readonly name = 'soundex';
  private readonly mapping: string;
  private readonly specialCaseHW: boolean;

  constructor(options: SoundexOptions = {}) {
    super();
    this.mapping = options.mapping ?? US_ENGLISH_MAPPING;
    if (this.mapping.length !== 26) {
      throw new InvalidOptionsError(`Soundex mapping must have 26 characters, got ${this.mapping.length}`);
    }
    this.specialCaseHW = options.specialCaseHW ?? !this.mapping.includes(SILENT);
  }

  encode(value: string): string {
    const letters = cleanLetters(value);
    const first = letters[0];
    if (first === undefined) return '';

    let code = first;
    let lastDigit = mappedCode(this.mapping, first);

    for (const letter of letters.slice(1)) {
      if (code.length >= CODE_LENGTH) break;
      if (this.specialCaseHW && (letter === 'H' || letter === 'W')) continue;

      const digit = mappedCode(this.mapping, letter);
      if (digit === undefined || digit === SILENT) continue;
      if (digit !== '0' && digit !== lastDigit) code += digit;
      lastDigit = digit;
    }

    return code.padEnd(CODE_LENGTH, '0');
  }

  difference(first: string, second: string): number {
    return differenceEncoded(this.encode(first), this.encode(second));
  }
}
