import { BaseEncoder, differenceEncoded, type DifferenceEncoder } from '../encoder.js';
import { cleanLetters, mappedCode } from './soundex-utils.js';

export const US_ENGLISH_REFINED_MAPPING = '01360240043788015936020505';

/**
 * Refined Soundex: the first letter followed by the code of every letter,
 * collapsing runs of the same code. Codes are not truncated.
 *
 * @example new RefinedSoundex().encode('testing') → 'T6036084'
 */
export class RefinedSoundex extends BaseEncoder implements DifferenceEncoder {
  readonly name = 'refined-soundex';

  constructor(private readonly mapping: string = US_ENGLISH_REFINED_MAPPING) {
    super();
  }

  encode(value: string): string {
    const letters = cleanLetters(value);
    const first = letters[0];
    if (first === undefined) return '';

    let code = first;
    let last: string | undefined;
    for (const letter of letters) {
      const current = mappedCode(this.mapping, letter);
      if (current === undefined || current === last) continue;
      code += current;
      last = current;
    }
    return code;
  }

  difference(first: string, second: string): number {
    return differenceEncoded(this.encode(first), this.encode(second));
  }
}
