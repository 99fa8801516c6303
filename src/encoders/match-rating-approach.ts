import { BaseEncoder } from '../encoder.js';

const TRIMMED = /[-&'.,]|\s/gu;
const DIACRITICS = /\p{M}/gu;
const VOWELS = /[AEIOU]/g;
const DOUBLE_CONSONANT = /([BCDFGHJKLMNPQRSTVWXYZ])\1/g;

/** Upper-case, drop punctuation and whitespace, strip accents. */
function cleanName(value: string): string {
  return value.toUpperCase().replace(TRIMMED, '').normalize('NFD').replace(DIACRITICS, '');
}

/** Drop vowels except a leading one. */
function removeVowels(name: string): string {
  return name.slice(0, 1) + name.slice(1).replace(VOWELS, '');
}

function removeDoubleConsonants(name: string): string {
  return name.replace(DOUBLE_CONSONANT, '$1');
}

function firstThreeLastThree(name: string): string {
  return name.length > 6 ? name.slice(0, 3) + name.slice(-3) : name;
}

/** Minimum similarity rating required for a combined code length. */
export function minimumRating(sumLength: number): number {
  if (sumLength <= 4) return 5;
  if (sumLength <= 7) return 4;
  if (sumLength <= 11) return 3;
  if (sumLength === 12) return 2;
  return 1;
}

/**
 * Cancels characters that agree position by position, from the front and
 * from the back, and rates what is left of the longer code.
 */
export function similarityRating(first: string, second: string): number {
  const a = Array.from(first);
  const b = Array.from(second);
  const lastA = a.length - 1;
  const lastB = b.length - 1;

  for (let i = 0; i < a.length && i <= lastB; i++) {
    const endA = a[lastA - i];
    const endB = b[lastB - i];
    if (a[i] === b[i]) {
      a[i] = ' ';
      b[i] = ' ';
    }
    if (endA === endB) {
      a[lastA - i] = ' ';
      b[lastB - i] = ' ';
    }
  }

  const remainingA = a.filter((char) => char !== ' ').length;
  const remainingB = b.filter((char) => char !== ' ').length;
  return Math.abs(6 - Math.max(remainingA, remainingB));
}

const isTooShort = (value: string): boolean => value.trim().length <= 1;

/**
 * Match Rating Approach (Western Airlines, 1977). Codes are compared with a
 * similarity rating rather than plain equality.
 *
 * @example new MatchRatingApproach().encode('Harper') → 'HRPR'
 */
export class MatchRatingApproach extends BaseEncoder {
  readonly name = 'match-rating-approach';

  encode(value: string): string {
    if (isTooShort(value)) return '';
    return firstThreeLastThree(removeDoubleConsonants(removeVowels(cleanName(value))));
  }

  isEncodedEquals(first: string, second: string): boolean {
    if (isTooShort(first) || isTooShort(second)) return false;
    if (first.toUpperCase() === second.toUpperCase()) return true;

    const codeA = this.encode(first);
    const codeB = this.encode(second);
    if (Math.abs(codeA.length - codeB.length) >= 3) return false;

    return similarityRating(codeA, codeB) >= minimumRating(codeA.length + codeB.length);
  }
}
