/**
 * Types shared by every phonetic encoder.
 */

/**
 * Interface for phonetic encoders: each maps a word or name to a code so
 * that similar-sounding inputs share a code.
 */
export interface Encoder {
  /** Short algorithm name (for debugging/logging) */
  readonly name: string;
  encode(value: string): string;
  /** True when both values encode to the same code. */
  isEncodedEquals(first: string, second: string): boolean;
}

/**
 * Encoders whose codes line up position by position (Soundex family).
 */
export interface DifferenceEncoder extends Encoder {
  /**
   * Number of positions at which the two codes agree, from 0 (no similarity)
   * to the code length (same code).
   */
  difference(first: string, second: string): number;
}

export abstract class BaseEncoder implements Encoder {
  abstract readonly name: string;

  abstract encode(value: string): string;

  isEncodedEquals(first: string, second: string): boolean {
    return this.encode(first) === this.encode(second);
  }
}

/**
 * Count of equal characters at equal positions; 0 when either code is empty.
 *
 * @example differenceEncoded('R163', 'R150') → 2
 */
export function differenceEncoded(first: string, second: string): number {
  const length = Math.min(first.length, second.length);
  let matches = 0;
  for (let i = 0; i < length; i++) {
    if (first[i] === second[i]) matches++;
  }
  return matches;
}
