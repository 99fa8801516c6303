/**
 * Helpers shared by the Soundex-family encoders.
 */

const LETTER = /\p{L}/u;

/**
 * Keep letters only, upper-cased.
 *
 * @example cleanLetters("O'Brien-Smith") → "OBRIENSMITH"
 */
export function cleanLetters(value: string): string {
  return Array.from(value)
    .filter((char) => LETTER.test(char))
    .join('')
    .toUpperCase();
}

/**
 * Code of an upper-case A–Z letter in a 26-character mapping, or undefined
 * for any other character.
 */
export function mappedCode(mapping: string, letter: string): string | undefined {
  const index = letter.charCodeAt(0) - 65;
  if (letter.length !== 1 || index < 0 || index >= 26) return undefined;
  return mapping[index];
}
