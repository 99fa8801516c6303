import { UnknownNameTypeError } from '../errors.js';

/**
 * Families of names the Beider-Morse rules are written for. The values are
 * the tokens used in rule resource names (`gen_rules_any`, `ash_lang`, ...).
 */
export const NameType = {
  Ashkenazi: 'ash',
  Generic: 'gen',
  Sephardic: 'sep',
} as const;

export type NameType = (typeof NameType)[keyof typeof NameType];

export const NAME_TYPES: readonly NameType[] = [NameType.Ashkenazi, NameType.Generic, NameType.Sephardic];

export function isNameType(value: string): value is NameType {
  return NAME_TYPES.some((nameType) => nameType === value);
}

/**
 * Parse a name type token coming from configuration.
 *
 * @example parseNameType('gen') → 'gen'
 * @example parseNameType('GEN') → throws UnknownNameTypeError
 */
export function parseNameType(value: string): NameType {
  if (!isNameType(value)) {
    throw new UnknownNameTypeError(value);
  }
  return value;
}
