import { ANY_LANGUAGE, languageSetFrom, merge, type LanguageSet } from './language-set.js';

/**
 * A phonetic spelling tagged with the languages it is valid for.
 * Phonemes are ordered and compared by text only.
 */
export class Phoneme {
  constructor(
    readonly text: string,
    readonly languages: LanguageSet
  ) {}

  append(text: string): Phoneme {
    return new Phoneme(this.text + text, this.languages);
  }

  /** Same text, languages widened by `other`'s. */
  mergeWithLanguages(other: LanguageSet): Phoneme {
    return new Phoneme(this.text, merge(this.languages, other));
  }

  static join(left: Phoneme, right: Phoneme, languages: LanguageSet): Phoneme {
    return new Phoneme(left.text + right.text, languages);
  }
}

/** Alternatives produced by one rule, in rule-file order. */
export type PhonemeExpr = readonly Phoneme[];

export class PhonemeSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PhonemeSyntaxError';
  }
}

/**
 * Parse the phoneme field of a rule.
 *
 * @example parsePhonemeExpr('s') → [s ANY]
 * @example parsePhonemeExpr('(Z[french]|dZ[english])') → [Z {french}, dZ {english}]
 * @example parsePhonemeExpr('(e|)') → [e ANY, "" ANY]
 */
export function parsePhonemeExpr(expression: string): PhonemeExpr {
  if (!expression.startsWith('(')) {
    return [parsePhoneme(expression)];
  }
  if (!expression.endsWith(')')) {
    throw new PhonemeSyntaxError(`Phoneme list "${expression}" starts with "(" but does not end with ")"`);
  }
  return expression.slice(1, -1).split('|').map(parsePhoneme);
}

function parsePhoneme(phoneme: string): Phoneme {
  const open = phoneme.indexOf('[');
  if (open < 0) {
    return new Phoneme(phoneme, ANY_LANGUAGE);
  }
  if (!phoneme.endsWith(']')) {
    throw new PhonemeSyntaxError(`Phoneme "${phoneme}" has "[" but does not end with "]"`);
  }
  const languages = phoneme.slice(open + 1, -1).split('+');
  return new Phoneme(phoneme.slice(0, open), languageSetFrom(languages.filter((language) => language !== '')));
}
