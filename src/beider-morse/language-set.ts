/**
 * Sets of languages a phoneme (or a guessed name) may belong to.
 *
 * `any` is the top of the lattice, `none` the bottom. A concrete set is never
 * empty: `languageSetFrom([])` yields `NO_LANGUAGES`.
 */
export type LanguageSet =
  | { readonly kind: 'any' }
  | { readonly kind: 'none' }
  | { readonly kind: 'some'; readonly languages: readonly string[] };

export const ANY_LANGUAGE: LanguageSet = Object.freeze({ kind: 'any' });

export const NO_LANGUAGES: LanguageSet = Object.freeze({ kind: 'none' });

/** Build a set from language names; members are kept sorted and unique. */
export function languageSetFrom(languages: Iterable<string>): LanguageSet {
  const sorted = [...new Set(languages)].sort(compareText);
  if (sorted.length === 0) return NO_LANGUAGES;
  return Object.freeze({ kind: 'some', languages: Object.freeze(sorted) });
}

/**
 * Intersection. `any` is the identity, `none` absorbs.
 *
 * @example restrictTo(ANY_LANGUAGE, {french}) → {french}
 * @example restrictTo({english}, {french}) → NO_LANGUAGES
 */
export function restrictTo(self: LanguageSet, other: LanguageSet): LanguageSet {
  if (self.kind === 'none' || other.kind === 'any') return self;
  if (other.kind === 'none' || self.kind === 'any') return other;
  const otherMembers = new Set(other.languages);
  return languageSetFrom(self.languages.filter((language) => otherMembers.has(language)));
}

/** Union. `any` absorbs, `none` is the identity. */
export function merge(self: LanguageSet, other: LanguageSet): LanguageSet {
  if (self.kind === 'any' || other.kind === 'none') return self;
  if (other.kind === 'any' || self.kind === 'none') return other;
  return languageSetFrom([...self.languages, ...other.languages]);
}

export function isEmpty(set: LanguageSet): boolean {
  return set.kind === 'none' || (set.kind === 'some' && set.languages.length === 0);
}

export function isSingleton(set: LanguageSet): boolean {
  return set.kind === 'some' && set.languages.length === 1;
}

/** First member in sorted order, or undefined for `any` and `none`. */
export function anyLanguage(set: LanguageSet): string | undefined {
  return set.kind === 'some' ? set.languages[0] : undefined;
}

export function languageSetsEqual(a: LanguageSet, b: LanguageSet): boolean {
  if (a.kind !== 'some' || b.kind !== 'some') return a.kind === b.kind;
  return a.languages.length === b.languages.length && a.languages.every((language, i) => language === b.languages[i]);
}

export function formatLanguageSet(set: LanguageSet): string {
  switch (set.kind) {
    case 'any':
      return 'ANY_LANGUAGE';
    case 'none':
      return 'NO_LANGUAGES';
    case 'some':
      return set.languages.join(',');
  }
}

/** Code-unit ordering used for languages and phoneme texts alike. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
