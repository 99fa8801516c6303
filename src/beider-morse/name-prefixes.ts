import { NameType } from './name-type.js';

/** Nobiliary particles, per name type. */
export type NamePrefixes = Readonly<Record<NameType, readonly string[]>>;

export const DEFAULT_NAME_PREFIXES: NamePrefixes = Object.freeze({
  [NameType.Ashkenazi]: Object.freeze(['bar', 'ben', 'da', 'de', 'van', 'von']),
  [NameType.Sephardic]: Object.freeze([
    'al', 'el', 'da', 'dal', 'de', 'del', 'dela', 'de la', 'della', 'des', 'di', 'do', 'dos', 'du', 'van', 'von',
  ]),
  [NameType.Generic]: Object.freeze([
    'da', 'dal', 'de', 'del', 'dela', 'de la', 'della', 'des', 'di', 'do', 'dos', 'du', 'van', 'von',
  ]),
});
