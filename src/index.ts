/**
 * Phonetic encoders for fuzzy name matching.
 */

export type { Encoder, DifferenceEncoder } from './encoder.js';
export { BaseEncoder, differenceEncoded } from './encoder.js';
export * from './errors.js';
export {
  DEFAULT_MAX_PHONEMES,
  EngineOptionsSchema,
  EnvConfigSchema,
  getPhoneticConfig,
  loadPhoneticEnv,
  parseEngineOptions,
  type EngineOptions,
  type EngineOptionsInput,
  type PhoneticConfig,
} from './config.js';
export { createLogger, getLogLevel, setLogLevel, type LogLevel, type Logger } from './logger.js';

// Beider-Morse
export { BeiderMorseEncoder } from './beider-morse/beider-morse-encoder.js';
export { ConfigFiles, type ConfigFilesOptions } from './beider-morse/config-files.js';
export { PhoneticEngine } from './beider-morse/engine.js';
export { Lang, type LangRule } from './beider-morse/lang.js';
export {
  ANY_LANGUAGE,
  NO_LANGUAGES,
  formatLanguageSet,
  languageSetFrom,
  merge,
  restrictTo,
  type LanguageSet,
} from './beider-morse/language-set.js';
export { DEFAULT_NAME_PREFIXES, type NamePrefixes } from './beider-morse/name-prefixes.js';
export { NameType, NAME_TYPES, parseNameType } from './beider-morse/name-type.js';
export { DirectoryResolver, InMemoryResolver, type RuleResourceResolver } from './beider-morse/resources.js';
export { RuleType, RULE_TYPES } from './beider-morse/rule-type.js';

// Sibling encoders
export { Caverphone1, Caverphone2 } from './encoders/caverphone.js';
export { ColognePhonetic } from './encoders/cologne-phonetic.js';
export { DoubleMetaphone, DoubleMetaphoneResult, type DoubleMetaphoneOptions } from './encoders/double-metaphone.js';
export { DaitchMokotoffSoundex, DM_RULES_RESOURCE, type DaitchMokotoffOptions } from './encoders/daitch-mokotoff.js';
export { MatchRatingApproach } from './encoders/match-rating-approach.js';
export { Metaphone, type MetaphoneOptions } from './encoders/metaphone.js';
export { Nysiis, type NysiisOptions } from './encoders/nysiis.js';
export { Phonex, type PhonexOptions } from './encoders/phonex.js';
export { RefinedSoundex, US_ENGLISH_REFINED_MAPPING } from './encoders/refined-soundex.js';
export { Soundex, US_ENGLISH_GENEALOGY_MAPPING, US_ENGLISH_MAPPING, type SoundexOptions } from './encoders/soundex.js';
