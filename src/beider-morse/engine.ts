import { parseEngineOptions, type EngineOptionsInput } from '../config.js';
import { createLogger } from '../logger.js';
import type { ConfigFiles } from './config-files.js';
import type { Lang } from './lang.js';
import { anyLanguage, formatLanguageSet, isSingleton, type LanguageSet } from './language-set.js';
import { ANY, COMMON_RULES } from './languages.js';
import { NameType } from './name-type.js';
import type { Phoneme } from './phoneme.js';
import { PhonemeBuilder } from './phoneme-builder.js';
import type { Rule } from './rule.js';
import type { PrivateRuleType, RuleType } from './rule-type.js';
import { EMPTY_RULE_GROUP, firstCharOf, type RuleGroup } from './rules.js';

const log = createLogger('BeiderMorse');

/**
 * Beider-Morse phonetic engine: turns a name into every phonetic spelling the
 * rule tables allow, e.g. `reno|renolt` for "Renault".
 *
 * Engines are cheap; the heavy state lives in the shared `ConfigFiles`.
 */
export class PhoneticEngine {
  readonly nameType: NameType;
  readonly ruleType: RuleType;
  readonly concat: boolean;
  readonly maxPhonemes: number;

  private readonly lang: Lang;
  private readonly prefixesLongestFirst: readonly string[];
  private readonly prefixWords: ReadonlySet<string>;

  constructor(
    private readonly configFiles: ConfigFiles,
    options: EngineOptionsInput
  ) {
    const { nameType, ruleType, concat, maxPhonemes } = parseEngineOptions(options);
    this.nameType = nameType;
    this.ruleType = ruleType;
    this.concat = concat;
    this.maxPhonemes = maxPhonemes ?? configFiles.maxPhonemes;
    this.lang = configFiles.lang(nameType);

    const prefixes = configFiles.namePrefixes[nameType];
    this.prefixesLongestFirst = [...prefixes].sort((a, b) => b.length - a.length);
    this.prefixWords = new Set(prefixes);
  }

  encode(input: string): string {
    return this.encodeWithLanguageSet(input, this.lang.guessLanguages(input));
  }

  encodeWithLanguageSet(input: string, languageSet: LanguageSet): string {
    const language = isSingleton(languageSet) ? (anyLanguage(languageSet) ?? ANY) : ANY;
    const mainRules = this.ruleGroup('rules', language);
    const commonFinalRules = this.configFiles.rules.get(this.nameType, this.ruleType, COMMON_RULES) ?? EMPTY_RULE_GROUP;
    const languageFinalRules = this.ruleGroup(this.ruleType, language);

    const text = input.toLowerCase().replaceAll('-', ' ').trim();

    if (this.nameType === NameType.Generic) {
      const split = this.splitGenericPrefix(text);
      if (split) {
        const [remainder, combined] = split;
        return `(${this.encode(remainder)})-(${this.encode(combined)})`;
      }
    }

    const words = this.significantWords(text);
    let name: string;
    if (this.concat) {
      name = words.join(' ');
    } else if (words.length === 1) {
      name = words[0] ?? '';
    } else {
      return words.map((word) => this.encode(word)).join('-');
    }

    log.debug(`Encoding "${name}" as ${formatLanguageSet(languageSet)} with ${this.nameType}_rules_${language}`);

    const builder = PhonemeBuilder.empty(languageSet);
    this.scan(name, mainRules, builder, false);

    const withCommon = this.applyFinalRules(builder, commonFinalRules);
    return this.applyFinalRules(withCommon, languageFinalRules).makeString();
  }

  /** `[remainder, particle + remainder]` when the name starts with `d'` or a particle. */
  private splitGenericPrefix(text: string): [string, string] | undefined {
    if (text.startsWith("d'")) {
      const remainder = text.slice(2);
      return [remainder, `d${remainder}`];
    }
    for (const prefix of this.prefixesLongestFirst) {
      if (text.startsWith(`${prefix} `)) {
        const remainder = text.slice(prefix.length + 1);
        return [remainder, prefix + remainder];
      }
    }
    return undefined;
  }

  private significantWords(text: string): string[] {
    const words = text.split(/\s+/);
    switch (this.nameType) {
      case NameType.Sephardic:
        return words
          .map((word) => word.slice(word.lastIndexOf("'") + 1))
          .filter((word) => word !== '' && !this.prefixWords.has(word));
      case NameType.Ashkenazi:
        return words.filter((word) => !this.prefixWords.has(word));
      case NameType.Generic:
        return words;
    }
  }

  private ruleGroup(ruleType: PrivateRuleType, language: string): RuleGroup {
    const group = this.configFiles.rules.get(this.nameType, ruleType, language);
    if (group) return group;

    log.debug(`No ${this.nameType}_${ruleType}_${language} rules, using ${this.nameType}_${ruleType}_${ANY}`);
    return this.configFiles.rules.get(this.nameType, ruleType, ANY) ?? EMPTY_RULE_GROUP;
  }

  /**
   * Rewrite `text` into `builder`. The main pass drops characters no rule
   * covers; final passes copy them through.
   */
  private scan(text: string, rules: RuleGroup, builder: PhonemeBuilder, keepUnmatched: boolean): void {
    let index = 0;
    while (index < text.length) {
      const char = firstCharOf(text, index);
      const rule = findRule(rules.get(char), text, index);
      if (rule) {
        builder.apply(rule.phonemes, this.maxPhonemes);
        index += rule.pattern.length;
      } else {
        if (keepUnmatched) builder.append(char);
        index += char.length;
      }
    }
  }

  /**
   * Run each spelling through `rules` on its own, then merge spellings that
   * end up identical, unioning their languages.
   */
  private applyFinalRules(builder: PhonemeBuilder, rules: RuleGroup): PhonemeBuilder {
    if (rules.size === 0) return builder;

    const merged = new Map<string, Phoneme>();
    for (const phoneme of builder.getPhonemes()) {
      const expansion = PhonemeBuilder.empty(phoneme.languages);
      this.scan(phoneme.text, rules, expansion, true);

      for (const result of expansion.getPhonemes()) {
        const existing = merged.get(result.text);
        if (existing) {
          merged.set(result.text, existing.mergeWithLanguages(result.languages));
        } else if (merged.size < this.maxPhonemes) {
          // Final rules can fan out again; the cap still holds on the merged result.
          merged.set(result.text, result);
        }
      }
    }

    return PhonemeBuilder.of(merged.values());
  }
}

function findRule(candidates: readonly Rule[] | undefined, text: string, index: number): Rule | undefined {
  return candidates?.find((rule) => rule.patternAndContextMatches(text, index));
}
