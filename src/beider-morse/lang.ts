import { RuleParseError } from '../errors.js';
import { parseLangLines } from '../rules-parser/rule-text.js';
import { ANY_LANGUAGE, languageSetFrom, type LanguageSet } from './language-set.js';
import type { Languages } from './languages.js';
import { NameType } from './name-type.js';
import type { RuleResourceResolver } from './resources.js';

export interface LangRule {
  pattern: RegExp;
  /** Accepting rules narrow to `languages`, rejecting rules remove them. */
  acceptOnMatch: boolean;
  languages: ReadonlySet<string>;
}

/**
 * Guesses the languages a name may come from, using the ordered rules of
 * an `<nt>_lang` resource.
 */
export class Lang {
  constructor(
    private readonly languages: readonly string[],
    private readonly rules: readonly LangRule[]
  ) {}

  static parse(content: string, location: string, languages: readonly string[]): Lang {
    const rules = parseLangLines(content, location).map(({ lineNumber, text, pattern, languages: names, acceptOnMatch }) => {
      let compiled: RegExp;
      try {
        compiled = new RegExp(pattern);
      } catch (error) {
        throw new RuleParseError('BAD_CONTEXT_REGEX', location, lineNumber, text, `Invalid regex "${pattern}"`, {
          cause: error,
        });
      }
      return { pattern: compiled, acceptOnMatch, languages: new Set(names) };
    });
    return new Lang(languages, rules);
  }

  /**
   * @example guessLanguages('Renault') → {french} with a rule `ault$ french true`
   */
  guessLanguages(input: string): LanguageSet {
    const text = input.toLowerCase();
    let remaining = new Set(this.languages);

    for (const rule of this.rules) {
      if (!rule.pattern.test(text)) continue;
      remaining = rule.acceptOnMatch
        ? new Set([...remaining].filter((language) => rule.languages.has(language)))
        : new Set([...remaining].filter((language) => !rule.languages.has(language)));
    }

    return remaining.size === 0 ? ANY_LANGUAGE : languageSetFrom(remaining);
  }
}

export function loadLangs(resolver: RuleResourceResolver, languages: Languages): Readonly<Record<NameType, Lang>> {
  const load = (nameType: NameType): Lang => {
    const resource = `${nameType}_lang`;
    return Lang.parse(resolver.resolve(resource), resource, languages.get(nameType));
  };

  return {
    [NameType.Ashkenazi]: load(NameType.Ashkenazi),
    [NameType.Generic]: load(NameType.Generic),
    [NameType.Sephardic]: load(NameType.Sephardic),
  };
}
