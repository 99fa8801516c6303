import { parseListLines } from '../rules-parser/rule-text.js';
import { NAME_TYPES, type NameType } from './name-type.js';
import type { RuleResourceResolver } from './resources.js';

/** Language token used for rule tables that apply regardless of language. */
export const ANY = 'any';

/** Language token of the final-rule tables applied before the language-specific ones. */
export const COMMON_RULES = 'common';

/**
 * Languages supported per name type, read from the `<nt>_languages` lists.
 */
export class Languages {
  private constructor(private readonly byNameType: ReadonlyMap<NameType, readonly string[]>) {}

  static load(resolver: RuleResourceResolver): Languages {
    const byNameType = new Map<NameType, readonly string[]>();
    for (const nameType of NAME_TYPES) {
      const resource = `${nameType}_languages`;
      byNameType.set(nameType, Object.freeze(parseListLines(resolver.resolve(resource), resource)));
    }
    return new Languages(byNameType);
  }

  get(nameType: NameType): readonly string[] {
    return this.byNameType.get(nameType) ?? [];
  }
}
