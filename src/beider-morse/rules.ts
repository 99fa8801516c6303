import { RuleParseError } from '../errors.js';
import { parseRuleLines } from '../rules-parser/rule-text.js';
import { COMMON_RULES, type Languages } from './languages.js';
import { NAME_TYPES, type NameType } from './name-type.js';
import type { RuleResourceResolver } from './resources.js';
import { Rule } from './rule.js';
import { PRIVATE_RULE_TYPES, hasCommonRules, type PrivateRuleType } from './rule-type.js';

/** Rules keyed by the first character of their pattern, longest pattern first. */
export type RuleGroup = ReadonlyMap<string, readonly Rule[]>;

export const EMPTY_RULE_GROUP: RuleGroup = new Map();

export function ruleResourceName(nameType: NameType, ruleType: PrivateRuleType, language: string): string {
  return `${nameType}_${ruleType}_${language}`;
}

/**
 * Parse a rule table, expanding `#include` lines in place.
 */
export function parseRuleTable(
  resolver: RuleResourceResolver,
  resource: string,
  including: readonly string[] = []
): Rule[] {
  const stack = [...including, resource];
  const rules: Rule[] = [];

  for (const line of parseRuleLines(resolver.resolve(resource), resource, { includes: true })) {
    switch (line.kind) {
      case 'quadruplet':
        rules.push(Rule.parse(line.fields, { location: resource, lineNumber: line.lineNumber, line: line.text }));
        break;
      case 'include':
        if (stack.includes(line.resource)) {
          throw new RuleParseError(
            'INCLUDE_CYCLE',
            resource,
            line.lineNumber,
            line.text,
            `Include cycle ${[...stack, line.resource].join(' -> ')}`
          );
        }
        rules.push(...parseRuleTable(resolver, line.resource, stack));
        break;
      case 'folding':
        throw new RuleParseError('BAD_RULE', resource, line.lineNumber, line.text, 'Unexpected folding line');
    }
  }

  return rules;
}

/**
 * Bucket rules by first character; each bucket keeps file order among
 * patterns of equal length.
 */
export function groupRules(rules: readonly Rule[]): RuleGroup {
  const group = new Map<string, Rule[]>();
  for (const rule of rules) {
    const key = firstCharOf(rule.pattern);
    const bucket = group.get(key);
    if (bucket) {
      bucket.push(rule);
    } else {
      group.set(key, [rule]);
    }
  }
  for (const bucket of group.values()) {
    bucket.sort((a, b) => b.pattern.length - a.pattern.length);
  }
  return group;
}

export function firstCharOf(text: string, index = 0): string {
  const codePoint = text.codePointAt(index);
  return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
}

/**
 * Every rule table for every name type, rule type and language.
 */
export class Rules {
  private constructor(private readonly groups: ReadonlyMap<string, RuleGroup>) {}

  static load(resolver: RuleResourceResolver, languages: Languages): Rules {
    const groups = new Map<string, RuleGroup>();
    for (const nameType of NAME_TYPES) {
      for (const ruleType of PRIVATE_RULE_TYPES) {
        const tables = [...languages.get(nameType)];
        if (hasCommonRules(ruleType)) tables.push(COMMON_RULES);

        for (const language of tables) {
          const resource = ruleResourceName(nameType, ruleType, language);
          groups.set(resource, groupRules(parseRuleTable(resolver, resource)));
        }
      }
    }
    return new Rules(groups);
  }

  get(nameType: NameType, ruleType: PrivateRuleType, language: string): RuleGroup | undefined {
    return this.groups.get(ruleResourceName(nameType, ruleType, language));
  }

  get size(): number {
    return this.groups.size;
  }
}
