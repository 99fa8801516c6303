/**
 * Public rule types select the final-rule tables: `approx` yields broader
 * matches, `exact` narrower ones.
 */
export const RuleType = {
  Approx: 'approx',
  Exact: 'exact',
} as const;

export type RuleType = (typeof RuleType)[keyof typeof RuleType];

/** The main transformation tables are stored under the internal `rules` type. */
export type PrivateRuleType = RuleType | 'rules';

export const RULE_TYPES: readonly RuleType[] = [RuleType.Approx, RuleType.Exact];

export const PRIVATE_RULE_TYPES: readonly PrivateRuleType[] = ['approx', 'exact', 'rules'];

/** Rule types that also ship a `<nt>_<rt>_common` table applied before the language table. */
export function hasCommonRules(ruleType: PrivateRuleType): ruleType is RuleType {
  switch (ruleType) {
    case 'approx':
    case 'exact':
      return true;
    case 'rules':
      return false;
    default: {
      const unreachable: never = ruleType;
      return unreachable;
    }
  }
}
