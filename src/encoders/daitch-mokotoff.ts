import { BaseEncoder } from '../encoder.js';
import type { RuleResourceResolver } from '../beider-morse/resources.js';
import { createLogger } from '../logger.js';
import { parseRuleLines } from '../rules-parser/rule-text.js';

const logger = createLogger('DaitchMokotoff');

const MAX_LENGTH = 6;
const VOWELS = 'aeiou';

/** Resource name of the rule table when loaded through a resolver. */
export const DM_RULES_RESOURCE = 'dmrules';

interface DmRule {
  pattern: string;
  atStart: readonly string[];
  beforeVowel: readonly string[];
  otherwise: readonly string[];
}

/** One candidate code under construction. */
class Branch {
  constructor(
    readonly code = '',
    private readonly lastReplacement?: string,
  ) {}

  next(replacement: string, force: boolean): Branch {
    const append = force || this.lastReplacement === undefined || !this.lastReplacement.endsWith(replacement);
    const code = append && this.code.length < MAX_LENGTH ? (this.code + replacement).slice(0, MAX_LENGTH) : this.code;
    return new Branch(code, replacement);
  }

  finish(): string {
    return this.code.padEnd(MAX_LENGTH, '0');
  }
}

function replacementsFor(rule: DmRule, chars: readonly string[], index: number, atStart: boolean): readonly string[] {
  if (atStart) return rule.atStart;
  const next = chars[index + Array.from(rule.pattern).length];
  return next !== undefined && VOWELS.includes(next) ? rule.beforeVowel : rule.otherwise;
}

export interface DaitchMokotoffOptions {
  /** Apply the table's folding pairs (ß=s, ...) before coding. Defaults to true. */
  asciiFolding?: boolean;
  /** Name of the rule source, used in parse errors. */
  location?: string;
}

/**
 * Daitch-Mokotoff Soundex: six-digit codes for Slavic, Germanic and Yiddish
 * names. A name may have several codes; `soundex` returns all of them.
 *
 * @example dm.soundex('Cohen') → '556000|456000'
 */
export class DaitchMokotoffSoundex extends BaseEncoder {
  readonly name = 'daitch-mokotoff';
  readonly asciiFolding: boolean;
  private readonly rules = new Map<string, DmRule[]>();
  private readonly foldings = new Map<string, string>();

  constructor(rulesText: string, options: DaitchMokotoffOptions = {}) {
    super();
    this.asciiFolding = options.asciiFolding ?? true;

    const location = options.location ?? DM_RULES_RESOURCE;
    for (const line of parseRuleLines(rulesText, location, { foldings: true })) {
      if (line.kind === 'folding') {
        this.foldings.set(line.from, line.to);
      } else if (line.kind === 'quadruplet') {
        const [pattern, atStart, beforeVowel, otherwise] = line.fields;
        const first = Array.from(pattern)[0] ?? '';
        const bucket = this.rules.get(first) ?? [];
        bucket.push({
          pattern,
          atStart: atStart.split('|'),
          beforeVowel: beforeVowel.split('|'),
          otherwise: otherwise.split('|'),
        });
        this.rules.set(first, bucket);
      }
    }

    for (const bucket of this.rules.values()) {
      bucket.sort((a, b) => b.pattern.length - a.pattern.length);
    }
    logger.debug(`Loaded ${this.rules.size} rule buckets and ${this.foldings.size} foldings from ${location}`);
  }

  static load(resolver: RuleResourceResolver, options: Omit<DaitchMokotoffOptions, 'location'> = {}): DaitchMokotoffSoundex {
    return new DaitchMokotoffSoundex(resolver.resolve(DM_RULES_RESOURCE), { ...options, location: DM_RULES_RESOURCE });
  }

  /** First code only. */
  encode(value: string): string {
    return this.codes(value, false)[0] ?? '';
  }

  /** Every code, `|`-separated. */
  soundex(value: string): string {
    return this.codes(value, true).join('|');
  }

  private prepare(value: string): string[] {
    return Array.from(value)
      .filter((char) => !/\s/u.test(char))
      .map((char) => {
        const lower = Array.from(char.toLowerCase())[0] ?? char;
        return this.asciiFolding ? (this.foldings.get(lower) ?? lower) : lower;
      });
  }

  private codes(value: string, branching: boolean): string[] {
    const chars = this.prepare(value);

    let branches = [new Branch()];
    let lastChar: string | undefined;

    let index = 0;
    while (index < chars.length) {
      const char = chars[index] ?? '';
      const rules = this.rules.get(char);
      let advance = 1;

      if (rules) {
        const context = chars.slice(index).join('');
        const rule = rules.find((candidate) => context.startsWith(candidate.pattern));
        if (rule) {
          const replacements = replacementsFor(rule, chars, index, lastChar === undefined);
          const force = (lastChar === 'm' && char === 'n') || (lastChar === 'n' && char === 'm');
          const next = new Map<string, Branch>();

          for (const branch of branches) {
            for (const replacement of branching ? replacements : replacements.slice(0, 1)) {
              const candidate = branch.next(replacement, force);
              if (!next.has(candidate.code)) next.set(candidate.code, candidate);
            }
          }

          branches = [...next.values()];
          advance = Array.from(rule.pattern).length;
        }
        lastChar = char;
      }

      index += advance;
    }

    return branches.map((branch) => branch.finish());
  }
}
