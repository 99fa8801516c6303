import { RuleParseError } from '../errors.js';
import { compileContext, type ContextMatcher } from './context-matcher.js';
import { PhonemeSyntaxError, parsePhonemeExpr, type PhonemeExpr } from './phoneme.js';

export interface RuleSource {
  location: string;
  lineNumber: number;
  line: string;
}

/**
 * A rewrite rule: `pattern` preceded by `leftContext` and followed by
 * `rightContext` yields `phonemes`.
 */
export class Rule {
  private readonly matchesLeft: ContextMatcher;
  private readonly matchesRight: ContextMatcher;

  constructor(
    readonly pattern: string,
    readonly leftContext: string,
    readonly rightContext: string,
    readonly phonemes: PhonemeExpr
  ) {
    // Contexts are anchored at the match position.
    this.matchesLeft = compileContext(`${leftContext}$`);
    this.matchesRight = compileContext(`^${rightContext}`);
  }

  /**
   * True when the pattern occurs at `index` and both contexts hold around it.
   */
  patternAndContextMatches(input: string, index: number): boolean {
    const end = index + this.pattern.length;
    if (end > input.length || !input.startsWith(this.pattern, index)) {
      return false;
    }
    return this.matchesRight(input.slice(end)) && this.matchesLeft(input.slice(0, index));
  }

  /**
   * Build a rule from the four fields of a rule-table line, reporting syntax
   * problems against the line they came from.
   */
  static parse(fields: readonly [string, string, string, string], source: RuleSource): Rule {
    const [pattern, leftContext, rightContext, phonemeText] = fields;

    let phonemes: PhonemeExpr;
    try {
      phonemes = parsePhonemeExpr(phonemeText);
    } catch (error) {
      if (error instanceof PhonemeSyntaxError) {
        throw new RuleParseError('WRONG_PHONEME', source.location, source.lineNumber, source.line, error.message);
      }
      throw error;
    }

    try {
      return new Rule(pattern, leftContext, rightContext, phonemes);
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new RuleParseError(
          'BAD_CONTEXT_REGEX',
          source.location,
          source.lineNumber,
          source.line,
          `Invalid context regex: ${error.message}`,
          { cause: error }
        );
      }
      throw error;
    }
  }
}
