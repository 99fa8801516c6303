/**
 * Tokenizer for the plain-text rule resources shared by the Beider-Morse and
 * Daitch-Mokotoff encoders.
 *
 * Comment handling, evaluated on each trimmed line:
 * 1. a line ending with `*\/` closes a block comment (checked first)
 * 2. blank lines, `//` lines and lines inside a block are skipped
 * 3. a line starting with `/*` opens a block
 */

import { RuleParseError } from '../errors.js';
import { FOLDING_LINE, INCLUDE_LINE, LANG_RULE_LINE, LIST_LINE, QUADRUPLET_LINE } from './grammars.js';

export interface SourceLine {
  /** 1-based line number in the resource. */
  lineNumber: number;
  /** Trimmed line content. */
  text: string;
}

export type Quadruplet = readonly [string, string, string, string];

export type RuleLine =
  | { kind: 'quadruplet'; lineNumber: number; text: string; fields: Quadruplet }
  | { kind: 'include'; lineNumber: number; text: string; resource: string }
  | { kind: 'folding'; lineNumber: number; text: string; from: string; to: string };

export interface LangLine {
  lineNumber: number;
  text: string;
  pattern: string;
  languages: string[];
  acceptOnMatch: boolean;
}

export interface RuleLineOptions {
  /** Accept `#include <resource>` lines. */
  includes?: boolean;
  /** Accept `x=y` folding lines. */
  foldings?: boolean;
}

/**
 * Strip comments and blank lines, keeping line numbers of what remains.
 */
export function contentLines(content: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let inBlockComment = false;

  content.split('\n').forEach((rawLine, index) => {
    const text = rawLine.trim();

    if (text.endsWith('*/')) {
      inBlockComment = false;
      return;
    }
    if (inBlockComment || text === '' || text.startsWith('//')) {
      return;
    }
    if (text.startsWith('/*')) {
      inBlockComment = true;
      return;
    }

    lines.push({ lineNumber: index + 1, text });
  });

  return lines;
}

export function parseRuleLines(content: string, location: string, options: RuleLineOptions = {}): RuleLine[] {
  return contentLines(content).map(({ lineNumber, text }): RuleLine => {
    const quadruplet = QUADRUPLET_LINE.exec(text);
    if (quadruplet) {
      const [, pattern = '', first = '', second = '', third = ''] = quadruplet;
      return { kind: 'quadruplet', lineNumber, text, fields: [pattern, first, second, third] };
    }

    if (options.includes) {
      const include = INCLUDE_LINE.exec(text);
      if (include?.[1] !== undefined) {
        return { kind: 'include', lineNumber, text, resource: include[1] };
      }
    }

    if (options.foldings) {
      const folding = FOLDING_LINE.exec(text);
      if (folding?.[1] !== undefined && folding[2] !== undefined) {
        return { kind: 'folding', lineNumber, text, from: folding[1], to: folding[2] };
      }
    }

    throw new RuleParseError('BAD_RULE', location, lineNumber, text, 'Malformed rule');
  });
}

export function parseLangLines(content: string, location: string): LangLine[] {
  return contentLines(content).map(({ lineNumber, text }) => {
    const match = LANG_RULE_LINE.exec(text);
    if (!match || match[1] === undefined || match[2] === undefined || match[3] === undefined) {
      throw new RuleParseError('BAD_RULE', location, lineNumber, text, 'Malformed language rule');
    }

    const [, pattern, languages, flag] = match;
    if (flag !== 'true' && flag !== 'false') {
      throw new RuleParseError('NOT_A_BOOLEAN', location, lineNumber, text, `"${flag}" is not a boolean`);
    }

    return {
      lineNumber,
      text,
      pattern,
      languages: languages.split('+').filter((language) => language !== ''),
      acceptOnMatch: flag === 'true',
    };
  });
}

export function parseListLines(content: string, location: string): string[] {
  return contentLines(content).map(({ lineNumber, text }) => {
    const match = LIST_LINE.exec(text);
    if (!match || match[1] === undefined) {
      throw new RuleParseError('BAD_RULE', location, lineNumber, text, 'Malformed list entry');
    }
    return match[1];
  });
}
