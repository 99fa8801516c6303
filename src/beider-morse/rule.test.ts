import { describe, it, expect } from 'vitest';
import { RuleParseError } from '../errors.js';
import { ANY_LANGUAGE, languageSetFrom } from './language-set.js';
import { Phoneme, PhonemeSyntaxError, parsePhonemeExpr } from './phoneme.js';
import { Rule } from './rule.js';

const source = { location: 'gen_rules_any', lineNumber: 3, line: '<line>' };

describe('parsePhonemeExpr', () => {
  it('parses a bare phoneme', () => {
    expect(parsePhonemeExpr('ks')).toEqual([new Phoneme('ks', ANY_LANGUAGE)]);
  });

  it('parses language-restricted alternatives', () => {
    expect(parsePhonemeExpr('(Z[french]|dZ[english+polish])')).toEqual([
      new Phoneme('Z', languageSetFrom(['french'])),
      new Phoneme('dZ', languageSetFrom(['english', 'polish'])),
    ]);
  });

  it('keeps an empty alternative', () => {
    expect(parsePhonemeExpr('(e|)')).toEqual([new Phoneme('e', ANY_LANGUAGE), new Phoneme('', ANY_LANGUAGE)]);
  });

  it('rejects unterminated lists and language tags', () => {
    expect(() => parsePhonemeExpr('(a|b')).toThrow(PhonemeSyntaxError);
    expect(() => parsePhonemeExpr('a[french')).toThrow(PhonemeSyntaxError);
  });
});

describe('Rule', () => {
  it('matches the pattern at the given index', () => {
    const rule = Rule.parse(['au', '', '', 'o'], source);

    expect(rule.patternAndContextMatches('beau', 2)).toBe(true);
    expect(rule.patternAndContextMatches('beau', 1)).toBe(false);
    expect(rule.patternAndContextMatches('ba', 1)).toBe(false);
  });

  it('anchors the right context after the pattern', () => {
    const rule = Rule.parse(['c', '', '[eiy]', 's'], source);

    expect(rule.patternAndContextMatches('ace', 1)).toBe(true);
    expect(rule.patternAndContextMatches('aco', 1)).toBe(false);
  });

  it('anchors the left context before the pattern', () => {
    const atStart = Rule.parse(['h', '^', '', ''], source);
    const afterVowel = Rule.parse(['ll', '[aeiou]', '', 'j'], source);

    expect(atStart.patternAndContextMatches('hai', 0)).toBe(true);
    expect(atStart.patternAndContextMatches('aha', 1)).toBe(false);
    expect(afterVowel.patternAndContextMatches('fille', 2)).toBe(true);
    expect(afterVowel.patternAndContextMatches('hll', 1)).toBe(false);
  });

  it('treats $ as end of input in the right context', () => {
    const rule = Rule.parse(['e', '', '$', ''], source);

    expect(rule.patternAndContextMatches('rene', 3)).toBe(true);
    expect(rule.patternAndContextMatches('rene', 1)).toBe(false);
  });

  it('reports phoneme syntax errors against the rule line', () => {
    const parse = () => Rule.parse(['a', '', '', '(a|b'], source);

    expect(parse).toThrow(RuleParseError);
    expect(parse).toThrow(/^gen_rules_any:3: Phoneme list "\(a\|b" starts with/);
  });

  it('reports invalid context regexes', () => {
    const parse = () => Rule.parse(['a', '', '(b', 'a'], source);

    expect(parse).toThrow(RuleParseError);
    expect(parse).toThrow(/Invalid context regex/);
  });
});
