/**
 * Compiled rule contexts.
 *
 * Contexts in the rule tables are tiny regexes, almost always one of a
 * handful of anchored shapes (`^`, `^x$`, `[aeiou]$`, ...). Those shapes are
 * turned into plain string checks; anything else is compiled to a RegExp and
 * tested with search semantics.
 */

export type ContextMatcher = (input: string) => boolean;

// Regex syntax that the plain-string shapes cannot express.
const REGEX_SYNTAX = /[\\.*+?(){}|^$]/;
const BOX_SYNTAX = /[\\\]^[-]/;

const matchesAll: ContextMatcher = () => true;

/**
 * Compile a context regex. Throws a SyntaxError when the fallback RegExp
 * cannot be built.
 *
 * @example compileContext('^$')('') → true
 * @example compileContext('^[ei]')('eau') → true
 * @example compileContext('[^aeiou]$')('bra') → false
 */
export function compileContext(regex: string): ContextMatcher {
  const anchoredStart = regex.startsWith('^');
  const anchoredEnd = regex.endsWith('$') && regex.length > (anchoredStart ? 1 : 0);
  const content = regex.slice(anchoredStart ? 1 : 0, anchoredEnd ? regex.length - 1 : regex.length);

  if (!REGEX_SYNTAX.test(content) && !content.includes('[') && !content.includes(']')) {
    if (anchoredStart && anchoredEnd) {
      return content === '' ? (input) => input.length === 0 : (input) => input === content;
    }
    if (content === '') {
      return matchesAll;
    }
    if (anchoredStart) return (input) => input.startsWith(content);
    if (anchoredEnd) return (input) => input.endsWith(content);
  }

  const box = parseSingleBox(content);
  if (box && (anchoredStart || anchoredEnd)) {
    const { characters, negated } = box;
    const shouldMatch = !negated;
    if (anchoredStart && anchoredEnd) {
      return (input) => {
        const chars = Array.from(input);
        return chars.length === 1 && characters.has(chars[0] ?? '') === shouldMatch;
      };
    }
    if (anchoredStart) {
      return (input) => {
        const first = firstChar(input);
        return first !== undefined && characters.has(first) === shouldMatch;
      };
    }
    return (input) => {
      const last = lastChar(input);
      return last !== undefined && characters.has(last) === shouldMatch;
    };
  }

  const pattern = new RegExp(regex);
  return (input) => pattern.test(input);
}

interface CharacterBox {
  characters: ReadonlySet<string>;
  negated: boolean;
}

/** `[abc]` or `[^abc]` with nothing around it and no ranges or escapes inside. */
function parseSingleBox(content: string): CharacterBox | undefined {
  if (!content.startsWith('[') || !content.endsWith(']') || content.length < 3) return undefined;

  let inner = content.slice(1, -1);
  const negated = inner.startsWith('^');
  if (negated) inner = inner.slice(1);

  if (inner === '' || BOX_SYNTAX.test(inner)) return undefined;
  return { characters: new Set(Array.from(inner)), negated };
}

function firstChar(input: string): string | undefined {
  const codePoint = input.codePointAt(0);
  return codePoint === undefined ? undefined : String.fromCodePoint(codePoint);
}

function lastChar(input: string): string | undefined {
  return Array.from(input).at(-1);
}
