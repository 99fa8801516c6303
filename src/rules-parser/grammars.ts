/**
 * Line grammars of the phonetic rule resources.
 *
 * Every pattern is matched against a line that has already been trimmed and
 * is known not to be a comment line.
 */

// =============================================================================
// RULE TABLES
// =============================================================================

/**
 * Four double-quoted fields separated by whitespace, optionally followed by a
 * `//` comment. Beider-Morse reads them as pattern, left context, right
 * context, phoneme expression; Daitch-Mokotoff as pattern, replacement at the
 * start, before a vowel, anywhere else.
 *
 * Captures: [1]..[4] = field contents without the quotes
 *
 * @example '"ault" "" "$" "(o|olt)"' → ["ault", "", "$", "(o|olt)"]
 * @example '"sch" "4" "4" "4" // German' → ["sch", "4", "4", "4"]
 */
export const QUADRUPLET_LINE = /^"(.+?)"\s+"(.*?)"\s+"(.*?)"\s+"(.*?)"\s*(?:\/\/.*)?$/;

/**
 * Include directive inside a Beider-Morse rule table.
 *
 * Captures: [1] = resource name
 *
 * @example "#include gen_exact_common" → "gen_exact_common"
 */
export const INCLUDE_LINE = /^#include\s+(\S+)\s*(?:\/\/.*)?$/;

/**
 * Daitch-Mokotoff folding pair: one character folded into another.
 *
 * Captures: [1] = source character, [2] = folded character
 *
 * @example "ß=s" → ["ß", "s"]
 */
export const FOLDING_LINE = /^(.)=(.)\s*(?:\/\/.*)?$/u;

// =============================================================================
// LANGUAGE GUESSING
// =============================================================================

/**
 * Language-guess rule: regex, `+`-joined languages, accept flag.
 *
 * Captures: [1] = regex, [2] = languages, [3] = accept flag token
 *
 * @example "ault$ french true" → ["ault$", "french", "true"]
 * @example "w french+italian false // rare" → ["w", "french+italian", "false"]
 */
export const LANG_RULE_LINE = /^(\S+)\s+(\S+)\s+(\S+)\s*(?:\/\/.*)?$/;

// =============================================================================
// LISTS
// =============================================================================

/**
 * One bare token per line.
 *
 * Captures: [1] = token
 *
 * @example "english // default" → "english"
 */
export const LIST_LINE = /^(\S+)\s*(?:\/\/.*)?$/;
