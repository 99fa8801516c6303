import type { EngineOptionsInput } from '../config.js';
import { BaseEncoder } from '../encoder.js';
import type { ConfigFiles } from './config-files.js';
import { PhoneticEngine } from './engine.js';

/**
 * `Encoder` view of a Beider-Morse engine. Codes are `|`-separated sets of
 * spellings, so `isEncodedEquals` only holds for identical sets; use
 * `hasCommonSpelling` to test for overlap.
 */
export class BeiderMorseEncoder extends BaseEncoder {
  readonly name = 'beider-morse';
  readonly engine: PhoneticEngine;

  constructor(configFiles: ConfigFiles, options: EngineOptionsInput) {
    super();
    this.engine = new PhoneticEngine(configFiles, options);
  }

  encode(value: string): string {
    return this.engine.encode(value);
  }

  /** True when the two names share at least one phonetic spelling. */
  hasCommonSpelling(first: string, second: string): boolean {
    const spellings = new Set(spellingsOf(this.encode(first)));
    return spellingsOf(this.encode(second)).some((spelling) => spellings.has(spelling));
  }
}

// "(a|b)-(c)" → ["a", "b", "c"]
function spellingsOf(code: string): string[] {
  return code
    .split(/[|()-]/)
    .filter((spelling) => spelling !== '');
}
