import { compareText, isEmpty, restrictTo, type LanguageSet } from './language-set.js';
import { Phoneme, type PhonemeExpr } from './phoneme.js';

/**
 * The set of phonetic spellings built so far, keyed by text.
 */
export class PhonemeBuilder {
  private constructor(private phonemes: Map<string, Phoneme>) {}

  /** A single empty spelling valid for `languages`. */
  static empty(languages: LanguageSet): PhonemeBuilder {
    return new PhonemeBuilder(new Map([['', new Phoneme('', languages)]]));
  }

  static of(phonemes: Iterable<Phoneme>): PhonemeBuilder {
    const byText = new Map<string, Phoneme>();
    for (const phoneme of phonemes) {
      if (!byText.has(phoneme.text)) byText.set(phoneme.text, phoneme);
    }
    return new PhonemeBuilder(byText);
  }

  /** Spellings in text order. */
  getPhonemes(): Phoneme[] {
    return [...this.phonemes.values()].sort((a, b) => compareText(a.text, b.text));
  }

  get size(): number {
    return this.phonemes.size;
  }

  append(text: string): void {
    const next = new Map<string, Phoneme>();
    for (const phoneme of this.phonemes.values()) {
      const appended = phoneme.append(text);
      next.set(appended.text, appended);
    }
    this.phonemes = next;
  }

  /**
   * Cross every spelling with every alternative of `expression`, keeping
   * combinations whose language sets still overlap. Stops as soon as
   * `maxPhonemes` spellings exist; earlier spellings (in text order) and
   * earlier alternatives win.
   */
  apply(expression: PhonemeExpr, maxPhonemes: number): void {
    const next = new Map<string, Phoneme>();

    outer: for (const left of this.getPhonemes()) {
      for (const right of expression) {
        const languages = restrictTo(left.languages, right.languages);
        if (isEmpty(languages)) continue;

        const joined = Phoneme.join(left, right, languages);
        if (!next.has(joined.text)) next.set(joined.text, joined);
        if (next.size >= maxPhonemes) break outer;
      }
    }

    this.phonemes = next;
  }

  makeString(): string {
    return this.getPhonemes()
      .map((phoneme) => phoneme.text)
      .join('|');
  }
}
