import { describe, it, expect } from 'vitest';
import { ANY_LANGUAGE, languageSetFrom } from './language-set.js';
import { Phoneme, parsePhonemeExpr } from './phoneme.js';
import { PhonemeBuilder } from './phoneme-builder.js';

const french = languageSetFrom(['french']);
const english = languageSetFrom(['english']);

describe('PhonemeBuilder', () => {
  it('starts with a single empty spelling', () => {
    const builder = PhonemeBuilder.empty(ANY_LANGUAGE);

    expect(builder.size).toBe(1);
    expect(builder.makeString()).toBe('');
  });

  it('appends text to every spelling', () => {
    const builder = PhonemeBuilder.of([new Phoneme('a', ANY_LANGUAGE), new Phoneme('b', ANY_LANGUAGE)]);
    builder.append('x');

    expect(builder.makeString()).toBe('ax|bx');
  });

  it('crosses spellings with alternatives, dropping language conflicts', () => {
    const builder = PhonemeBuilder.empty(french);
    builder.apply(parsePhonemeExpr('(Z[french]|dZ[english]|j)'), 20);

    expect(builder.getPhonemes()).toEqual([new Phoneme('Z', french), new Phoneme('j', french)]);
  });

  it('stops at the cap, keeping earlier spellings and alternatives', () => {
    const builder = PhonemeBuilder.of([new Phoneme('b', ANY_LANGUAGE), new Phoneme('a', ANY_LANGUAGE)]);
    builder.apply(parsePhonemeExpr('(x|y)'), 3);

    expect(builder.makeString()).toBe('ax|ay|bx');
  });

  it('keeps the first spelling when two combinations produce the same text', () => {
    const builder = PhonemeBuilder.of([new Phoneme('a', english), new Phoneme('ab', french)]);
    builder.apply(parsePhonemeExpr('(b|)'), 20);

    expect(builder.getPhonemes()).toEqual([
      new Phoneme('a', english),
      new Phoneme('ab', english),
      new Phoneme('abb', french),
    ]);
  });

  it('renders spellings sorted by text', () => {
    const builder = PhonemeBuilder.of([
      new Phoneme('dZean', english),
      new Phoneme('Zean', french),
      new Phoneme('zean', ANY_LANGUAGE),
    ]);

    expect(builder.makeString()).toBe('Zean|dZean|zean');
  });
});
