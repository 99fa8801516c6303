import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect, beforeAll } from 'vitest';
import { InvalidOptionsError } from '../errors.js';
import { ConfigFiles } from './config-files.js';
import { PhoneticEngine } from './engine.js';
import { languageSetFrom } from './language-set.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURE_RULES = join(__dirname, '../../fixtures/bm');

let configFiles: ConfigFiles;

beforeAll(() => {
  configFiles = ConfigFiles.fromDirectory(FIXTURE_RULES);
});

describe('PhoneticEngine', () => {
  describe('generic names', () => {
    it('encodes with the guessed language rules and final rules', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact' });

      expect(engine.encode('Renault')).toBe('reno|renolt|renu');
    });

    it('uses the approx final rules when asked', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'approx' });

      expect(engine.encode('Renault')).toBe('reno|renolt|renu');
    });

    it('uses the shared rules when no single language is guessed', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact' });

      expect(engine.encode('Watteau')).toBe('vatteau|vatteo');
    });

    it('splits a leading d\' into both readings', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact', maxPhonemes: 10 });

      expect(engine.encode("d'ortley")).toBe('(ortlej)-(dortlej)');
    });

    it('splits a leading particle into both readings', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact', concat: false });

      expect(engine.encode('van helsing')).toBe('(helsing)-(vanhelsing)');
    });

    it('joins words when concat is on', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact' });

      expect(engine.encode('jean smith')).toBe('dZeansmit');
      expect(engine.encode('Jean-Smith')).toBe('dZeansmit');
    });

    it('encodes words separately when concat is off', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact', concat: false });

      expect(engine.encode('jean smith')).toBe('Zean|dZean-smit');
    });

    it('keeps only alternatives valid for an explicit language set', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact' });

      expect(engine.encodeWithLanguageSet('jean', languageSetFrom(['french']))).toBe('Zean');
    });

    it('falls back to the shared rules for a language without tables', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact' });

      expect(engine.encodeWithLanguageSet('mona', languageSetFrom(['german']))).toBe('mona');
    });

    it('returns an empty code for empty input', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact' });

      expect(engine.encode('')).toBe('');
      expect(engine.encode(' - ')).toBe('');
    });
  });

  describe('maxPhonemes', () => {
    it('keeps the first alternative when capped to one', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact', maxPhonemes: 1 });

      expect(engine.encode('Renault')).toBe('reno');
    });

    it('caps the merged result of the final rules', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact', maxPhonemes: 2 });

      expect(engine.encode('Renault')).toBe('reno|renu');
    });

    it('never returns more alternatives than the cap', () => {
      for (const maxPhonemes of [1, 2, 3, 4]) {
        const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'approx', maxPhonemes });
        for (const name of ['Renault', 'Watteau', 'jean', 'Chauchet', 'yvery']) {
          expect(engine.encode(name).split('|').length).toBeLessThanOrEqual(maxPhonemes);
        }
      }
    });
  });

  describe('ashkenazic names', () => {
    it('drops particles before concatenating', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'ash', ruleType: 'exact' });

      expect(engine.encode('ben moshe')).toBe('moS|moSe');
    });

    it('encodes the remaining word alone when concat is off', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'ash', ruleType: 'exact', concat: false });

      expect(engine.encode('ben moshe')).toBe('moS|moSe');
      expect(engine.encode('moshe levi')).toBe('moS|moSe-levi');
    });
  });

  describe('sephardic names', () => {
    it('keeps the part after an apostrophe and drops particles', () => {
      const engine = new PhoneticEngine(configFiles, { nameType: 'sep', ruleType: 'exact' });

      expect(engine.encode("d'souza")).toBe('souza');
      expect(engine.encode('al cohen')).toBe('kohen');
    });
  });

  it('is deterministic', () => {
    const engine = new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'approx' });

    expect(engine.encode('Chauchet')).toBe(engine.encode('Chauchet'));
  });

  it('applies option defaults', () => {
    const engine = new PhoneticEngine(configFiles, { nameType: 'sep', ruleType: 'approx' });

    expect(engine.concat).toBe(true);
    expect(engine.maxPhonemes).toBe(20);
  });

  it('rejects invalid options', () => {
    expect(() => new PhoneticEngine(configFiles, { nameType: 'gen', ruleType: 'exact', maxPhonemes: 0 })).toThrow(
      InvalidOptionsError
    );
  });
});

const referenceRulesDir = process.env.PHONETIC_BM_RULES_DIR;

describe.skipIf(!referenceRulesDir)('PhoneticEngine with the standard rule set', () => {
  const load = () => ConfigFiles.fromDirectory(referenceRulesDir ?? '');

  it("splits d'ortley", () => {
    const engine = new PhoneticEngine(load(), { nameType: 'gen', ruleType: 'exact', maxPhonemes: 10 });
    expect(engine.encode("d'ortley")).toBe('(ortlaj|ortlej)-(dortlaj|dortlej)');
  });

  it('joins hyphenated names', () => {
    const engine = new PhoneticEngine(load(), { nameType: 'gen', ruleType: 'exact' });
    expect(engine.encode('SntJohn-Smith')).toBe('sntjonsmit');
  });

  it('encodes Renault', () => {
    const generic = new PhoneticEngine(load(), { nameType: 'gen', ruleType: 'approx', maxPhonemes: 10 });
    const ashkenazic = new PhoneticEngine(load(), { nameType: 'ash', ruleType: 'approx', maxPhonemes: 1 });

    expect(generic.encode('Renault')).toBe('rinD|rinDlt|rina|rinalt|rino|rinolt|rinu|rinult');
    expect(ashkenazic.encode('Renault')).toBe('rinDlt');
  });
});
