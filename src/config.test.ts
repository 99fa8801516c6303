import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import { InvalidOptionsError } from './errors.js';
import { getPhoneticConfig, loadPhoneticEnv, parseEngineOptions } from './config.js';

describe('getPhoneticConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(getPhoneticConfig({})).toEqual({ rulesDir: undefined, maxPhonemes: 20, logLevel: 'warn' });
  });

  it('reads values from the environment', () => {
    expect(
      getPhoneticConfig({
        PHONETIC_BM_RULES_DIR: ' /srv/bm-rules ',
        PHONETIC_MAX_PHONEMES: '8',
        PHONETIC_LOG_LEVEL: 'debug',
      })
    ).toEqual({ rulesDir: '/srv/bm-rules', maxPhonemes: 8, logLevel: 'debug' });
  });

  it('treats empty values as unset', () => {
    expect(getPhoneticConfig({ PHONETIC_BM_RULES_DIR: '', PHONETIC_MAX_PHONEMES: '' })).toEqual({
      rulesDir: undefined,
      maxPhonemes: 20,
      logLevel: 'warn',
    });
  });

  it('rejects invalid values', () => {
    expect(() => getPhoneticConfig({ PHONETIC_MAX_PHONEMES: 'many' })).toThrow(InvalidOptionsError);
    expect(() => getPhoneticConfig({ PHONETIC_LOG_LEVEL: 'loud' })).toThrow(/PHONETIC_LOG_LEVEL/);
  });
});

describe('loadPhoneticEnv', () => {
  const original = process.env.PHONETIC_MAX_PHONEMES;
  let dir: string | undefined;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.PHONETIC_MAX_PHONEMES;
    } else {
      process.env.PHONETIC_MAX_PHONEMES = original;
    }
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it('reads variables from a .env file', () => {
    delete process.env.PHONETIC_MAX_PHONEMES;
    dir = mkdtempSync(join(tmpdir(), 'phonetic-env-'));
    const file = join(dir, '.env');
    writeFileSync(file, 'PHONETIC_MAX_PHONEMES=7\n');

    expect(getPhoneticConfig(loadPhoneticEnv(file)).maxPhonemes).toBe(7);
  });

  it('keeps variables that are already set', () => {
    process.env.PHONETIC_MAX_PHONEMES = '3';
    dir = mkdtempSync(join(tmpdir(), 'phonetic-env-'));
    const file = join(dir, '.env');
    writeFileSync(file, 'PHONETIC_MAX_PHONEMES=7\n');

    expect(getPhoneticConfig(loadPhoneticEnv(file)).maxPhonemes).toBe(3);
  });
});

describe('parseEngineOptions', () => {
  it('fills in defaults', () => {
    expect(parseEngineOptions({ nameType: 'gen', ruleType: 'exact' })).toEqual({
      nameType: 'gen',
      ruleType: 'exact',
      concat: true,
    });
  });

  it('rejects a non-positive cap', () => {
    expect(() => parseEngineOptions({ nameType: 'ash', ruleType: 'approx', maxPhonemes: -1 })).toThrow(
      /maxPhonemes/
    );
  });
});
