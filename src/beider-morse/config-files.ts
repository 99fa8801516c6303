import { DEFAULT_MAX_PHONEMES, getPhoneticConfig, loadPhoneticEnv } from '../config.js';
import { InvalidOptionsError } from '../errors.js';
import { createLogger, setLogLevel } from '../logger.js';
import { loadLangs, type Lang } from './lang.js';
import { Languages } from './languages.js';
import { DEFAULT_NAME_PREFIXES, type NamePrefixes } from './name-prefixes.js';
import type { NameType } from './name-type.js';
import { DirectoryResolver, type RuleResourceResolver } from './resources.js';
import { Rules } from './rules.js';

const log = createLogger('BeiderMorse');

export interface ConfigFilesOptions {
  namePrefixes?: NamePrefixes;
  /** Phoneme cap for engines that do not set their own. */
  maxPhonemes?: number;
}

/**
 * Everything a Beider-Morse engine needs, parsed once and shared read-only
 * between engines: language lists, language-guess rules, rule tables and
 * nobiliary particles.
 */
export class ConfigFiles {
  private constructor(
    readonly languages: Languages,
    private readonly langs: Readonly<Record<NameType, Lang>>,
    readonly rules: Rules,
    readonly namePrefixes: NamePrefixes,
    readonly maxPhonemes: number
  ) {
    Object.freeze(this);
  }

  static load(resolver: RuleResourceResolver, options: ConfigFilesOptions = {}): ConfigFiles {
    const languages = Languages.load(resolver);
    const langs = loadLangs(resolver, languages);
    const rules = Rules.load(resolver, languages);

    log.info(`Loaded ${rules.size} rule tables from ${resolver.description}`);
    return new ConfigFiles(
      languages,
      langs,
      rules,
      options.namePrefixes ?? DEFAULT_NAME_PREFIXES,
      options.maxPhonemes ?? DEFAULT_MAX_PHONEMES
    );
  }

  static fromDirectory(directory: string, options: ConfigFilesOptions = {}): ConfigFiles {
    return ConfigFiles.load(new DirectoryResolver(directory), options);
  }

  /**
   * Load from `PHONETIC_BM_RULES_DIR`, applying `PHONETIC_LOG_LEVEL` first.
   * Without an explicit `env`, `process.env` is read after merging `./.env`.
   * `PHONETIC_MAX_PHONEMES` becomes the default engine cap.
   */
  static fromEnv(env: NodeJS.ProcessEnv = loadPhoneticEnv()): ConfigFiles {
    const config = getPhoneticConfig(env);
    setLogLevel(config.logLevel);
    if (!config.rulesDir) {
      throw new InvalidOptionsError('PHONETIC_BM_RULES_DIR environment variable is required');
    }
    return ConfigFiles.fromDirectory(config.rulesDir, { maxPhonemes: config.maxPhonemes });
  }

  lang(nameType: NameType): Lang {
    return this.langs[nameType];
  }
}
