import { readFileSync } from 'fs';
import { join } from 'path';
import { MissingResourceError, ResourceReadError } from '../errors.js';

/**
 * Source of raw rule text, addressed by resource name
 * (`gen_languages`, `ash_lang`, `sep_exact_common`, ...).
 */
export interface RuleResourceResolver {
  /** Human-readable origin, used in log messages. */
  readonly description: string;
  resolve(name: string): string;
}

/** Reads `<directory>/<name>.txt`. */
export class DirectoryResolver implements RuleResourceResolver {
  readonly description: string;

  constructor(private readonly directory: string) {
    this.description = `directory ${directory}`;
  }

  resolve(name: string): string {
    const file = join(this.directory, `${name}.txt`);
    try {
      return readFileSync(file, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new MissingResourceError(name, { cause: error });
      }
      throw new ResourceReadError(name, error);
    }
  }
}

/** Serves rule text held in memory. */
export class InMemoryResolver implements RuleResourceResolver {
  readonly description = 'in-memory resources';
  private readonly resources: ReadonlyMap<string, string>;

  constructor(resources: Record<string, string>) {
    this.resources = new Map(Object.entries(resources));
  }

  resolve(name: string): string {
    const text = this.resources.get(name);
    if (text === undefined) {
      throw new MissingResourceError(name);
    }
    return text;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
