/**
 * Corpus Loader
 *
 * Loads a domain's examples, capsule excerpt and function signatures from
 * the corpus directory. Each domain is read once per loader; the loader is
 * created by the translator and injected, so there is no module-level cache.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { DOMAIN_DEFINITIONS, type DomainDefinition } from '../../config/domains.js';
import { DEFAULTS } from '../../config/defaults.js';
import { CorpusError } from '../../core/errors.js';
import { createLogger } from '../../core/logger.js';
import type { Domain, DomainCorpus } from '../../core/types.js';
import { parseExampleFile } from './example-parser.js';
import { parseFunctionSignatures } from './function-signatures.js';

const log = createLogger('corpus-loader');

export interface CorpusLoaderOptions {
  /** Directory holding `<domain>/...` corpus files */
  corpusDir: string;
  definitions?: Record<Domain, DomainDefinition>;
  capsuleReadLimit?: number;
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new CorpusError(
      `Could not read corpus file: ${filePath}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

export class CorpusLoader {
  private readonly corpusDir: string;
  private readonly definitions: Record<Domain, DomainDefinition>;
  private readonly capsuleReadLimit: number;
  private readonly loaded = new Map<Domain, Promise<DomainCorpus>>();

  constructor(options: CorpusLoaderOptions) {
    this.corpusDir = options.corpusDir;
    this.definitions = options.definitions ?? DOMAIN_DEFINITIONS;
    this.capsuleReadLimit = options.capsuleReadLimit ?? DEFAULTS.CAPSULE_READ_LIMIT;
  }

  /**
   * Load (or return the cached) corpus for a domain. A failed load is not
   * cached.
   */
  load(domain: Domain): Promise<DomainCorpus> {
    const cached = this.loaded.get(domain);
    if (cached) {
      return cached;
    }

    const pending = this.read(domain).catch((error: unknown) => {
      this.loaded.delete(domain);
      throw error;
    });
    this.loaded.set(domain, pending);
    return pending;
  }

  private resolve(relativePath: string): string {
    return path.join(this.corpusDir, relativePath);
  }

  private async read(domain: Domain): Promise<DomainCorpus> {
    const definition = this.definitions[domain];

    const exampleLists = await Promise.all(
      definition.exampleFiles.map((file) => parseExampleFile(this.resolve(file)))
    );
    const examples = exampleLists.flat();

    let capsule = '';
    if (definition.capsuleFile) {
      const raw = await readOptional(this.resolve(definition.capsuleFile));
      if (raw !== null) {
        capsule = raw.length > this.capsuleReadLimit ? `${raw.slice(0, this.capsuleReadLimit)}...` : raw;
      }
    }

    let functions: DomainCorpus['functions'] = [];
    if (definition.functionsFile) {
      const raw = await readOptional(this.resolve(definition.functionsFile));
      if (raw !== null) {
        functions = parseFunctionSignatures(raw);
      }
    }

    if (examples.length === 0) {
      log.warn({ domain, corpusDir: this.corpusDir }, 'No examples found for domain');
    }
    log.debug(
      { domain, examples: examples.length, functions: functions.length, capsuleChars: capsule.length },
      'Corpus loaded'
    );

    return { domain, examples, capsule, functions };
  }
}
