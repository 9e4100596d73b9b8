import { defaultCatalog, type WordCatalog } from "./catalog.js";
import { resolveSeed, type SeedSource } from "./config.js";
import { Prng, type Seed } from "./prng.js";

/** Anything that can produce the next placeholder name. */
export interface NameGenerator {
  generate(): string;
}

export const NAME_SEPARATOR = "-";

/**
 * Draws `adjective-noun` names from a catalog with its own SplitMix64 state.
 * Two instances built from the same seed and catalog yield the same
 * sequence. Not meant to be shared between workers: give each one its own.
 */
export class SeededNameGenerator implements NameGenerator, Iterable<string> {
  private readonly prng: Prng;
  private readonly catalog: WordCatalog;

  constructor(seed: Seed, catalog: WordCatalog = defaultCatalog) {
    this.prng = new Prng(seed);
    this.catalog = catalog;
  }

  generate(): string {
    const adjective = this.catalog.adjectiveAt(this.prng.nextBelow(this.catalog.adjectiveCount()));
    const noun = this.catalog.nounAt(this.prng.nextBelow(this.catalog.nounCount()));
    return `${adjective}${NAME_SEPARATOR}${noun}`;
  }

  /** Infinite; shares state with generate(), so it cannot be restarted. */
  *[Symbol.iterator](): Iterator<string> {
    for (;;) {
      yield this.generate();
    }
  }
}

export interface CreateNameGeneratorOptions extends SeedSource {
  catalog?: WordCatalog;
}

/** Seeds from the environment (see resolveSeed) when no seed is given. */
export function createNameGenerator(seed?: Seed, options: CreateNameGeneratorOptions = {}): SeededNameGenerator {
  const { catalog = defaultCatalog, ...source } = options;
  return new SeededNameGenerator(seed ?? resolveSeed(source), catalog);
}

export function take(generator: NameGenerator, count: number): string[] {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new RangeError(`count must be a non-negative integer, got ${count}`);
  }
  const names: string[] = [];
  for (let i = 0; i < count; i++) {
    names.push(generator.generate());
  }
  return names;
}

export interface NameParts {
  adjective: string;
  noun: string;
}

export function parseName(name: string, catalog: WordCatalog = defaultCatalog): NameParts | undefined {
  const parts = name.split(NAME_SEPARATOR);
  if (parts.length !== 2) return undefined;
  const [adjective, noun] = parts;
  if (adjective === undefined || noun === undefined) return undefined;
  if (!catalog.hasAdjective(adjective) || !catalog.hasNoun(noun)) return undefined;
  return { adjective, noun };
}
