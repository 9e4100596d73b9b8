import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { CatalogIntegrityError } from "./errors.js";
import { createLogger } from "./logger.js";

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../data/words.json", import.meta.url));

const WORD_PATTERN = /^[a-z]+$/;

const log = createLogger("catalog");

export interface WordLists {
  adjectives: readonly string[];
  nouns: readonly string[];
}

function validateList(source: string, kind: string, words: readonly string[]): readonly string[] {
  if (words.length === 0) {
    throw new CatalogIntegrityError(source, `${kind} list is empty`);
  }
  const seen = new Set<string>();
  for (const word of words) {
    if (!WORD_PATTERN.test(word)) {
      throw new CatalogIntegrityError(source, `${kind} "${word}" is not a lowercase ASCII word`);
    }
    if (seen.has(word)) {
      throw new CatalogIntegrityError(source, `duplicate ${kind} "${word}"`);
    }
    seen.add(word);
  }
  return Object.freeze([...words]);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/** Two fixed, indexable word lists. Frozen on construction. */
export class WordCatalog {
  readonly adjectives: readonly string[];
  readonly nouns: readonly string[];
  private adjectiveSet: ReadonlySet<string>;
  private nounSet: ReadonlySet<string>;

  private constructor(lists: WordLists) {
    this.adjectives = lists.adjectives;
    this.nouns = lists.nouns;
    this.adjectiveSet = new Set(lists.adjectives);
    this.nounSet = new Set(lists.nouns);
    Object.freeze(this);
  }

  static fromLists(adjectives: readonly string[], nouns: readonly string[], source = "inline"): WordCatalog {
    return new WordCatalog({
      adjectives: validateList(source, "adjective", adjectives),
      nouns: validateList(source, "noun", nouns),
    });
  }

  static fromJSON(raw: string, source = "inline"): WordCatalog {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new CatalogIntegrityError(source, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }
    if (typeof parsed !== "object" || parsed === null || !("adjectives" in parsed) || !("nouns" in parsed)) {
      throw new CatalogIntegrityError(source, "expected an object with adjectives and nouns");
    }
    const { adjectives, nouns } = parsed;
    if (!isStringArray(adjectives) || !isStringArray(nouns)) {
      throw new CatalogIntegrityError(source, "adjectives and nouns must be arrays of strings");
    }
    return WordCatalog.fromLists(adjectives, nouns, source);
  }

  adjectiveCount(): number {
    return this.adjectives.length;
  }

  nounCount(): number {
    return this.nouns.length;
  }

  adjectiveAt(index: number): string {
    return wordAt(this.adjectives, index, "adjective");
  }

  nounAt(index: number): string {
    return wordAt(this.nouns, index, "noun");
  }

  hasAdjective(word: string): boolean {
    return this.adjectiveSet.has(word);
  }

  hasNoun(word: string): boolean {
    return this.nounSet.has(word);
  }
}

function wordAt(words: readonly string[], index: number, kind: string): string {
  const word = Number.isInteger(index) ? words[index] : undefined;
  if (word === undefined) {
    throw new RangeError(`${kind} index ${index} outside [0, ${words.length})`);
  }
  return word;
}

export function loadCatalogFile(path: string): WordCatalog {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new CatalogIntegrityError(path, `unreadable (${err instanceof Error ? err.message : String(err)})`);
  }
  return WordCatalog.fromJSON(raw, path);
}

export function loadDefaultCatalog(): WordCatalog {
  const catalog = loadCatalogFile(DEFAULT_CATALOG_PATH);
  log.debug(`Loaded ${catalog.adjectiveCount()} adjectives and ${catalog.nounCount()} nouns`);
  return catalog;
}

/** The bundled catalog, read once when this module loads. */
export const defaultCatalog = loadDefaultCatalog();
