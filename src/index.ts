export {
  WordCatalog,
  defaultCatalog,
  loadCatalogFile,
  loadDefaultCatalog,
  DEFAULT_CATALOG_PATH,
  type WordLists,
} from "./catalog.js";
export { resolveSeed, SEED_ENV_VAR, type SeedSource } from "./config.js";
export { NameGenError, CatalogIntegrityError, InvalidSeedError } from "./errors.js";
export { createLogger, resolveLogLevel, DEFAULT_LOG_LEVEL, type Logger, type LogLevel } from "./logger.js";
export {
  SeededNameGenerator,
  createNameGenerator,
  take,
  parseName,
  NAME_SEPARATOR,
  type NameGenerator,
  type NameParts,
  type CreateNameGeneratorOptions,
} from "./names.js";
export { Prng, toSeed, parseSeed, MIN_SEED, MAX_SEED, type Seed } from "./prng.js";
