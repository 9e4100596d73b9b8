import { createLogger } from "./logger.js";
import { parseSeed } from "./prng.js";

export const SEED_ENV_VAR = "NAMEGEN_SEED";

export interface SeedSource {
  env?: NodeJS.ProcessEnv;
  now?: () => number;
}

/**
 * Seed from `NAMEGEN_SEED`, or from the clock when it is unset or not a
 * signed 64-bit decimal integer.
 */
export function resolveSeed({ env = process.env, now = Date.now }: SeedSource = {}): bigint {
  const raw = env[SEED_ENV_VAR];
  if (raw !== undefined && raw.trim() !== "") {
    const seed = parseSeed(raw);
    if (seed !== undefined) return seed;
    createLogger("config", env).warn(`Ignoring ${SEED_ENV_VAR}=${JSON.stringify(raw)}: not a signed 64-bit integer`);
  }
  return BigInt(Math.trunc(now()));
}
