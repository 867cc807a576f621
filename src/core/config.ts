import type { ChunkerConfig } from "../types/chunker";
import type { Env } from "../types/env";
import { getEnv } from "./env";
import { ConfigError } from "./errors";

export const DEFAULT_CONFIG: Readonly<ChunkerConfig> = Object.freeze({
  chunkSize: 1000,
  chunkOverlap: 150,
  minChunkSize: 200,
  maxChunkSize: 2000,
});

/**
 * Throws a {@link ConfigError} unless every field is a non-negative integer and
 * `0 <= chunkOverlap < chunkSize <= maxChunkSize`, `minChunkSize <= chunkSize`.
 */
export function validateConfig(config: ChunkerConfig): void {
  for (const [key, value] of Object.entries(config)) {
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigError(`${key} must be a non-negative integer, got ${value}`);
    }
  }

  const { chunkSize, chunkOverlap, minChunkSize, maxChunkSize } = config;
  if (chunkSize === 0) {
    throw new ConfigError("chunkSize must be greater than 0");
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigError(`chunkOverlap (${chunkOverlap}) must be less than chunkSize (${chunkSize})`);
  }
  if (chunkSize > maxChunkSize) {
    throw new ConfigError(`chunkSize (${chunkSize}) must not exceed maxChunkSize (${maxChunkSize})`);
  }
  if (minChunkSize > chunkSize) {
    throw new ConfigError(`minChunkSize (${minChunkSize}) must not exceed chunkSize (${chunkSize})`);
  }
}

/** Merges `overrides` over the defaults, validates, and freezes the result. */
export function createConfig(overrides: Partial<ChunkerConfig> = {}): Readonly<ChunkerConfig> {
  const config: ChunkerConfig = { ...DEFAULT_CONFIG, ...overrides };
  validateConfig(config);
  return Object.freeze(config);
}

// unset and blank values both fall back
function readInt(key: keyof Env, fallback: number): number {
  const raw = getEnv(key, "").trim();
  if (raw === "") return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  }
  return Number(raw);
}

/**
 * Builds a config from CHUNK_SIZE, CHUNK_OVERLAP, MIN_CHUNK_SIZE and MAX_CHUNK_SIZE,
 * falling back to {@link DEFAULT_CONFIG} for unset keys.
 */
export function configFromEnv(): Readonly<ChunkerConfig> {
  return createConfig({
    chunkSize: readInt("CHUNK_SIZE", DEFAULT_CONFIG.chunkSize),
    chunkOverlap: readInt("CHUNK_OVERLAP", DEFAULT_CONFIG.chunkOverlap),
    minChunkSize: readInt("MIN_CHUNK_SIZE", DEFAULT_CONFIG.minChunkSize),
    maxChunkSize: readInt("MAX_CHUNK_SIZE", DEFAULT_CONFIG.maxChunkSize),
  });
}
