import type { Env } from "../types/env";
import { env } from "std-env";

/**
 * Retrieves an environment variable in a runtime-agnostic way.
 * Falls back to `defaultValue`, and throws when neither is set.
 */
export function getEnv<K extends keyof Env>(key: K, defaultValue?: Env[K]): Env[K] {
  return env[key] ?? defaultValue ?? throwMissingKeyError(key);
}

/** Helper function to throw an error when a key is missing */
const throwMissingKeyError = (key: string): never => {
  throw new Error(`Missing environment variable: ${key}`);
};

/**
 * Sets an environment variable in a runtime-agnostic way.
 */
export function setEnv<K extends keyof Env>(key: K, value: Env[K]): boolean {
  env[key] = value;
  return true;
}
