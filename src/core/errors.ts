/**
 * Raised when a chunker configuration breaks its invariant
 * (`0 <= chunkOverlap < chunkSize <= maxChunkSize`, `minChunkSize <= chunkSize`).
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
