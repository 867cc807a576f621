// ./types/env.ts
export interface Env {
  // File paths and directories
  LOG_PATH: string;
  OUTPUT_DIR: string;

  // Chunker configuration
  CHUNK_SIZE: string;
  CHUNK_OVERLAP: string;
  MIN_CHUNK_SIZE: string;
  MAX_CHUNK_SIZE: string;
}
