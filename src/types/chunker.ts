// chunker.types.ts
import type { ILogger } from "./logger";

export interface ChunkerConfig {
  /** Target chunk length in characters. */
  chunkSize: number;
  /** Characters repeated at the start of the next chunk. */
  chunkOverlap: number;
  minChunkSize: number;
  maxChunkSize: number;
}

export type BoundaryKind = "paragraph_break" | "sentence_end" | "clause_break" | "hard_cut";

/** A break position found in the text, before scoring. */
export type Boundary = { position: number; kind: BoundaryKind };

export type BreakCandidate = Boundary & { score: number };

export type Chunk = {
  text: string;
  startOffset: number;
  endOffset: number;
  index: number;
  endsOnSentence: boolean;
  boundary: BoundaryKind | "end_of_text";
};

export type ChunkerContext = {
  logger?: ILogger;
};
