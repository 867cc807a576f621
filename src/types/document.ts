import type { ChunkAnalysis } from "./analysis";
import type { Chunk, ChunkerConfig } from "./chunker";

export type DocumentPage = {
  text: string;
  /** 1-based page number, when the extractor knows it. */
  page?: number;
};

export type DocumentInput = {
  source: string;
  pages: DocumentPage[];
};

export type ChunkMetadata = {
  source: string;
  page?: number;
  /** Position of the chunk across the whole document. */
  chunkIndex: number;
  chunkSize: number;
  splitMethod: "boundary";
};

export type DocumentChunk = Chunk & { metadata: ChunkMetadata };

export type DocumentResult = {
  source: string;
  chunks: DocumentChunk[];
  analysis: ChunkAnalysis;
};

// pipeline document states
export type DocState = { input: DocumentInput; config: Readonly<ChunkerConfig> };
export type NormalizedPages = DocState & { pages: DocumentPage[] };
export type SplitPages = NormalizedPages & { pageChunks: Chunk[][] };
export type AnnotatedDoc = DocState & { chunks: DocumentChunk[] };
