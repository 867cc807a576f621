import type { Chunk } from "../types/chunker";
import { endsWithSentence } from "./boundaries";

/**
 * Fixed-width windows with overlap, ignoring text structure. Baseline for
 * {@link compareSplitters}.
 */
export function fixedSplit(text: string, chunkSize: number, chunkOverlap: number): Chunk[] {
  const chunks: Chunk[] = [];
  let start = 0;
  while (start < text.length) {
    const end = Math.min(start + chunkSize, text.length);
    const slice = text.slice(start, end);
    chunks.push({
      text: slice,
      startOffset: start,
      endOffset: end,
      index: chunks.length,
      endsOnSentence: endsWithSentence(slice),
      boundary: end === text.length ? "end_of_text" : "hard_cut",
    });
    if (end >= text.length) break;
    start = Math.max(end - chunkOverlap, start + 1);
  }
  return chunks;
}
