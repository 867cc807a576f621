// chunker.ts — boundary-aware splitting
import type { Boundary, BoundaryKind, Chunk, ChunkerConfig, ChunkerContext } from "../types/chunker";
import { validateConfig } from "./config";
import { normalize } from "./normalizer";
import { SLACK_RATIO, endsWithSentence, findBoundaries, selectBreak } from "./boundaries";

/* ────────────────────────────────────────────────────────────────────────── */
/* Small pure utilities                                                       */
/* ────────────────────────────────────────────────────────────────────────── */

type Cut = { end: number; kind: BoundaryKind | "end_of_text" };

export function lookahead(chunkSize: number): number {
  return Math.floor(chunkSize * SLACK_RATIO);
}

/**
 * Chooses where the chunk starting at `p` ends. Returns the end offset and the
 * kind of break that produced it.
 */
export function findCut(
  text: string,
  boundaries: readonly Boundary[],
  p: number,
  config: ChunkerConfig
): Cut {
  const { chunkSize, minChunkSize, maxChunkSize } = config;
  const idealEnd = p + chunkSize;
  if (idealEnd >= text.length) return { end: text.length, kind: "end_of_text" };

  // breaks closer than minChunkSize are never considered, so a non-final chunk
  // is never undersized: the window starts past them
  const lo = Math.max(p + minChunkSize, p + 1);
  const hi = Math.min(idealEnd + lookahead(chunkSize), p + maxChunkSize, text.length);
  const best = selectBreak(boundaries, lo, hi, idealEnd, chunkSize);
  if (best) return { end: best.position, kind: best.kind };

  return { end: Math.min(idealEnd, p + maxChunkSize), kind: "hard_cut" };
}

function toChunk(text: string, start: number, cut: Cut, index: number): Chunk {
  const slice = text.slice(start, cut.end);
  const endsOnSentence =
    cut.kind === "end_of_text"
      ? endsWithSentence(slice)
      : cut.kind === "sentence_end" || cut.kind === "paragraph_break";
  return { text: slice, startOffset: start, endOffset: cut.end, index, endsOnSentence, boundary: cut.kind };
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Public API                                                                 */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Splits already-normalized `text` into overlapping chunks. The config is assumed valid.
 */
export function splitNormalized(text: string, config: Readonly<ChunkerConfig>): Chunk[] {
  if (text.length === 0) return [];

  const boundaries = findBoundaries(text);
  const chunks: Chunk[] = [];
  let p = 0;

  while (p < text.length) {
    const cut = findCut(text, boundaries, p, config);
    chunks.push(toChunk(text, p, cut, chunks.length));
    if (cut.end >= text.length) break;
    p = Math.max(cut.end - config.chunkOverlap, p + 1);
  }

  return chunks;
}

/**
 * Normalizes `text` and splits it into chunks whose offsets index the normalized text.
 *
 * @throws ConfigError when `config` violates its invariant; nothing is scanned in that case.
 */
export function split(text: string, config: Readonly<ChunkerConfig>, ctx: ChunkerContext = {}): Chunk[] {
  validateConfig(config);

  const normalized = normalize(text);
  const chunks = splitNormalized(normalized, config);

  const hardCuts = chunks.filter((c) => c.boundary === "hard_cut");
  for (const c of hardCuts) {
    ctx.logger?.warn(`Chunker: hard cut at offset ${c.endOffset} (chunk ${c.index})`);
  }
  ctx.logger?.info(`Chunker: produced ${chunks.length} chunks from ${normalized.length} chars`);
  return chunks;
}
