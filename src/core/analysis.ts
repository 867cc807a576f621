import type { ChunkAnalysis, SizeBuckets, SplitterComparison } from "../types/analysis";
import type { Chunk, ChunkerConfig } from "../types/chunker";
import { splitNormalized } from "./chunker";
import { validateConfig } from "./config";
import { fixedSplit } from "./fixed-splitter";
import { normalize } from "./normalizer";

export const DEFAULT_SIZE_BUCKETS: Readonly<SizeBuckets> = Object.freeze({
  smallBelow: 500,
  largeAbove: 1000,
});

/**
 * Count, size spread, sentence-ending share and a small/medium/large histogram
 * for a chunk sequence. An empty sequence yields all zeros.
 */
export function analyzeChunks(
  chunks: readonly Chunk[],
  buckets: SizeBuckets = DEFAULT_SIZE_BUCKETS
): ChunkAnalysis {
  const sizeDistribution = { small: 0, medium: 0, large: 0 };
  if (chunks.length === 0) {
    return {
      totalChunks: 0,
      minSize: 0,
      maxSize: 0,
      averageSize: 0,
      sentenceEndingCount: 0,
      sentenceEndingRatio: 0,
      sizeDistribution,
    };
  }

  const sizes = chunks.map((c) => c.text.length);
  for (const size of sizes) {
    if (size < buckets.smallBelow) sizeDistribution.small++;
    else if (size > buckets.largeAbove) sizeDistribution.large++;
    else sizeDistribution.medium++;
  }
  const sentenceEndingCount = chunks.filter((c) => c.endsOnSentence).length;

  return {
    totalChunks: chunks.length,
    minSize: Math.min(...sizes),
    maxSize: Math.max(...sizes),
    averageSize: sizes.reduce((sum, s) => sum + s, 0) / sizes.length,
    sentenceEndingCount,
    sentenceEndingRatio: sentenceEndingCount / chunks.length,
    sizeDistribution,
  };
}

/** Report lines for logging. */
export function formatAnalysis(analysis: ChunkAnalysis): string[] {
  const { small, medium, large } = analysis.sizeDistribution;
  return [
    `total_chunks: ${analysis.totalChunks}`,
    `avg_chunk_size: ${analysis.averageSize.toFixed(0)}`,
    `min_chunk_size: ${analysis.minSize}`,
    `max_chunk_size: ${analysis.maxSize}`,
    `complete_sentences: ${analysis.sentenceEndingCount} (${(analysis.sentenceEndingRatio * 100).toFixed(1)}%)`,
    `size_distribution: small=${small} medium=${medium} large=${large}`,
  ];
}

/**
 * Splits the same text with the boundary chunker and with fixed-width windows
 * of the same size and overlap, and analyzes both.
 */
export function compareSplitters(
  text: string,
  config: Readonly<ChunkerConfig>,
  buckets: SizeBuckets = DEFAULT_SIZE_BUCKETS
): SplitterComparison {
  validateConfig(config);
  const normalized = normalize(text);
  return {
    boundary: analyzeChunks(splitNormalized(normalized, config), buckets),
    fixed: analyzeChunks(fixedSplit(normalized, config.chunkSize, config.chunkOverlap), buckets),
  };
}
