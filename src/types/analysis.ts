/** Size thresholds for the small / medium / large histogram. */
export interface SizeBuckets {
  /** Chunks shorter than this are "small". */
  smallBelow: number;
  /** Chunks longer than this are "large". */
  largeAbove: number;
}

export type SizeDistribution = { small: number; medium: number; large: number };

export interface ChunkAnalysis {
  totalChunks: number;
  minSize: number;
  maxSize: number;
  averageSize: number;
  sentenceEndingCount: number;
  /** Fraction in [0, 1]. */
  sentenceEndingRatio: number;
  sizeDistribution: SizeDistribution;
}

export type SplitterComparison = {
  boundary: ChunkAnalysis;
  fixed: ChunkAnalysis;
};
