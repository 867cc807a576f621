import type { Boundary, BoundaryKind, BreakCandidate } from "../types/chunker";
import { ABBREVIATIONS, endsWithAbbreviation } from "./abbreviations";

/* ────────────────────────────────────────────────────────────────────────── */
/* Boundary kinds and their weights                                           */
/* ────────────────────────────────────────────────────────────────────────── */

/** Kind → weight. Distance penalties are subtracted from these. */
export const BOUNDARY_WEIGHTS: Readonly<Record<BoundaryKind, number>> = {
  paragraph_break: 1.0,
  sentence_end: 0.8,
  clause_break: 0.4,
  hard_cut: 0,
};

/** A candidate must score strictly above this to beat a hard cut. */
export const MIN_ACCEPT_SCORE = 0;

/** Lookahead past the ideal end, as a fraction of chunkSize. */
export const SLACK_RATIO = 0.2;

const PARAGRAPH_RE = /\n\n/g;
// group 1: the terminal punctuation run, group 2: closing quotes/brackets
const SENTENCE_RE = /([.!?]+)(["'”’)\]]*)(?=\s|$)/g;
const CLAUSE_RE = /[,;:](?=\s)/g;
const SENTENCE_TAIL_RE = /([.!?]+)["'”’)\]]*\s*$/;

/* ────────────────────────────────────────────────────────────────────────── */
/* Detection                                                                  */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Finds every break position in `text`, sorted by position. When several kinds
 * land on one position, the heaviest kind is kept (paragraph > sentence > clause).
 */
export function findBoundaries(
  text: string,
  abbreviations: ReadonlySet<string> = ABBREVIATIONS
): Boundary[] {
  const byPosition = new Map<number, BoundaryKind>();
  const add = (position: number, kind: BoundaryKind) => {
    const existing = byPosition.get(position);
    if (!existing || BOUNDARY_WEIGHTS[kind] > BOUNDARY_WEIGHTS[existing]) {
      byPosition.set(position, kind);
    }
  };

  for (const m of execAll(PARAGRAPH_RE, text)) {
    add(m.index, "paragraph_break");
  }
  for (const m of execAll(SENTENCE_RE, text)) {
    const afterPunct = m.index + m[1].length;
    if (m[1] === "." && endsWithAbbreviation(text, afterPunct, abbreviations)) continue;
    add(afterPunct + m[2].length, "sentence_end");
  }
  for (const m of execAll(CLAUSE_RE, text)) {
    add(m.index + 1, "clause_break");
  }

  return [...byPosition.entries()]
    .map(([position, kind]) => ({ position, kind }))
    .sort((a, b) => a.position - b.position);
}

function* execAll(pattern: RegExp, text: string): Generator<RegExpExecArray> {
  const re = new RegExp(pattern.source, pattern.flags);
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) yield m;
}

/**
 * True when `text` ends on sentence punctuation, optionally followed by closers.
 * A lone period closing a known abbreviation does not count.
 */
export function endsWithSentence(
  text: string,
  abbreviations: ReadonlySet<string> = ABBREVIATIONS
): boolean {
  const m = SENTENCE_TAIL_RE.exec(text);
  if (!m) return false;
  return !(m[1] === "." && endsWithAbbreviation(text, m.index + 1, abbreviations));
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Scoring & selection                                                        */
/* ────────────────────────────────────────────────────────────────────────── */

export function scoreBoundary(boundary: Boundary, idealEnd: number, chunkSize: number): BreakCandidate {
  const penalty = Math.abs(boundary.position - idealEnd) / chunkSize;
  return { ...boundary, score: BOUNDARY_WEIGHTS[boundary.kind] - penalty };
}

/**
 * Orders candidates best-first: higher score, then closer to `idealEnd`,
 * then earlier position.
 */
export function compareCandidates(idealEnd: number) {
  return (a: BreakCandidate, b: BreakCandidate): number =>
    b.score - a.score ||
    Math.abs(a.position - idealEnd) - Math.abs(b.position - idealEnd) ||
    a.position - b.position;
}

/**
 * Picks the best-scoring boundary with `lo <= position <= hi`, or `undefined`
 * if none clears {@link MIN_ACCEPT_SCORE}.
 */
export function selectBreak(
  boundaries: readonly Boundary[],
  lo: number,
  hi: number,
  idealEnd: number,
  chunkSize: number
): BreakCandidate | undefined {
  const candidates: BreakCandidate[] = [];
  // scan backward from the lookahead edge; boundaries are sorted by position
  for (let i = upperIndex(boundaries, hi); i >= 0 && boundaries[i].position >= lo; i--) {
    const scored = scoreBoundary(boundaries[i], idealEnd, chunkSize);
    if (scored.score > MIN_ACCEPT_SCORE) candidates.push(scored);
  }
  return candidates.sort(compareCandidates(idealEnd))[0];
}

/** Index of the last boundary with position <= `hi`, or -1. */
function upperIndex(boundaries: readonly Boundary[], hi: number): number {
  let low = 0;
  let high = boundaries.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (boundaries[mid].position <= hi) low = mid + 1;
    else high = mid;
  }
  return low - 1;
}
