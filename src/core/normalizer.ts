/* ────────────────────────────────────────────────────────────────────────── */
/* Text normalization for extracted page text                                 */
/* ────────────────────────────────────────────────────────────────────────── */

const HORIZONTAL_WS = /[ \t\f\v\u00a0]+/g;
const PAGE_NUMBER_LINE = /^ ?\d+ ?(?:\n|$)/gm;
const SPACE_AROUND_NEWLINE = / ?\n ?/g;
const PARAGRAPH_BREAK = /\n{2,}/g;
const WRAPPED_LINE = /(?<!\n)\n(?!\n)/g;
const SPACE_BEFORE_PUNCT = / +([.,;:!?])/g;
const CLAUSE_PUNCT_GLUED = /([,;!?])(?=\p{L})/gu;
const PERIOD_GLUED = /(\p{Ll}{2}[.:])(?=\p{Lu})/gu;

export function collapseWhitespace(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(HORIZONTAL_WS, " ");
}

export function stripPageNumbers(text: string): string {
  return text.replace(PAGE_NUMBER_LINE, "");
}

/** Blank-line runs become one `\n\n`; a lone newline (a wrapped line) becomes a space. */
export function collapseLineBreaks(text: string): string {
  return text
    .replace(SPACE_AROUND_NEWLINE, "\n")
    .replace(PARAGRAPH_BREAK, "\n\n")
    .replace(WRAPPED_LINE, " ")
    .replace(/ {2,}/g, " ");
}

export function normalizePunctuation(text: string): string {
  return text
    .replace(SPACE_BEFORE_PUNCT, "$1")
    .replace(CLAUSE_PUNCT_GLUED, "$1 ")
    .replace(PERIOD_GLUED, "$1 ");
}

/**
 * Cleans raw extracted text: collapses whitespace while keeping paragraph breaks,
 * drops page-number lines, fixes spacing around punctuation, and trims.
 * Idempotent.
 */
export function normalize(raw: string): string {
  const lines = stripPageNumbers(collapseWhitespace(raw));
  return normalizePunctuation(collapseLineBreaks(lines)).trim();
}
