/**
 * Abbreviations whose trailing period does not end a sentence.
 * English and Portuguese entries are merged into one set; lookups are lower-cased.
 */
export const ABBREVIATIONS: ReadonlySet<string> = new Set(
  [
    // English
    "Mr.", "Mrs.", "Ms.", "Dr.", "Prof.", "St.", "Jr.", "Sr.",
    "etc.", "vs.", "i.e.", "e.g.", "cf.", "fig.", "approx.",
    "inc.", "corp.", "co.", "ltd.", "llc.",
    // Portuguese
    "Sra.", "Srta.", "Dra.", "Profa.", "pág.", "p.", "cap.", "vol.", "ed.", "art.", "nº.",
  ].map((a) => a.toLowerCase())
);

const LEADING_OPENERS = /^["'(\[“‘]+/;

/**
 * True when the whitespace-delimited token ending at `end` (exclusive, period included)
 * is a known abbreviation.
 */
export function endsWithAbbreviation(
  text: string,
  end: number,
  abbreviations: ReadonlySet<string> = ABBREVIATIONS
): boolean {
  let start = end;
  while (start > 0 && !/\s/.test(text[start - 1])) start--;
  const token = text.slice(start, end).replace(LEADING_OPENERS, "").toLowerCase();
  return abbreviations.has(token);
}
