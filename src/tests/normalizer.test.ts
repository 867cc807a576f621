import { describe, expect, it } from "vitest";
import {
  collapseLineBreaks,
  collapseWhitespace,
  normalize,
  normalizePunctuation,
  stripPageNumbers,
} from "../core/normalizer";

describe("collapseWhitespace", () => {
  it("turns CR line endings into LF and squeezes horizontal runs", () => {
    expect(collapseWhitespace("a\t\tb  c\r\nd\re")).toBe("a b c\nd\ne");
  });
});

describe("stripPageNumbers", () => {
  it("drops lines holding only a number", () => {
    expect(stripPageNumbers("Intro text\n12\nMore text")).toBe("Intro text\nMore text");
    expect(stripPageNumbers("Total: 42 items\n7\n")).toBe("Total: 42 items\n");
  });

  it("keeps numbers that start a line of prose", () => {
    expect(stripPageNumbers("the year\n1999 was good")).toBe("the year\n1999 was good");
  });
});

describe("collapseLineBreaks", () => {
  it("keeps one paragraph break and joins wrapped lines", () => {
    expect(collapseLineBreaks("line one\nline two\n\n\n\nnext para")).toBe(
      "line one line two\n\nnext para"
    );
  });

  it("drops spaces around a wrapped newline", () => {
    expect(collapseLineBreaks("a \n b")).toBe("a b");
  });
});

describe("normalizePunctuation", () => {
  it("removes spaces before punctuation", () => {
    expect(normalizePunctuation("Hello , world !")).toBe("Hello, world!");
  });

  it("adds a space after glued clause punctuation", () => {
    expect(normalizePunctuation("one,two;three")).toBe("one, two; three");
  });

  it("adds a space after a period glued to a capitalised word", () => {
    expect(normalizePunctuation("end of text.Next one")).toBe("end of text. Next one");
  });

  it("leaves a period glued to a lowercase word alone", () => {
    expect(normalizePunctuation("end.the")).toBe("end.the");
    expect(normalizePunctuation("A.B")).toBe("A.B");
  });

  it("leaves decimals, abbreviations and hostnames alone", () => {
    const text = "Pi is 3.14 and e.g. example.com in the U.S.A today";
    expect(normalizePunctuation(text)).toBe(text);
  });
});

describe("normalize", () => {
  const raw = "  Chapter  One\n\n\n3\n\nThe  cat sat .\nIt was\tlate.  \r\n";

  it("cleans extracted page text", () => {
    expect(normalize(raw)).toBe("Chapter One\n\nThe cat sat. It was late.");
  });

  it("is idempotent", () => {
    const once = normalize(raw);
    expect(normalize(once)).toBe(once);
  });

  it.each([
    "Intro\r\n\r\n12\r\nBody text , here .Next",
    "page one\fpage two\f\f3\f",
    "one,two;three!four?Five",
    "word.Next and word:Label",
    "  \u00a0 lead\t\ttrail \n \n\n 7 \n tail ",
    "Quote: \"done.\"\n\n\n(Aside.)\nend",
    "x , , y . . z",
  ])("is idempotent on %j", (input) => {
    const once = normalize(input);
    expect(normalize(once)).toBe(once);
  });

  it("reduces whitespace-only input to the empty string", () => {
    expect(normalize("  \n\t\n ")).toBe("");
    expect(normalize("")).toBe("");
  });
});
