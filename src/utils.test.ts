import { describe, expect, it } from "vitest";
import {
  chapterFilename,
  countVerses,
  generateAnchor,
  getChoiceArg,
  getNullableNumberArg,
  getNullableStringArg,
  getNumberArg,
  getPositionalArgs,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  isMissingFile,
  parseScriptLanguage,
  validateChapterSnapshot,
  validateExportMeta,
  validateUrl,
} from "./utils.js";

describe("generateAnchor", () => {
  it("converts simple titles", () => {
    expect(generateAnchor("Kanda 1 Sarga 2")).toBe("kanda-1-sarga-2");
  });

  it("keeps letters and vowel signs of other scripts", () => {
    expect(generateAnchor("బాలకాండ 1")).toBe("బాలకాండ-1");
    expect(generateAnchor("बालकाण्ड सर्ग")).toBe("बालकाण्ड-सर्ग");
  });

  it("removes punctuation", () => {
    expect(generateAnchor("Sarga 2: Valmiki's question?")).toBe("sarga-2-valmikis-question");
  });

  it("trims leading and trailing hyphens", () => {
    expect(generateAnchor(" Sarga ")).toBe("sarga");
  });
});

describe("chapterFilename", () => {
  it("pads the sarga number", () => {
    expect(chapterFilename(1, 7)).toBe("1-007.md");
    expect(chapterFilename(6, 128)).toBe("6-128.md");
  });
});

describe("hasHelpFlag", () => {
  it("returns true for --help", () => {
    expect(hasHelpFlag(["--help"])).toBe(true);
    expect(hasHelpFlag(["arg", "--help"])).toBe(true);
  });

  it("returns true for -h", () => {
    expect(hasHelpFlag(["-h"])).toBe(true);
  });

  it("returns false when no help flag present", () => {
    expect(hasHelpFlag([])).toBe(false);
    expect(hasHelpFlag(["--name", "value"])).toBe(false);
  });
});

describe("hasFlag", () => {
  it("matches the exact flag", () => {
    expect(hasFlag(["1", "1", "18", "--bookmark"], "--bookmark")).toBe(true);
    expect(hasFlag(["--bookmarks"], "--bookmark")).toBe(false);
  });
});

describe("getStringArg", () => {
  it("returns value when flag is present", () => {
    expect(getStringArg(["--name", "Bala Kanda"], "--name", "default")).toBe("Bala Kanda");
  });

  it("returns default when flag is missing", () => {
    expect(getStringArg(["--other", "value"], "--name", "default")).toBe("default");
  });

  it("returns default when flag has no value", () => {
    expect(getStringArg(["--name"], "--name", "default")).toBe("default");
  });

  it("returns default when value looks like a flag", () => {
    expect(getStringArg(["--name", "--other"], "--name", "default")).toBe("default");
  });

  it("returns last value when flag appears multiple times", () => {
    expect(getStringArg(["--name", "First", "--name", "Second"], "--name", "default")).toBe("Second");
  });
});

describe("getNullableStringArg", () => {
  it("returns value when flag is present", () => {
    expect(getNullableStringArg(["--source", "http://localhost/sloka"], "--source")).toBe("http://localhost/sloka");
  });

  it("returns null when flag is missing", () => {
    expect(getNullableStringArg(["--other", "value"], "--source")).toBeNull();
  });

  it("returns null when flag has no value", () => {
    expect(getNullableStringArg(["--source"], "--source")).toBeNull();
  });
});

describe("getNumberArg", () => {
  it("returns parsed number when flag is present", () => {
    expect(getNumberArg(["--delay", "2000"], "--delay", 1000)).toBe(2000);
  });

  it("returns default when flag is missing", () => {
    expect(getNumberArg(["--other", "500"], "--delay", 1000)).toBe(1000);
  });

  it("returns default when value is not a number", () => {
    expect(getNumberArg(["--delay", "abc"], "--delay", 1000)).toBe(1000);
  });

  it("handles zero as valid value", () => {
    expect(getNumberArg(["--delay", "0"], "--delay", 1000)).toBe(0);
  });
});

describe("getNullableNumberArg", () => {
  it("returns the parsed number", () => {
    expect(getNullableNumberArg(["--to", "12"], "--to")).toBe(12);
  });

  it("returns null when missing or not numeric", () => {
    expect(getNullableNumberArg([], "--to")).toBeNull();
    expect(getNullableNumberArg(["--to", "last"], "--to")).toBeNull();
  });
});

describe("getChoiceArg", () => {
  const choices = ["te", "dv"] as const;

  it("returns a listed value", () => {
    expect(getChoiceArg(["--lang", "dv"], "--lang", choices, "te")).toBe("dv");
  });

  it("falls back to the default for unlisted or missing values", () => {
    expect(getChoiceArg(["--lang", "xx"], "--lang", choices, "te")).toBe("te");
    expect(getChoiceArg([], "--lang", choices, "te")).toBe("te");
  });
});

describe("getPositionalArgs", () => {
  it("returns every non-flag argument in order", () => {
    expect(getPositionalArgs(["1", "2", "18"])).toEqual(["1", "2", "18"]);
  });

  it("skips values of known flags", () => {
    expect(getPositionalArgs(["--lang", "te", "1", "--script", "dv", "2", "3"], ["--lang", "--script"])).toEqual([
      "1",
      "2",
      "3",
    ]);
  });

  it("skips boolean and short flags", () => {
    expect(getPositionalArgs(["-h", "1", "--bookmark", "2"])).toEqual(["1", "2"]);
  });

  it("returns an empty list when there are none", () => {
    expect(getPositionalArgs(["--resume"])).toEqual([]);
  });
});

describe("parseScriptLanguage", () => {
  it("accepts supported scripts", () => {
    expect(parseScriptLanguage("te")).toBe("te");
    expect(parseScriptLanguage("dv")).toBe("dv");
  });

  it("rejects anything else", () => {
    expect(parseScriptLanguage("en")).toBeNull();
  });
});

describe("validateUrl", () => {
  it("accepts valid http and https URLs", () => {
    expect(validateUrl("http://localhost:8080/sloka")).toEqual({ isValid: true });
    expect(validateUrl("https://example.com/sloka")).toEqual({ isValid: true });
  });

  it("rejects empty URLs", () => {
    expect(validateUrl("")).toEqual({ isValid: false, error: "URL is required" });
  });

  it("rejects invalid URL format", () => {
    expect(validateUrl("not-a-url")).toEqual({ isValid: false, error: "Invalid URL format" });
  });

  it("rejects non-http/https protocols", () => {
    expect(validateUrl("ftp://example.com")).toEqual({ isValid: false, error: "URL must use http or https protocol" });
  });
});

describe("validateExportMeta", () => {
  const validMeta = {
    scrapedAt: "2024-01-01T00:00:00.000Z",
    book: 1,
    language: "te",
    chapters: [
      { book: 1, chapter: 1, verseCount: 77, url: "https://example.com/sloka?s=1", filename: "1-001.md" },
      { book: 1, chapter: 2, verseCount: 43, url: "https://example.com/sloka?s=2", filename: "1-002.md" },
    ],
  };

  it("accepts valid meta.json structure", () => {
    expect(validateExportMeta(validMeta)).toEqual({ isValid: true });
  });

  it("accepts meta with empty chapters array", () => {
    expect(validateExportMeta({ ...validMeta, chapters: [] })).toEqual({ isValid: true });
  });

  it("rejects non-objects", () => {
    expect(validateExportMeta(null)).toEqual({ isValid: false, error: "meta.json must be an object" });
    expect(validateExportMeta("meta")).toEqual({ isValid: false, error: "meta.json must be an object" });
  });

  it("rejects a missing scrapedAt", () => {
    const { scrapedAt: _, ...meta } = validMeta;
    expect(validateExportMeta(meta)).toEqual({
      isValid: false,
      error: "Missing or invalid field: scrapedAt (expected string)",
    });
  });

  it("rejects an invalid book", () => {
    expect(validateExportMeta({ ...validMeta, book: 0 })).toEqual({
      isValid: false,
      error: "Missing or invalid field: book (expected positive integer)",
    });
  });

  it("rejects an unknown language", () => {
    expect(validateExportMeta({ ...validMeta, language: "en" })).toEqual({
      isValid: false,
      error: "Missing or invalid field: language (expected te or dv)",
    });
  });

  it("rejects non-array chapters", () => {
    expect(validateExportMeta({ ...validMeta, chapters: {} })).toEqual({
      isValid: false,
      error: "Missing or invalid field: chapters (expected array)",
    });
  });

  it("reports the first invalid chapter field", () => {
    expect(validateExportMeta({ ...validMeta, chapters: [null] })).toEqual({
      isValid: false,
      error: "chapters[0] must be an object",
    });
    expect(validateExportMeta({ ...validMeta, chapters: [{ book: 1, chapter: 1, verseCount: 3 }] })).toEqual({
      isValid: false,
      error: "chapters[0].url must be a string",
    });
    expect(
      validateExportMeta({
        ...validMeta,
        chapters: [{ book: 1, chapter: 1, verseCount: "3", url: "u", filename: "f" }],
      }),
    ).toEqual({ isValid: false, error: "chapters[0].verseCount must be a number" });
  });
});

describe("countVerses", () => {
  it("sums verse counts", () => {
    expect(
      countVerses([
        { book: 1, chapter: 1, verseCount: 77, url: "", filename: "1-001.md" },
        { book: 1, chapter: 2, verseCount: 43, url: "", filename: "1-002.md" },
      ]),
    ).toBe(120);
    expect(countVerses([])).toBe(0);
  });
});

describe("validateChapterSnapshot", () => {
  const verse = {
    position: 1,
    numberText: "1.2.1",
    lines: ["పాదము ।"],
    glossary: [["పాదము", "line"]],
    explanation: "First.",
    issues: [],
  };
  const snapshot = { book: 1, chapter: 2, language: "te", verses: [verse] };

  it("accepts a saved chapter", () => {
    expect(validateChapterSnapshot(snapshot)).toEqual({ isValid: true });
  });

  it("accepts unnumbered verses with issues", () => {
    const unnumbered = {
      ...verse,
      numberText: null,
      issues: [{ kind: "MalformedBlock", missing: ["gloss"] }, { kind: "MissingVerseNumber" }],
    };

    expect(validateChapterSnapshot({ ...snapshot, verses: [unnumbered] })).toEqual({ isValid: true });
  });

  it("rejects non-objects", () => {
    expect(validateChapterSnapshot([])).toEqual({ isValid: false, error: "Missing or invalid field: book (expected positive integer)" });
    expect(validateChapterSnapshot(null)).toEqual({ isValid: false, error: "chapter file must be an object" });
  });

  it("rejects an unknown script", () => {
    expect(validateChapterSnapshot({ ...snapshot, language: "xx" })).toEqual({
      isValid: false,
      error: "Missing or invalid field: language (expected te or dv)",
    });
  });

  it("rejects a malformed glossary", () => {
    expect(validateChapterSnapshot({ ...snapshot, verses: [{ ...verse, glossary: [["పాదము"]] }] })).toEqual({
      isValid: false,
      error: "verses[0].glossary must be an array of [word, meaning] pairs",
    });
  });

  it("rejects unknown issues", () => {
    expect(validateChapterSnapshot({ ...snapshot, verses: [{ ...verse, issues: [{ kind: "Other" }] }] })).toEqual({
      isValid: false,
      error: "verses[0].issues must be an array of verse issues",
    });
    expect(
      validateChapterSnapshot({
        ...snapshot,
        verses: [{ ...verse, issues: [{ kind: "MalformedBlock", missing: ["title"] }] }],
      }),
    ).toEqual({ isValid: false, error: "verses[0].issues must be an array of verse issues" });
  });
});

describe("isMissingFile", () => {
  it("recognises ENOENT errors only", () => {
    expect(isMissingFile(Object.assign(new Error("no such file"), { code: "ENOENT" }))).toBe(true);
    expect(isMissingFile(Object.assign(new Error("denied"), { code: "EACCES" }))).toBe(false);
    expect(isMissingFile("ENOENT")).toBe(false);
  });
});
