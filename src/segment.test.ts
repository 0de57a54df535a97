import { describe, expect, it } from "vitest";
import {
  findVerseMarker,
  formatVerseNumber,
  parseVerseNumber,
  segmentVerse,
  stripVerseMarkers,
  toAsciiDigits,
} from "./segment.js";

describe("findVerseMarker", () => {
  it("returns the dotted number inside the doubled danda", () => {
    expect(findVerseMarker("సీత అతనితో నడిచెను ৷৷1.1.18৷৷")).toBe("1.1.18");
  });

  it("accepts Devanagari danda wrappers", () => {
    expect(findVerseMarker("धर्मः सत्यम् ।।3.4.5।।")).toBe("3.4.5");
    expect(findVerseMarker("धर्मः सत्यम् ॥6.12.101॥")).toBe("6.12.101");
  });

  it("tolerates spaces inside the wrapper", () => {
    expect(findVerseMarker("వాక్యము ৷৷ 2.3.9 ৷৷")).toBe("2.3.9");
  });

  it("reads markers written in native digits", () => {
    expect(findVerseMarker("रामः ।।१.१.१८।।")).toBe("1.1.18");
    expect(findVerseMarker("సీత ৷৷౨.౧౦.౩౪৷৷")).toBe("2.10.34");
  });

  it("ignores numbers without the wrapper", () => {
    expect(findVerseMarker("see 1.1.18 above")).toBeNull();
    expect(findVerseMarker("వాక్యము । 1.1.18 ।")).toBeNull();
  });

  it("matches the digits exactly for any well-formed marker", () => {
    for (const number of ["1.1.1", "2.10.34", "6.128.130", "7.1.9"]) {
      expect(findVerseMarker(`పదము ৷৷${number}৷৷`)).toBe(number);
    }
  });
});

describe("stripVerseMarkers", () => {
  it("removes the marker and surrounding whitespace", () => {
    expect(stripVerseMarkers("సీత అతనితో నడిచెను ৷৷1.1.18৷৷")).toBe("సీత అతనితో నడిచెను");
  });

  it("removes every marker on the line", () => {
    expect(stripVerseMarkers("మొదటి ৷৷1.1.1৷৷ రెండవ ৷৷1.1.2৷৷")).toBe("మొదటి రెండవ");
  });

  it("removes markers written in native digits", () => {
    expect(stripVerseMarkers("रामः ।।१.१.१८।।")).toBe("रामः");
  });

  it("leaves lines without markers unchanged", () => {
    expect(stripVerseMarkers("రాముడు వనమునకు వెళ్ళెను ।")).toBe("రాముడు వనమునకు వెళ్ళెను ।");
  });
});

describe("segmentVerse", () => {
  it("extracts number and text from a two-line verse", () => {
    const result = segmentVerse(["రాముడు వనమునకు వెళ్ళెను ।", "సీత అతనితో నడిచెను ৷৷1.1.18৷৷"]);

    expect(result.number).toBe("1.1.18");
    expect(result.lines).toEqual(["రాముడు వనమునకు వెళ్ళెను ।", "సీత అతనితో నడిచెను"]);
    expect(result.text).toBe("రాముడు వనమునకు వెళ్ళెను ।\nసీత అతనితో నడిచెను");
  });

  it("keeps lines before, on and after the marker line", () => {
    const result = segmentVerse(["మొదటి పాదము ।", "రెండవ పాదము ৷৷2.5.7৷৷", "మూడవ పాదము ।"]);

    expect(result.number).toBe("2.5.7");
    expect(result.lines).toEqual(["మొదటి పాదము ।", "రెండవ పాదము", "మూడవ పాదము ।"]);
  });

  it("never puts annotation lines in the text", () => {
    const result = segmentVerse(["[రాముని వర్ణన]", "గుణవంతుడు రాముడు ৷৷1.1.2৷৷", "[ఇంకొక సూచన] తరువాత"]);

    expect(result.lines).toEqual(["గుణవంతుడు రాముడు"]);
    expect(result.text).not.toContain("[");
  });

  it("drops a line left with only the marker", () => {
    const result = segmentVerse(["వాక్యము ।", "৷৷1.2.3৷৷"]);

    expect(result.number).toBe("1.2.3");
    expect(result.lines).toEqual(["వాక్యము ।"]);
  });

  it("drops lines made only of punctuation", () => {
    const result = segmentVerse(["।।", "వాక్యము", " . , "]);

    expect(result.lines).toEqual(["వాక్యము"]);
  });

  it("skips blank lines", () => {
    const result = segmentVerse(["", "   ", "వాక్యము ৷৷1.1.4৷৷"]);

    expect(result.lines).toEqual(["వాక్యము"]);
  });

  it("returns a null number when no line has a marker", () => {
    const result = segmentVerse(["వాక్యము ఒకటి", "వాక్యము రెండు"]);

    expect(result.number).toBeNull();
    expect(result.lines).toEqual(["వాక్యము ఒకటి", "వాక్యము రెండు"]);
  });

  it("takes the first marker when several lines carry one", () => {
    const result = segmentVerse(["ఒకటి ৷৷1.1.5৷৷", "రెండు ৷৷1.1.6৷৷"]);

    expect(result.number).toBe("1.1.5");
    expect(result.text).toBe("ఒకటి\nరెండు");
  });

  it("never leaves the marker in the text", () => {
    const result = segmentVerse(["ధర్మము ৷৷3.2.1৷৷ సత్యము"]);

    expect(result.text).toBe("ధర్మము సత్యము");
    expect(result.text).not.toContain("3.2.1");
  });

  it("strips a native-digit marker and keeps its number", () => {
    const result = segmentVerse(["धर्मः सत्यम् ।", "रामः ।।१.१.१८।।"]);

    expect(result.number).toBe("1.1.18");
    expect(result.text).toBe("धर्मः सत्यम् ।\nरामः");
  });

  it("handles an empty block", () => {
    expect(segmentVerse([])).toEqual({ number: null, lines: [], text: "" });
  });
});

describe("toAsciiDigits", () => {
  it("maps digits of any script to ASCII", () => {
    expect(toAsciiDigits("१.१.१८")).toBe("1.1.18");
    expect(toAsciiDigits("౦౫౯")).toBe("059");
    expect(toAsciiDigits("৩.৭")).toBe("3.7");
  });

  it("leaves ASCII digits and other text alone", () => {
    expect(toAsciiDigits("sloka 1.1.18")).toBe("sloka 1.1.18");
  });
});

describe("parseVerseNumber", () => {
  it("parses the three components", () => {
    expect(parseVerseNumber("1.1.18")).toEqual({ book: 1, chapter: 1, verse: 18 });
  });

  it("parses native digits", () => {
    expect(parseVerseNumber("१.२.१०")).toEqual({ book: 1, chapter: 2, verse: 10 });
  });

  it("rejects zero components", () => {
    expect(parseVerseNumber("1.0.3")).toBeNull();
  });

  it("rejects anything but three numeric parts", () => {
    expect(parseVerseNumber("1.1")).toBeNull();
    expect(parseVerseNumber("1.1.1.1")).toBeNull();
    expect(parseVerseNumber("1.a.1")).toBeNull();
    expect(parseVerseNumber("")).toBeNull();
  });

  it("round-trips through formatVerseNumber", () => {
    expect(formatVerseNumber({ book: 2, chapter: 10, verse: 34 })).toBe("2.10.34");
  });
});
