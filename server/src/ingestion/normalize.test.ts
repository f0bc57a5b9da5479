import { describe, it, expect } from "vitest";
import {
  normalizeCatalogRows,
  normalizeExitRows,
  normalizeSignatureRows,
  toBool,
  toISODate,
  toText,
} from "./normalize";

describe("toISODate", () => {
  it("accepts ISO dates and timestamps", () => {
    expect(toISODate("2021-03-01")).toBe("2021-03-01");
    expect(toISODate(" 2021-03-01T10:15:00Z ")).toBe("2021-03-01");
  });

  it("reads dotted dates day-first", () => {
    expect(toISODate("01.03.2021")).toBe("2021-03-01");
    expect(toISODate("1.3.2021")).toBe("2021-03-01");
  });

  it("reads slashed dates month-first", () => {
    expect(toISODate("03/15/2021")).toBe("2021-03-15");
  });

  it("converts Excel serial numbers and Date objects", () => {
    expect(toISODate(44197)).toBe("2021-01-01");
    expect(toISODate(new Date(2021, 2, 1))).toBe("2021-03-01");
  });

  it("treats unparseable values as absent", () => {
    expect(toISODate("not a date")).toBeNull();
    expect(toISODate("31.02.2021")).toBeNull();
    expect(toISODate("01.03.21")).toBeNull();
    expect(toISODate("")).toBeNull();
    expect(toISODate(null)).toBeNull();
    expect(toISODate(new Date("garbage"))).toBeNull();
    expect(toISODate({})).toBeNull();
  });
});

describe("toBool / toText", () => {
  it("recognizes yes/no values in English and German", () => {
    expect(toBool("ja")).toBe(true);
    expect(toBool(" Nein ")).toBe(false);
    expect(toBool(0)).toBe(false);
    expect(toBool(true)).toBe(true);
    expect(toBool("maybe")).toBeNull();
    expect(toBool(undefined)).toBeNull();
  });

  it("turns cells into trimmed text", () => {
    expect(toText(1001)).toBe("1001");
    expect(toText("  A1 ")).toBe("A1");
    expect(toText("   ")).toBeNull();
    expect(toText(null)).toBeNull();
  });
});

describe("normalizeCatalogRows", () => {
  it("drops versions without a usable effective date and reports them", () => {
    const result = normalizeCatalogRows([
      { versionName: "V1", effectiveFrom: "2020-01-01" },
      { versionName: "V2", effectiveFrom: "tbd" },
      { versionName: null, effectiveFrom: null },
    ]);
    expect(result.records).toEqual([{ name: "V1", effectiveFrom: "2020-01-01" }]);
    expect(result.warnings).toEqual([
      {
        table: "catalog",
        row: 3,
        field: "effectiveFrom",
        value: "tbd",
        message: "Version 'V2' has no valid effective date and was dropped",
      },
    ]);
  });
});

describe("normalizeSignatureRows", () => {
  it("keeps undated signatures and reports the bad date", () => {
    const result = normalizeSignatureRows([
      { participantId: 1001, signatureDate: "01.06.2020", randoGroup1: "A" },
      { participantId: "1002", signatureDate: "garbage" },
      { participantId: "", signatureDate: "2020-01-01" },
    ]);

    expect(result.records).toEqual([
      { participantId: "1001", date: "2020-06-01", randoGroup1: "A" },
      { participantId: "1002", date: null },
    ]);
    expect(result.warnings).toEqual([
      {
        table: "signatures",
        row: 3,
        field: "signatureDate",
        value: "garbage",
        message: "Missing or unparseable consent date treated as absent",
      },
      {
        table: "signatures",
        row: 4,
        field: "participantId",
        value: "",
        message: "Signature row without participant id dropped",
      },
    ]);
  });

  it("silently skips completely blank rows", () => {
    const result = normalizeSignatureRows([{ participantId: null, signatureDate: null }]);
    expect(result.records).toEqual([]);
    expect(result.warnings).toEqual([]);
  });
});

describe("normalizeExitRows", () => {
  it("splits exit dates and eligibility", () => {
    const result = normalizeExitRows([
      { participantId: "1", exitDate: "01.12.2020", deathDate: null },
      { participantId: "2", exitDate: "soon", eligible: "nein" },
      { participantId: "3", screeningFailure: "ja" },
      { participantId: "4", eligible: "yes", deathDate: "2021-03-01" },
    ]);

    expect(result.exits).toEqual([
      { participantId: "1", exitDate: "2020-12-01", deathDate: null },
      { participantId: "2", exitDate: null, deathDate: null },
      { participantId: "3", exitDate: null, deathDate: null },
      { participantId: "4", exitDate: null, deathDate: "2021-03-01" },
    ]);
    expect(result.eligibility).toEqual([
      { participantId: "2", eligible: false },
      { participantId: "3", eligible: false },
      { participantId: "4", eligible: true },
    ]);
    expect(result.warnings).toEqual([
      {
        table: "exits",
        row: 3,
        field: "exitDate",
        value: "soon",
        message: "Unparseable date treated as absent",
      },
    ]);
  });
});
