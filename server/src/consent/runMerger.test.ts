import { describe, it, expect } from "vitest";
import type { ReportRow } from "@shared/schema";
import { emitRows, renderStatus } from "./rowEmitter";
import { mergeAdjacent, mergeRuns } from "./runMerger";

function row(participantId: string, version: string, comment: string): ReportRow {
  return { participantId, version, status: { kind: "not_applicable" }, comment };
}

describe("mergeAdjacent", () => {
  it("groups only consecutive equal keys", () => {
    expect(mergeAdjacent(["a", "a", "b", "a"], (x) => x)).toEqual([
      { key: "a", start: 0, length: 2 },
      { key: "b", start: 2, length: 1 },
      { key: "a", start: 3, length: 1 },
    ]);
  });

  it("returns no runs for no items", () => {
    expect(mergeAdjacent([], (x: string) => x)).toEqual([]);
  });
});

describe("mergeRuns", () => {
  const rows: ReportRow[] = [
    { participantId: "P1", version: "V1", status: { kind: "signed", date: "2020-06-01" }, comment: "A / B" },
    { participantId: "P1", version: "V2", status: { kind: "needs_verification" }, comment: "A / B" },
    row("P2", "V1", "Screening Failure"),
    row("P2", "V2", "Screening Failure"),
  ];

  it("blanks participant id and comment on continuation rows only", () => {
    const { rows: merged } = mergeRuns(rows);
    expect(merged).toEqual([
      { participantId: "P1", version: "V1", status: { kind: "signed", date: "2020-06-01" }, comment: "A / B" },
      { participantId: "", version: "V2", status: { kind: "needs_verification" }, comment: "" },
      { participantId: "P2", version: "V1", status: { kind: "not_applicable" }, comment: "Screening Failure" },
      { participantId: "", version: "V2", status: { kind: "not_applicable" }, comment: "" },
    ]);
  });

  it("reports one span per participant block covering every row", () => {
    const { spans } = mergeRuns(rows);
    expect(spans).toEqual([
      { participantId: "P1", start: 0, length: 2 },
      { participantId: "P2", start: 2, length: 2 },
    ]);
    expect(spans.reduce((sum, s) => sum + s.length, 0)).toBe(rows.length);
  });

  it("does not merge rows of one participant that are not adjacent", () => {
    const { spans } = mergeRuns([row("P1", "V1", "x"), row("P2", "V1", "y"), row("P1", "V2", "x")]);
    expect(spans.map((s) => [s.participantId, s.length])).toEqual([
      ["P1", 1],
      ["P2", 1],
      ["P1", 1],
    ]);
  });

  it("does not modify its input", () => {
    mergeRuns(rows);
    expect(rows[1].participantId).toBe("P1");
    expect(rows[1].comment).toBe("A / B");
  });
});

describe("rowEmitter", () => {
  it("renders statuses as ISO date, CHECK or n.a.", () => {
    expect(renderStatus({ kind: "signed", date: "2020-06-01" })).toBe("2020-06-01");
    expect(renderStatus({ kind: "needs_verification" })).toBe("CHECK");
    expect(renderStatus({ kind: "not_applicable" })).toBe("n.a.");
  });

  it("emits one frozen row per outcome with the participant comment", () => {
    const emitted = emitRows(
      "P1",
      [
        { version: "V1", effectiveFrom: "2020-01-01", status: { kind: "signed", date: "2020-06-01" } },
        { version: "V2", effectiveFrom: "2021-01-01", status: { kind: "needs_verification" } },
      ],
      "A / B",
    );
    expect(emitted.map((r) => [r.participantId, r.version, r.comment])).toEqual([
      ["P1", "V1", "A / B"],
      ["P1", "V2", "A / B"],
    ]);
    expect(emitted.every((r) => Object.isFrozen(r))).toBe(true);
  });
});
