import { describe, it, expect } from "vitest";
import type { SignatureEvent } from "@shared/schema";
import { composeComment, formatAnnotationDate, SCREENING_FAILURE_COMMENT } from "./commentComposer";
import type { ParticipantTimeline } from "./participantTimeline";

function timeline(
  signatures: Omit<SignatureEvent, "participantId">[],
  extra: Partial<Omit<ParticipantTimeline, "signatures">> = {},
): ParticipantTimeline {
  return {
    participantId: "1001",
    signatures: signatures.map((s) => ({ participantId: "1001", ...s })),
    exitDate: null,
    deathDate: null,
    eligible: true,
    ...extra,
  };
}

describe("composeComment", () => {
  it("formats annotation dates day-first", () => {
    expect(formatAnnotationDate("2021-03-01")).toBe("01.03.2021");
  });

  it("joins both randomization groups", () => {
    expect(composeComment(timeline([{ date: "2020-06-01", randoGroup1: "A", randoGroup2: "B" }]))).toBe("A / B");
  });

  it("uses the placeholder for missing groups", () => {
    const t = timeline([{ date: "2020-06-01", randoGroup1: "A" }]);
    expect(composeComment(t)).toBe("A / -");
    expect(composeComment(t, { groupPlaceholder: "n/a" })).toBe("A / n/a");
  });

  it("takes the groups from the earliest signature", () => {
    const t = timeline([
      { date: "2020-01-05", randoGroup1: "A" },
      { date: "2021-02-01", randoGroup1: "B", randoGroup2: "C" },
    ]);
    expect(composeComment(t)).toBe("A / -");
  });

  it("appends the end-of-study date on a new line", () => {
    const t = timeline([{ date: "2020-06-01", randoGroup1: "A", randoGroup2: "B" }], { exitDate: "2020-12-01" });
    expect(composeComment(t)).toBe("A / B\nEOS (01.12.2020)");
  });

  it("prefers the death date over the exit date", () => {
    const t = timeline([{ date: "2020-06-01", randoGroup1: "A", randoGroup2: "B" }], {
      exitDate: "2021-02-15",
      deathDate: "2021-03-01",
    });
    expect(composeComment(t)).toBe("A / B\nEOS (Death, 01.03.2021)");
  });

  it("drops the randomization part when there are no signatures", () => {
    expect(composeComment(timeline([], { exitDate: "2021-07-05" }))).toBe("EOS (05.07.2021)");
    expect(composeComment(timeline([]))).toBe("");
  });

  it("replaces everything with the screening failure text", () => {
    const t = timeline([{ date: "2020-06-01", randoGroup1: "A" }], { eligible: false, deathDate: "2021-03-01" });
    expect(composeComment(t)).toBe(SCREENING_FAILURE_COMMENT);
    expect(SCREENING_FAILURE_COMMENT).toBe("Screening Failure");
  });
});
