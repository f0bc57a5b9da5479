/**
 * Reconciliation Engine Tests
 *
 * Status per catalog version for single participants: signed, CHECK, n.a.
 */

import { describe, it, expect } from "vitest";
import type { SignatureEvent } from "@shared/schema";
import type { ParticipantTimeline } from "./participantTimeline";
import { lastSignatureDate, reconcileParticipant, resolveSignedVersions } from "./reconciliationEngine";
import { VersionCatalog } from "./versionCatalog";

const CATALOG = new VersionCatalog(
  [
    { name: "V1", effectiveFrom: "2020-01-01" },
    { name: "V2", effectiveFrom: "2021-01-01" },
  ],
  "interval",
);

function timeline(
  dates: (string | null)[],
  extra: Partial<Omit<ParticipantTimeline, "signatures">> = {},
): ParticipantTimeline {
  const signatures: SignatureEvent[] = dates.map((date) => ({ participantId: "P1", date }));
  return {
    participantId: "P1",
    signatures,
    exitDate: null,
    deathDate: null,
    eligible: true,
    ...extra,
  };
}

function statuses(t: ParticipantTimeline, catalog = CATALOG) {
  return reconcileParticipant(t, catalog).map((o) => o.status);
}

describe("Reconciliation Engine", () => {
  describe("signed versions", () => {
    it("keeps the earliest date when one version is signed twice", () => {
      const signed = resolveSignedVersions(timeline(["2020-06-01", "2020-03-01"]), CATALOG);
      expect([...signed.entries()]).toEqual([["V1", "2020-03-01"]]);
    });

    it("ignores undated signature events", () => {
      const signed = resolveSignedVersions(timeline([null, "2021-02-01"]), CATALOG);
      expect([...signed.entries()]).toEqual([["V2", "2021-02-01"]]);
    });

    it("reports the latest signature date", () => {
      expect(lastSignatureDate(timeline(["2020-06-01", null, "2021-02-01"]))).toBe("2021-02-01");
      expect(lastSignatureDate(timeline([]))).toBeNull();
    });
  });

  it("asks for verification of a version introduced after the last signature", () => {
    expect(statuses(timeline(["2020-06-01"]))).toEqual([
      { kind: "signed", date: "2020-06-01" },
      { kind: "needs_verification" },
    ]);
  });

  it("marks versions effective after exit as not applicable", () => {
    expect(statuses(timeline(["2020-06-01"], { exitDate: "2020-12-01" }))).toEqual([
      { kind: "signed", date: "2020-06-01" },
      { kind: "not_applicable" },
    ]);
  });

  it("still asks for verification when the exit falls on the effective date", () => {
    expect(statuses(timeline(["2020-06-01"], { exitDate: "2021-01-01" }))[1]).toEqual({
      kind: "needs_verification",
    });
  });

  it("marks versions superseded before the last signature as not applicable", () => {
    expect(statuses(timeline(["2021-02-01"]))).toEqual([
      { kind: "not_applicable" },
      { kind: "signed", date: "2021-02-01" },
    ]);
  });

  it("keeps an earlier signed version when a later one is also signed", () => {
    expect(statuses(timeline(["2020-06-01", "2021-02-01"]))).toEqual([
      { kind: "signed", date: "2020-06-01" },
      { kind: "signed", date: "2021-02-01" },
    ]);
  });

  it("asks for verification of every version when there are no signatures", () => {
    expect(statuses(timeline([]))).toEqual([{ kind: "needs_verification" }, { kind: "needs_verification" }]);
  });

  it("marks every version n.a. when all signatures are undated", () => {
    expect(statuses(timeline([null]))).toEqual([{ kind: "not_applicable" }, { kind: "not_applicable" }]);
    expect(statuses(timeline([null, null], { exitDate: "2022-01-01" }))).toEqual([
      { kind: "not_applicable" },
      { kind: "not_applicable" },
    ]);
  });

  it("applies the exit date to participants without signatures", () => {
    expect(statuses(timeline([], { exitDate: "2020-06-01" }))).toEqual([
      { kind: "needs_verification" },
      { kind: "not_applicable" },
    ]);
  });

  describe("screening failures", () => {
    it("never asks for verification", () => {
      expect(statuses(timeline([], { eligible: false }))).toEqual([
        { kind: "not_applicable" },
        { kind: "not_applicable" },
      ]);
    });

    it("still reports versions that were signed", () => {
      expect(statuses(timeline(["2020-06-01"], { eligible: false }))).toEqual([
        { kind: "signed", date: "2020-06-01" },
        { kind: "not_applicable" },
      ]);
    });
  });

  it("does not change statuses for a death date", () => {
    expect(statuses(timeline(["2020-06-01", "2021-02-01"], { deathDate: "2021-03-01", exitDate: "2021-03-01" }))).toEqual([
      { kind: "signed", date: "2020-06-01" },
      { kind: "signed", date: "2021-02-01" },
    ]);
  });

  it("records every tied version for one signature in tied-latest mode", () => {
    const tied = new VersionCatalog(
      [
        { name: "VA", effectiveFrom: "2022-01-01" },
        { name: "VB", effectiveFrom: "2022-01-01" },
      ],
      "tied-latest",
    );
    expect(statuses(timeline(["2022-02-01"]), tied)).toEqual([
      { kind: "signed", date: "2022-02-01" },
      { kind: "signed", date: "2022-02-01" },
    ]);
  });

  it("emits exactly one outcome per catalog version in catalog order", () => {
    const outcomes = reconcileParticipant(timeline(["2020-06-01"]), CATALOG);
    expect(outcomes.map((o) => [o.version, o.effectiveFrom])).toEqual([
      ["V1", "2020-01-01"],
      ["V2", "2021-01-01"],
    ]);
  });
});
