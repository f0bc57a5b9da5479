/**
 * Reconciliation Engine
 *
 * Classifies every catalog version for one participant:
 *   signed             - a signature date resolved to the version
 *   not_applicable     - participant failed screening, left before the version
 *                        took effect, or the version was superseded before
 *                        their last signature
 *   needs_verification - the version took effect after the last signature
 *                        while the participant was still in the study; with
 *                        no signature events at all, every version still in
 *                        force when they left
 */

import type { IsoDate, VersionStatus } from "@shared/schema";
import type { ParticipantTimeline } from "./participantTimeline";
import type { VersionCatalog } from "./versionCatalog";

export interface VersionOutcome {
  version: string;
  effectiveFrom: IsoDate;
  status: VersionStatus;
}

/** Earliest signature date per version name the participant's signatures resolve to. */
export function resolveSignedVersions(
  timeline: ParticipantTimeline,
  catalog: VersionCatalog,
): Map<string, IsoDate> {
  const signed = new Map<string, IsoDate>();

  for (const event of timeline.signatures) {
    if (!event.date) continue;
    for (const name of catalog.applicableVersions(event.date)) {
      const known = signed.get(name);
      if (known === undefined || event.date < known) {
        signed.set(name, event.date);
      }
    }
  }

  return signed;
}

export function lastSignatureDate(timeline: ParticipantTimeline): IsoDate | null {
  let last: IsoDate | null = null;
  for (const event of timeline.signatures) {
    if (event.date && (last === null || event.date > last)) last = event.date;
  }
  return last;
}

export function reconcileParticipant(
  timeline: ParticipantTimeline,
  catalog: VersionCatalog,
): VersionOutcome[] {
  const signed = resolveSignedVersions(timeline, catalog);
  const lastSigned = lastSignatureDate(timeline);
  const { exitDate, eligible } = timeline;

  return catalog.versions().map((v): VersionOutcome => {
    const signedOn = signed.get(v.name);
    if (signedOn !== undefined) {
      return { version: v.name, effectiveFrom: v.effectiveFrom, status: { kind: "signed", date: signedOn } };
    }

    if (!eligible) {
      return { version: v.name, effectiveFrom: v.effectiveFrom, status: { kind: "not_applicable" } };
    }

    // Without any signature event every version counts as later; undated events compare with nothing
    const effectiveAfterLastSignature =
      lastSigned === null ? timeline.signatures.length === 0 : v.effectiveFrom > lastSigned;
    const activeWhenEffective = exitDate === null || exitDate >= v.effectiveFrom;

    if (effectiveAfterLastSignature && activeWhenEffective) {
      return { version: v.name, effectiveFrom: v.effectiveFrom, status: { kind: "needs_verification" } };
    }

    return { version: v.name, effectiveFrom: v.effectiveFrom, status: { kind: "not_applicable" } };
  });
}
