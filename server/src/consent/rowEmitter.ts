import { STATUS_LABELS, type ReportRow, type VersionStatus } from "@shared/schema";
import type { VersionOutcome } from "./reconciliationEngine";

export function emitRows(
  participantId: string,
  outcomes: readonly VersionOutcome[],
  comment: string,
): ReportRow[] {
  return outcomes.map((o) =>
    Object.freeze({ participantId, version: o.version, status: o.status, comment }),
  );
}

/** ISO date for signed versions, otherwise "CHECK" or "n.a." */
export function renderStatus(status: VersionStatus): string {
  switch (status.kind) {
    case "signed":
      return status.date;
    case "needs_verification":
      return STATUS_LABELS.needs_verification;
    case "not_applicable":
      return STATUS_LABELS.not_applicable;
  }
}
