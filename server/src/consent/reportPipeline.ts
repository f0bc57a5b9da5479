/**
 * Consent Report Pipeline
 *
 * catalog + timelines -> per-version statuses -> report rows -> merged spans.
 * Pure and synchronous: identical inputs always give identical output.
 */

import type {
  CatalogVersion,
  EligibilityRecord,
  ExitRecord,
  LookupMode,
  MergedReportRow,
  MergeSpan,
  ReportRow,
  SignatureEvent,
  VersionStatusKind,
} from "@shared/schema";
import { CatalogConfigurationError } from "../errors";
import { composeComment } from "./commentComposer";
import { buildTimelines, type TimelineWarning } from "./participantTimeline";
import { reconcileParticipant } from "./reconciliationEngine";
import { emitRows } from "./rowEmitter";
import { mergeRuns } from "./runMerger";
import { VersionCatalog } from "./versionCatalog";

export interface ConsentReportInput {
  catalog: readonly CatalogVersion[];
  signatures: readonly SignatureEvent[];
  exits: readonly ExitRecord[];
  eligibility: readonly EligibilityRecord[];
}

export interface ConsentReportOptions {
  lookupMode: LookupMode;
  groupPlaceholder?: string;
}

export interface ConsentReportSummary {
  lookupMode: LookupMode;
  versionCount: number;
  participantCount: number;
  rowCount: number;
  statusCounts: Record<VersionStatusKind, number>;
}

export interface ConsentReport {
  rows: ReportRow[];
  merged: MergedReportRow[];
  spans: MergeSpan[];
  summary: ConsentReportSummary;
  timelineWarnings: TimelineWarning[];
}

export function generateConsentReport(
  input: ConsentReportInput,
  options: ConsentReportOptions,
): ConsentReport {
  if (input.catalog.length === 0) {
    throw new CatalogConfigurationError(
      "The consent version catalog is empty. Provide at least one version with a valid effective date.",
    );
  }

  const catalog = new VersionCatalog(input.catalog, options.lookupMode);
  // Timelines come back sorted by participant id, which keeps each participant's rows contiguous
  const { timelines, warnings } = buildTimelines(input.signatures, input.exits, input.eligibility);

  const rows: ReportRow[] = [];
  for (const timeline of timelines) {
    const outcomes = reconcileParticipant(timeline, catalog);
    const comment = composeComment(timeline, { groupPlaceholder: options.groupPlaceholder });
    rows.push(...emitRows(timeline.participantId, outcomes, comment));
  }

  const { rows: merged, spans } = mergeRuns(rows);

  const statusCounts: Record<VersionStatusKind, number> = {
    signed: 0,
    needs_verification: 0,
    not_applicable: 0,
  };
  for (const row of rows) statusCounts[row.status.kind]++;

  return {
    rows,
    merged,
    spans,
    summary: {
      lookupMode: options.lookupMode,
      versionCount: catalog.size,
      participantCount: timelines.length,
      rowCount: rows.length,
      statusCounts,
    },
    timelineWarnings: warnings,
  };
}
