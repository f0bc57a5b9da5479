/**
 * Run Merger
 *
 * Collapses the participant id and comment of consecutive rows for the same
 * participant into one visual span. Only adjacent rows are merged; callers must
 * keep each participant's rows contiguous.
 */

import type { MergedReportRow, MergeSpan, ReportRow } from "@shared/schema";

export interface AdjacentRun<K> {
  key: K;
  start: number;
  length: number;
}

/** Maximal runs of consecutive items with an equal key. */
export function mergeAdjacent<T, K>(items: readonly T[], keyOf: (item: T) => K): AdjacentRun<K>[] {
  const runs: AdjacentRun<K>[] = [];
  let current: AdjacentRun<K> | undefined;

  items.forEach((item, index) => {
    const key = keyOf(item);
    if (current && Object.is(current.key, key)) {
      current.length++;
      return;
    }
    current = { key, start: index, length: 1 };
    runs.push(current);
  });

  return runs;
}

export interface MergeResult {
  rows: MergedReportRow[];
  spans: MergeSpan[];
}

export function mergeRuns(rows: readonly ReportRow[]): MergeResult {
  const runs = mergeAdjacent(rows, (row) => row.participantId);
  const merged: MergedReportRow[] = [];

  for (const run of runs) {
    for (let offset = 0; offset < run.length; offset++) {
      const row = rows[run.start + offset];
      merged.push(
        Object.freeze(
          offset === 0
            ? { ...row }
            : { participantId: "", version: row.version, status: row.status, comment: "" },
        ),
      );
    }
  }

  return {
    rows: merged,
    spans: runs.map((run) => ({ participantId: run.key, start: run.start, length: run.length })),
  };
}
