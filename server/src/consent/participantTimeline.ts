import type {
  EligibilityRecord,
  ExitRecord,
  IsoDate,
  SignatureEvent,
} from "@shared/schema";

export interface ParticipantTimeline {
  participantId: string;
  /** Chronological; undated events sort last */
  signatures: readonly SignatureEvent[];
  exitDate: IsoDate | null;
  deathDate: IsoDate | null;
  eligible: boolean;
}

export interface TimelineWarning {
  participantId: string;
  message: string;
}

export interface TimelineBuildResult {
  timelines: ParticipantTimeline[];
  warnings: TimelineWarning[];
}

const participantCollator = new Intl.Collator("en", { numeric: true, sensitivity: "base" });

/** Stable participant order: numeric-aware ascending id, exact id as tie-break. */
export function compareParticipantIds(a: string, b: string): number {
  const byCollation = participantCollator.compare(a, b);
  if (byCollation !== 0) return byCollation;
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareSignatures(a: SignatureEvent, b: SignatureEvent): number {
  if (a.date === b.date) return 0;
  if (a.date === null) return 1;
  if (b.date === null) return -1;
  return a.date < b.date ? -1 : 1;
}

/**
 * Groups the three normalized inputs per participant.
 * Every id seen in any input gets a timeline; the first exit/eligibility record wins.
 */
export function buildTimelines(
  signatures: readonly SignatureEvent[],
  exits: readonly ExitRecord[],
  eligibility: readonly EligibilityRecord[],
): TimelineBuildResult {
  const warnings: TimelineWarning[] = [];
  const signaturesById = new Map<string, SignatureEvent[]>();
  const exitById = new Map<string, ExitRecord>();
  const eligibleById = new Map<string, boolean>();

  for (const event of signatures) {
    const list = signaturesById.get(event.participantId) ?? [];
    list.push(event);
    signaturesById.set(event.participantId, list);
  }

  for (const record of exits) {
    if (exitById.has(record.participantId)) {
      warnings.push({
        participantId: record.participantId,
        message: "Duplicate exit record ignored; the first record is used",
      });
      continue;
    }
    exitById.set(record.participantId, record);
  }

  for (const record of eligibility) {
    if (eligibleById.has(record.participantId)) {
      warnings.push({
        participantId: record.participantId,
        message: "Duplicate eligibility record ignored; the first record is used",
      });
      continue;
    }
    eligibleById.set(record.participantId, record.eligible);
  }

  const ids = new Set<string>([
    ...signaturesById.keys(),
    ...exitById.keys(),
    ...eligibleById.keys(),
  ]);

  const timelines = [...ids].sort(compareParticipantIds).map((participantId): ParticipantTimeline => {
    const exit = exitById.get(participantId);
    return {
      participantId,
      signatures: [...(signaturesById.get(participantId) ?? [])].sort(compareSignatures),
      exitDate: exit?.exitDate ?? null,
      deathDate: exit?.deathDate ?? null,
      eligible: eligibleById.get(participantId) ?? true,
    };
  });

  return { timelines, warnings };
}
