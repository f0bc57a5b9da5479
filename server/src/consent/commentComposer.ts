import { format, parseISO } from "date-fns";
import type { IsoDate } from "@shared/schema";
import type { ParticipantTimeline } from "./participantTimeline";

export const SCREENING_FAILURE_COMMENT = "Screening Failure";
export const DEFAULT_GROUP_PLACEHOLDER = "-";

export interface CommentOptions {
  groupPlaceholder?: string;
}

/** dd.MM.yyyy, the annotation format; report status dates stay ISO. */
export function formatAnnotationDate(date: IsoDate): string {
  return format(parseISO(date), "dd.MM.yyyy");
}

function randomizationText(timeline: ParticipantTimeline, placeholder: string): string {
  const first = timeline.signatures[0];
  if (!first) return "";
  const g1 = first.randoGroup1?.trim() || placeholder;
  const g2 = first.randoGroup2?.trim() || placeholder;
  return `${g1} / ${g2}`;
}

function endOfStudyText(timeline: ParticipantTimeline): string {
  if (timeline.deathDate) return `EOS (Death, ${formatAnnotationDate(timeline.deathDate)})`;
  if (timeline.exitDate) return `EOS (${formatAnnotationDate(timeline.exitDate)})`;
  return "";
}

export function composeComment(timeline: ParticipantTimeline, options: CommentOptions = {}): string {
  if (!timeline.eligible) return SCREENING_FAILURE_COMMENT;

  const placeholder = options.groupPlaceholder ?? DEFAULT_GROUP_PLACEHOLDER;
  return [randomizationText(timeline, placeholder), endOfStudyText(timeline)]
    .filter((part) => part.length > 0)
    .join("\n");
}
