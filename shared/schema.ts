import { z } from "zod";

// ============== DATES ==============
// Calendar dates travel as ISO "yyyy-MM-dd" strings so they compare lexicographically.
export const isoDateZ = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected yyyy-MM-dd");
export type IsoDate = z.infer<typeof isoDateZ>;

// ============== LOOKUP MODES ==============
export const lookupModeEnum = ["interval", "tied-latest"] as const;
export type LookupMode = typeof lookupModeEnum[number];
export const lookupModeZ = z.enum(lookupModeEnum);

// ============== CATALOG ==============
export const catalogVersionZ = z.object({
  name: z.string().min(1),
  effectiveFrom: isoDateZ,
});

export type CatalogVersion = z.infer<typeof catalogVersionZ>;

// ============== PARTICIPANT RECORDS ==============
export const signatureEventZ = z.object({
  participantId: z.string().min(1),
  date: isoDateZ.nullable(),
  randoGroup1: z.string().optional(),
  randoGroup2: z.string().optional(),
});

export type SignatureEvent = z.infer<typeof signatureEventZ>;

export const exitRecordZ = z.object({
  participantId: z.string().min(1),
  exitDate: isoDateZ.nullable(),
  deathDate: isoDateZ.nullable(),
});

export type ExitRecord = z.infer<typeof exitRecordZ>;

export const eligibilityRecordZ = z.object({
  participantId: z.string().min(1),
  eligible: z.boolean().default(true),
});

export type EligibilityRecord = z.infer<typeof eligibilityRecordZ>;

// ============== VERSION STATUS ==============
export const versionStatusKinds = ["signed", "needs_verification", "not_applicable"] as const;
export type VersionStatusKind = typeof versionStatusKinds[number];

export type VersionStatus =
  | { kind: "signed"; date: IsoDate }
  | { kind: "needs_verification" }
  | { kind: "not_applicable" };

export const STATUS_LABELS = {
  needs_verification: "CHECK",
  not_applicable: "n.a.",
} as const;

// ============== REPORT ROWS ==============
export interface ReportRow {
  readonly participantId: string;
  readonly version: string;
  readonly status: VersionStatus;
  readonly comment: string;
}

/** A row after adjacent participant cells were collapsed; blank id/comment mean "continued". */
export type MergedReportRow = ReportRow;

export interface MergeSpan {
  participantId: string;
  start: number;
  length: number;
}

// ============== TABLE KINDS ==============
export const tableKindEnum = ["catalog", "signatures", "exits"] as const;
export type TableKind = typeof tableKindEnum[number];
export const tableKindZ = z.enum(tableKindEnum);

export const canonicalFieldEnum = [
  "versionName",
  "effectiveFrom",
  "participantId",
  "signatureDate",
  "randoGroup1",
  "randoGroup2",
  "exitDate",
  "deathDate",
  "eligible",
  "screeningFailure",
] as const;
export type CanonicalField = typeof canonicalFieldEnum[number];
export const canonicalFieldZ = z.enum(canonicalFieldEnum);
