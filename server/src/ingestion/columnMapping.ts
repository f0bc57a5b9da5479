/**
 * Column Mapping
 *
 * Resolves spreadsheet headers to canonical consent fields. Resolution order:
 * study mapping entries, generic synonyms, then keyword rules.
 */

import type { CanonicalField, TableKind } from "@shared/schema";
import type { ParsedRow } from "../../file-parser";
import type { StudyMapping } from "./studyMapping";

interface FieldRule {
  synonyms: string[];
  /** Header matches when it contains every keyword of any one set */
  keywords?: string[][];
}

interface TableFieldSpec {
  required: CanonicalField[];
  optional: CanonicalField[];
}

export const TABLE_FIELDS: Record<TableKind, TableFieldSpec> = {
  catalog: {
    required: ["versionName", "effectiveFrom"],
    optional: [],
  },
  signatures: {
    required: ["participantId", "signatureDate"],
    optional: ["randoGroup1", "randoGroup2"],
  },
  exits: {
    required: ["participantId"],
    optional: ["exitDate", "deathDate", "eligible", "screeningFailure"],
  },
};

const FIELD_RULES: Record<CanonicalField, FieldRule> = {
  versionName: {
    synonyms: ["icf_version", "version", "consent_version", "form_version", "version_name", "icf"],
    keywords: [["icf", "version"], ["consent", "version"]],
  },
  effectiveFrom: {
    synonyms: ["gultig_ab", "gultig_seit", "valid_from", "valid_since", "effective_from", "effective_date"],
    keywords: [["gultig"], ["valid"], ["effective"]],
  },
  participantId: {
    synonyms: ["participant_id", "patient_id", "subject_id", "participant", "patient", "subject", "pid"],
  },
  signatureDate: {
    synonyms: ["consent_date", "signature_date", "ic_date", "icf_date", "date_of_consent", "signed_on"],
  },
  randoGroup1: {
    synonyms: ["rando_group", "rando_gr", "randomization_group", "randomisation_group", "arm"],
  },
  randoGroup2: {
    synonyms: ["rando_group_2", "rando_gr_2", "randomization_group_2", "randomisation_group_2", "arm_2"],
  },
  exitDate: {
    synonyms: ["eos_date", "exit_date", "end_of_study_date", "end_of_study", "withdrawal_date"],
  },
  deathDate: {
    synonyms: ["death_date", "date_of_death", "dth_date"],
  },
  eligible: {
    synonyms: ["eligible", "eligibility", "ie_met", "inclusion_met"],
  },
  screeningFailure: {
    synonyms: ["screening_failure", "screen_failure", "screen_fail", "scrfail"],
  },
};

export function normalizeColumnName(col: string): string {
  return col
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_|_$/g, "");
}

export interface ColumnMappingResult {
  /** source column -> canonical field */
  autoMapped: Record<string, CanonicalField>;
  unmapped: string[];
  missingRequired: CanonicalField[];
  requiredFields: CanonicalField[];
  optionalFields: CanonicalField[];
}

export function detectColumnMappings(
  columns: string[],
  table: TableKind,
  studyMapping: StudyMapping,
): ColumnMappingResult {
  const { required, optional } = TABLE_FIELDS[table];
  const wanted = new Set<CanonicalField>([...required, ...optional]);

  const autoMapped: Record<string, CanonicalField> = {};
  const mappedSourceColumns = new Set<string>();
  const mappedFields = new Set<CanonicalField>();

  const assign = (col: string, field: CanonicalField) => {
    autoMapped[col] = field;
    mappedSourceColumns.add(col);
    mappedFields.add(field);
  };

  const studyColumns = new Map<string, CanonicalField>(
    Object.entries(studyMapping.columns).map(([source, field]) => [normalizeColumnName(source), field]),
  );

  for (const col of columns) {
    const field = studyColumns.get(normalizeColumnName(col));
    if (field && wanted.has(field) && !mappedFields.has(field)) {
      assign(col, field);
    }
  }

  for (const field of wanted) {
    if (mappedFields.has(field)) continue;
    const col = columns.find(
      (c) => !mappedSourceColumns.has(c) && FIELD_RULES[field].synonyms.includes(normalizeColumnName(c)),
    );
    if (col !== undefined) assign(col, field);
  }

  for (const field of wanted) {
    if (mappedFields.has(field)) continue;
    const keywordSets = FIELD_RULES[field].keywords ?? [];
    const col = columns.find((c) => {
      if (mappedSourceColumns.has(c)) return false;
      const normalized = normalizeColumnName(c);
      return keywordSets.some((set) => set.every((kw) => normalized.includes(kw)));
    });
    if (col !== undefined) assign(col, field);
  }

  return {
    autoMapped,
    unmapped: columns.filter((col) => !mappedSourceColumns.has(col)),
    missingRequired: required.filter((field) => !mappedFields.has(field)),
    requiredFields: required,
    optionalFields: optional,
  };
}

/** Renames mapped columns to their canonical field; unmapped columns are dropped. */
export function applyColumnMapping(
  rows: ParsedRow[],
  mapping: Record<string, CanonicalField>,
): Partial<Record<CanonicalField, unknown>>[] {
  return rows.map((row) => {
    const mappedRow: Partial<Record<CanonicalField, unknown>> = {};
    for (const [sourceCol, targetField] of Object.entries(mapping)) {
      if (row[sourceCol] !== undefined) {
        mappedRow[targetField] = row[sourceCol];
      }
    }
    return mappedRow;
  });
}
