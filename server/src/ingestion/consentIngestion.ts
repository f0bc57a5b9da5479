/**
 * Consent Ingestion
 *
 * Uploaded workbooks -> parsed rows -> canonical columns -> typed records,
 * then runs the report pipeline. Data-quality problems become warnings;
 * unreadable files and missing required columns raise IngestionError.
 */

import type { CanonicalField, TableKind } from "@shared/schema";
import { parseFileBuffer } from "../../file-parser";
import {
  generateConsentReport,
  type ConsentReport,
  type ConsentReportOptions,
} from "../consent/reportPipeline";
import { IngestionError } from "../errors";
import { applyColumnMapping, detectColumnMappings } from "./columnMapping";
import {
  normalizeCatalogRows,
  normalizeExitRows,
  normalizeSignatureRows,
  type NormalizationWarning,
} from "./normalize";
import type { StudyMapping } from "./studyMapping";

export interface UploadedTable {
  buffer: Buffer;
  filename: string;
}

export interface ConsentReportFiles {
  catalog: UploadedTable;
  consents: UploadedTable;
  /** Without an exit file every participant is treated as active and eligible */
  eos?: UploadedTable;
}

export interface IngestionOptions extends ConsentReportOptions {
  studyMapping: StudyMapping;
  /** Overrides the study mapping's catalog sheet */
  catalogSheet?: string;
}

export interface ConsentReportResult {
  report: ConsentReport;
  warnings: NormalizationWarning[];
  parseErrors: string[];
  columnMappings: Record<TableKind, Record<string, CanonicalField>>;
}

interface MappedTable {
  rows: Partial<Record<CanonicalField, unknown>>[];
  mapping: Record<string, CanonicalField>;
  parseErrors: string[];
}

const NO_DATA_ERROR = /^No data found/;

export const DEFAULT_CATALOG_SHEET = "ICF2";

/** Explicit override, then the study mapping's sheet, then ICF2 */
export function catalogSheetFor(studyMapping: StudyMapping, override?: string): string {
  return override ?? studyMapping.catalogSheet ?? DEFAULT_CATALOG_SHEET;
}

function readTable(
  table: TableKind,
  file: UploadedTable,
  studyMapping: StudyMapping,
  preferredSheet?: string,
): MappedTable {
  const parsed = parseFileBuffer(file.buffer, file.filename, { preferredSheet });

  if (!parsed.success) {
    // An exit listing without rows just means nobody has left the study yet
    if (table === "exits" && parsed.errors.every((e) => NO_DATA_ERROR.test(e))) {
      return { rows: [], mapping: {}, parseErrors: [] };
    }
    throw new IngestionError(`Could not read ${table} file '${file.filename}'`, table, [], parsed.errors);
  }

  const detection = detectColumnMappings(parsed.columns, table, studyMapping);
  if (detection.missingRequired.length > 0) {
    throw new IngestionError(
      `The ${table} file '${file.filename}' is missing required columns: ${detection.missingRequired.join(", ")}. ` +
        `Found columns: ${parsed.columns.join(", ")}`,
      table,
      detection.missingRequired,
    );
  }

  console.log(
    `[Ingest] ${table}: ${parsed.rows.length} rows from ${file.filename}` +
      (parsed.sheetName ? ` (sheet ${parsed.sheetName})` : "") +
      `, mapped ${JSON.stringify(detection.autoMapped)}`,
  );

  return {
    rows: applyColumnMapping(parsed.rows, detection.autoMapped),
    mapping: detection.autoMapped,
    parseErrors: parsed.errors.map((e) => `${table}: ${e}`),
  };
}

export function buildConsentReportFromFiles(
  files: ConsentReportFiles,
  options: IngestionOptions,
): ConsentReportResult {
  const { studyMapping } = options;
  const catalogSheet = catalogSheetFor(studyMapping, options.catalogSheet);

  const catalogTable = readTable("catalog", files.catalog, studyMapping, catalogSheet);
  const consentTable = readTable("signatures", files.consents, studyMapping);
  const exitTable: MappedTable = files.eos
    ? readTable("exits", files.eos, studyMapping)
    : { rows: [], mapping: {}, parseErrors: [] };

  const catalog = normalizeCatalogRows(catalogTable.rows);
  const signatures = normalizeSignatureRows(consentTable.rows);
  const exits = normalizeExitRows(exitTable.rows);

  const warnings = [...catalog.warnings, ...signatures.warnings, ...exits.warnings];
  if (warnings.length > 0) {
    console.warn(`[Ingest] ${warnings.length} data-quality warning(s) while normalizing uploads`);
  }

  const report = generateConsentReport(
    {
      catalog: catalog.records,
      signatures: signatures.records,
      exits: exits.exits,
      eligibility: exits.eligibility,
    },
    { lookupMode: options.lookupMode, groupPlaceholder: options.groupPlaceholder },
  );

  console.log(
    `[ConsentReport] ${report.summary.participantCount} participants x ${report.summary.versionCount} versions ` +
      `(${report.summary.lookupMode}): ${JSON.stringify(report.summary.statusCounts)}`,
  );

  return {
    report,
    warnings,
    parseErrors: [...catalogTable.parseErrors, ...consentTable.parseErrors, ...exitTable.parseErrors],
    columnMappings: {
      catalog: catalogTable.mapping,
      signatures: consentTable.mapping,
      exits: exitTable.mapping,
    },
  };
}
