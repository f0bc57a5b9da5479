import { format, isValid, parse } from "date-fns";
import type {
  CanonicalField,
  CatalogVersion,
  EligibilityRecord,
  ExitRecord,
  IsoDate,
  SignatureEvent,
  TableKind,
} from "@shared/schema";

type MappedRow = Partial<Record<CanonicalField, unknown>>;

// Dotted dates are day-first, slashed dates month-first
const TEXT_DATE_FORMATS = ["yyyy-MM-dd", "dd.MM.yyyy", "d.M.yyyy", "MM/dd/yyyy", "M/d/yyyy", "yyyy/MM/dd"];
const MIN_YEAR = 1900;
const MAX_YEAR = 2100;
const EXCEL_EPOCH_UTC = Date.UTC(1899, 11, 30);

function fromCalendarDate(d: Date): IsoDate | null {
  if (!isValid(d)) return null;
  const year = d.getFullYear();
  if (year < MIN_YEAR || year > MAX_YEAR) return null;
  return format(d, "yyyy-MM-dd");
}

export function toISODate(value: unknown): IsoDate | null {
  if (value == null || value === "") return null;

  if (value instanceof Date) return fromCalendarDate(value);

  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) return null;
    const d = new Date(EXCEL_EPOCH_UTC + Math.floor(value) * 86400000);
    const iso = d.toISOString().slice(0, 10);
    const year = Number(iso.slice(0, 4));
    return year >= MIN_YEAR && year <= MAX_YEAR ? iso : null;
  }

  if (typeof value === "string") {
    let s = value.trim();
    if (!s) return null;
    // ISO timestamps keep only their calendar part
    if (/^\d{4}-\d{2}-\d{2}[T ]/.test(s)) s = s.slice(0, 10);

    for (const pattern of TEXT_DATE_FORMATS) {
      const iso = fromCalendarDate(parse(s, pattern, new Date()));
      if (iso) return iso;
    }
    return null;
  }

  return null;
}

export function toBool(value: unknown): boolean | null {
  if (value == null || value === "") return null;
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const s = value.trim().toLowerCase();
    if (["true", "yes", "y", "1", "ja", "j", "x"].includes(s)) return true;
    if (["false", "no", "n", "0", "nein"].includes(s)) return false;
  }
  return null;
}

export function toText(value: unknown): string | null {
  if (value == null) return null;
  if (typeof value === "string") {
    const s = value.trim();
    return s.length > 0 ? s : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "boolean") return String(value);
  if (value instanceof Date) return toISODate(value);
  return null;
}

export interface NormalizationWarning {
  table: TableKind;
  /** 1-based spreadsheet row, header is row 1 */
  row: number;
  field: CanonicalField;
  value: string;
  message: string;
}

export interface NormalizedTable<T> {
  records: T[];
  warnings: NormalizationWarning[];
}

function describe(value: unknown): string {
  if (value instanceof Date) return isValid(value) ? value.toISOString() : "Invalid Date";
  if (value == null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

class WarningCollector {
  readonly warnings: NormalizationWarning[] = [];

  constructor(private readonly table: TableKind) {}

  add(index: number, field: CanonicalField, value: unknown, message: string): void {
    this.warnings.push({ table: this.table, row: index + 2, field, value: describe(value), message });
  }

  /** Parses an optional date column; unparseable text is reported and treated as absent. */
  date(index: number, field: CanonicalField, value: unknown): IsoDate | null {
    const iso = toISODate(value);
    if (iso === null && toText(value) !== null) {
      this.add(index, field, value, "Unparseable date treated as absent");
    }
    return iso;
  }
}

export function normalizeCatalogRows(rows: MappedRow[]): NormalizedTable<CatalogVersion> {
  const collector = new WarningCollector("catalog");
  const records: CatalogVersion[] = [];

  rows.forEach((row, index) => {
    const name = toText(row.versionName);
    if (!name) {
      if (toText(row.effectiveFrom) !== null) {
        collector.add(index, "versionName", row.versionName, "Catalog row without version name dropped");
      }
      return;
    }
    const effectiveFrom = toISODate(row.effectiveFrom);
    if (!effectiveFrom) {
      collector.add(index, "effectiveFrom", row.effectiveFrom, `Version '${name}' has no valid effective date and was dropped`);
      return;
    }
    records.push({ name, effectiveFrom });
  });

  return { records, warnings: collector.warnings };
}

export function normalizeSignatureRows(rows: MappedRow[]): NormalizedTable<SignatureEvent> {
  const collector = new WarningCollector("signatures");
  const records: SignatureEvent[] = [];

  rows.forEach((row, index) => {
    const participantId = toText(row.participantId);
    if (!participantId) {
      if (Object.values(row).some((v) => toText(v) !== null)) {
        collector.add(index, "participantId", row.participantId, "Signature row without participant id dropped");
      }
      return;
    }

    const date = toISODate(row.signatureDate);
    if (date === null) {
      collector.add(index, "signatureDate", row.signatureDate, "Missing or unparseable consent date treated as absent");
    }

    const event: SignatureEvent = { participantId, date };
    const g1 = toText(row.randoGroup1);
    const g2 = toText(row.randoGroup2);
    if (g1 !== null) event.randoGroup1 = g1;
    if (g2 !== null) event.randoGroup2 = g2;
    records.push(event);
  });

  return { records, warnings: collector.warnings };
}

export interface ExitTable {
  exits: ExitRecord[];
  eligibility: EligibilityRecord[];
}

export function normalizeExitRows(rows: MappedRow[]): ExitTable & { warnings: NormalizationWarning[] } {
  const collector = new WarningCollector("exits");
  const exits: ExitRecord[] = [];
  const eligibility: EligibilityRecord[] = [];

  rows.forEach((row, index) => {
    const participantId = toText(row.participantId);
    if (!participantId) {
      if (Object.values(row).some((v) => toText(v) !== null)) {
        collector.add(index, "participantId", row.participantId, "Exit row without participant id dropped");
      }
      return;
    }

    exits.push({
      participantId,
      exitDate: collector.date(index, "exitDate", row.exitDate),
      deathDate: collector.date(index, "deathDate", row.deathDate),
    });

    const eligible = toBool(row.eligible);
    const screeningFailure = toBool(row.screeningFailure);
    if (eligible === null && toText(row.eligible) !== null) {
      collector.add(index, "eligible", row.eligible, "Unrecognized eligibility value; participant treated as eligible");
    }
    if (screeningFailure === null && toText(row.screeningFailure) !== null) {
      collector.add(index, "screeningFailure", row.screeningFailure, "Unrecognized screening failure value ignored");
    }

    if (eligible !== null || screeningFailure !== null) {
      eligibility.push({ participantId, eligible: eligible !== false && screeningFailure !== true });
    }
  });

  return { exits, eligibility, warnings: collector.warnings };
}
