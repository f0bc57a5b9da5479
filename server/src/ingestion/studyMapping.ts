/**
 * Study Mapping
 *
 * Translates study-specific column codes (e.g. "icdat", "eosdat") into canonical
 * consent fields. Loaded once and passed explicitly to ingestion.
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { canonicalFieldZ } from "@shared/schema";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const StudyMappingSchema = z.object({
  studyId: z.string().min(1),
  description: z.string().optional(),
  catalogSheet: z.string().min(1).optional(),
  columns: z.record(z.string(), canonicalFieldZ).default({}),
});

export type StudyMapping = z.infer<typeof StudyMappingSchema>;

export class StudyMappingError extends Error {
  constructor(message: string, public filePath: string, public issues: string[] = []) {
    super(message);
    this.name = "StudyMappingError";
  }
}

export function formatStudyMappingErrors(errors: z.ZodError): string[] {
  return errors.errors.map(err => {
    const issuePath = err.path.join(".");
    return `[${issuePath || "root"}] ${err.message}`;
  });
}

function getDefaultMappingPath(): string {
  const cwdPath = path.resolve(process.cwd(), "server", "config", "study-mapping.default.json");
  if (fs.existsSync(cwdPath)) return cwdPath;
  return path.resolve(__dirname, "..", "..", "config", "study-mapping.default.json");
}

export function loadStudyMapping(filePath: string): StudyMapping {
  if (!fs.existsSync(filePath)) {
    throw new StudyMappingError(`Study mapping file not found: ${filePath}`, filePath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new StudyMappingError(
      `Study mapping '${filePath}' JSON parse error: ${e instanceof Error ? e.message : String(e)}`,
      filePath,
    );
  }

  const result = StudyMappingSchema.safeParse(parsed);
  if (!result.success) {
    const issues = formatStudyMappingErrors(result.error);
    console.error(`[StudyMapping] Validation errors in ${filePath}:`, issues);
    throw new StudyMappingError(`Study mapping '${filePath}' validation failed`, filePath, issues);
  }

  console.log(
    `[StudyMapping] Loaded mapping for study ${result.data.studyId} with ${Object.keys(result.data.columns).length} column codes`,
  );
  return result.data;
}

export function defaultStudyMapping(): StudyMapping {
  return loadStudyMapping(getDefaultMappingPath());
}
