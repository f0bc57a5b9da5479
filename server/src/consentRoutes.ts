/**
 * Consent Report API Routes
 * Upload the ICF catalog, consent listing and EOS listing; receive the
 * reconciled report as JSON or as a Word document.
 */

import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import { lookupModeZ, tableKindZ } from "@shared/schema";
import type { ServiceConfig } from "./config";
import { isClientError } from "./errors";
import { parseFileBuffer } from "../file-parser";
import { detectColumnMappings } from "./ingestion/columnMapping";
import {
  buildConsentReportFromFiles,
  catalogSheetFor,
  type UploadedTable,
} from "./ingestion/consentIngestion";
import type { StudyMapping } from "./ingestion/studyMapping";
import { renderStatus } from "./consent/rowEmitter";
import { renderConsentReportDocx } from "./orchestrator/render/renderConsentDocx";

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

const ReportRequestSchema = z.object({
  lookupMode: lookupModeZ.optional(),
  format: z.enum(["json", "docx"]).default("json"),
  catalogSheet: z.string().min(1).optional(),
});

const PreviewRequestSchema = z.object({
  table: tableKindZ,
});

export interface ConsentRouteDeps {
  config: ServiceConfig;
  studyMapping: StudyMapping;
}

/** The parts of a multer upload the handlers read */
export interface UploadedPart {
  buffer: Buffer;
  originalname: string;
}

export interface ConsentRequest {
  query: unknown;
  body: unknown;
  files?: Record<string, UploadedPart[]> | UploadedPart[];
  file?: UploadedPart;
}

export interface ConsentResponse {
  status(code: number): ConsentResponse;
  json(body: unknown): unknown;
  setHeader(name: string, value: string): unknown;
  send(body: Buffer): unknown;
}

// Standard 400 error response helper
function badRequest(res: ConsentResponse, code: string, message: string, details?: unknown) {
  return res.status(400).json({
    error: "Bad Request",
    code,
    message,
    details: details ?? null,
  });
}

function uploadedFile(req: ConsentRequest, field: string): UploadedTable | undefined {
  const files = req.files;
  if (!files || Array.isArray(files)) return undefined;
  const file = files[field]?.[0];
  return file ? { buffer: file.buffer, filename: file.originalname } : undefined;
}

function asRecord(value: unknown): object {
  return typeof value === "object" && value !== null ? value : {};
}

/** Query string and form fields together; form fields win */
function requestParams(req: ConsentRequest): Record<string, unknown> {
  return { ...asRecord(req.query), ...asRecord(req.body) };
}

function sendError(res: ConsentResponse, error: unknown, context: string) {
  if (isClientError(error)) {
    const details = "missingFields" in error ? { table: error.table, missingFields: error.missingFields, errors: error.details } : null;
    return badRequest(res, error.code, error.message, details);
  }
  console.error(`[ConsentReport] ${context} error:`, error);
  return res.status(500).json({ error: error instanceof Error ? error.message : `Failed to ${context}` });
}

export function createConsentHandlers({ config, studyMapping }: ConsentRouteDeps) {
  /**
   * POST /api/consent-report
   * Multipart fields: catalog, consents, eos (optional)
   */
  async function generateReport(req: ConsentRequest, res: ConsentResponse) {
    const params = ReportRequestSchema.safeParse(requestParams(req));
    if (!params.success) {
      return badRequest(res, "INVALID_PARAMS", "Invalid report parameters", params.error.flatten());
    }

    const catalog = uploadedFile(req, "catalog");
    const consents = uploadedFile(req, "consents");
    const eos = uploadedFile(req, "eos");
    if (!catalog || !consents) {
      return badRequest(res, "MISSING_FILES", "Both the 'catalog' and 'consents' files are required");
    }

    const lookupMode = params.data.lookupMode ?? config.report.defaultLookupMode;
    console.log(
      `[ConsentReport] Generating report: catalog=${catalog.filename}, consents=${consents.filename}, ` +
        `eos=${eos?.filename ?? "none"}, mode=${lookupMode}, format=${params.data.format}`,
    );

    try {
      const result = buildConsentReportFromFiles(
        { catalog, consents, eos },
        {
          studyMapping,
          lookupMode,
          groupPlaceholder: config.report.groupPlaceholder,
          catalogSheet: params.data.catalogSheet ?? config.report.catalogSheetName,
        },
      );

      if (params.data.format === "docx") {
        const buffer = await renderConsentReportDocx(result.report, { studyId: studyMapping.studyId });
        res.setHeader("Content-Type", DOCX_MIME);
        res.setHeader("Content-Disposition", 'attachment; filename="consent_report.docx"');
        return res.send(buffer);
      }

      return res.json({
        summary: result.report.summary,
        rows: result.report.merged.map((row) => ({
          participantId: row.participantId,
          version: row.version,
          date: renderStatus(row.status),
          comment: row.comment,
        })),
        spans: result.report.spans,
        warnings: result.warnings,
        timelineWarnings: result.report.timelineWarnings,
        parseErrors: result.parseErrors,
        columnMappings: result.columnMappings,
      });
    } catch (error) {
      return sendError(res, error, "generate consent report");
    }
  }

  /**
   * POST /api/consent-report/preview-columns
   * Shows how the headers of one uploaded table would be mapped
   */
  function previewColumns(req: ConsentRequest, res: ConsentResponse) {
    const params = PreviewRequestSchema.safeParse(requestParams(req));
    if (!params.success) {
      return badRequest(res, "INVALID_PARAMS", "Query parameter 'table' must be catalog, signatures or exits");
    }
    if (!req.file) {
      return badRequest(res, "MISSING_FILES", "No file uploaded");
    }

    const { buffer, originalname } = req.file;
    const preferredSheet = params.data.table === "catalog"
      ? catalogSheetFor(studyMapping, config.report.catalogSheetName)
      : undefined;
    const parsed = parseFileBuffer(buffer, originalname, { preferredSheet });
    if (!parsed.success) {
      return badRequest(res, "PARSE_FAILED", `Failed to parse ${originalname}`, parsed.errors);
    }

    const detection = detectColumnMappings(parsed.columns, params.data.table, studyMapping);
    return res.json({
      filename: originalname,
      sheetName: parsed.sheetName ?? null,
      columns: parsed.columns,
      ...detection,
      preview: parsed.rows.slice(0, 10),
      totalRows: parsed.rows.length,
    });
  }

  return { generateReport, previewColumns };
}

export function createConsentRouter(deps: ConsentRouteDeps): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.config.ingestion.maxFileSizeMB * 1024 * 1024 },
  });
  const handlers = createConsentHandlers(deps);

  router.post(
    "/",
    upload.fields([
      { name: "catalog", maxCount: 1 },
      { name: "consents", maxCount: 1 },
      { name: "eos", maxCount: 1 },
    ]),
    (req, res) => {
      // generateReport answers its own failures
      void handlers.generateReport(req, res);
    },
  );
  router.post("/preview-columns", upload.single("file"), (req, res) => {
    handlers.previewColumns(req, res);
  });

  return router;
}
