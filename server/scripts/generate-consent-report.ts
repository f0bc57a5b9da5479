/**
 * Consent Report Script
 *
 * Builds the Word consent report from local spreadsheets without starting the server.
 *
 * Usage: npx tsx server/scripts/generate-consent-report.ts <catalog.xlsx> <consents.xlsx> [eos.xlsx] [out.docx]
 */

import { readFileSync, writeFileSync } from "fs";
import { basename, resolve } from "path";
import { loadConfig } from "../src/config";
import { buildConsentReportFromFiles, type UploadedTable } from "../src/ingestion/consentIngestion";
import { defaultStudyMapping, loadStudyMapping } from "../src/ingestion/studyMapping";
import { renderConsentReportDocx } from "../src/orchestrator/render/renderConsentDocx";

function readUpload(filePath: string): UploadedTable {
  const absolute = resolve(process.cwd(), filePath);
  return { buffer: readFileSync(absolute), filename: basename(absolute) };
}

async function generateReport(args: string[]): Promise<void> {
  const [catalogPath, consentsPath, eosPath, outPath = "consent_report.docx"] = args;
  if (!catalogPath || !consentsPath) {
    throw new Error("Usage: generate-consent-report <catalog> <consents> [eos] [out.docx]");
  }

  const config = loadConfig();
  const studyMapping = config.ingestion.studyMappingPath
    ? loadStudyMapping(config.ingestion.studyMappingPath)
    : defaultStudyMapping();

  const result = buildConsentReportFromFiles(
    {
      catalog: readUpload(catalogPath),
      consents: readUpload(consentsPath),
      eos: eosPath ? readUpload(eosPath) : undefined,
    },
    {
      studyMapping,
      lookupMode: config.report.defaultLookupMode,
      groupPlaceholder: config.report.groupPlaceholder,
      catalogSheet: config.report.catalogSheetName,
    },
  );

  for (const w of result.warnings) {
    console.warn(`[Report Script] ${w.table} row ${w.row} ${w.field}="${w.value}": ${w.message}`);
  }
  for (const w of result.report.timelineWarnings) {
    console.warn(`[Report Script] participant ${w.participantId}: ${w.message}`);
  }

  const buffer = await renderConsentReportDocx(result.report, { studyId: studyMapping.studyId });
  writeFileSync(resolve(process.cwd(), outPath), buffer);

  const { summary } = result.report;
  console.log(`[Report Script] Wrote ${outPath}`);
  console.log(`  - Participants: ${summary.participantCount}`);
  console.log(`  - Versions: ${summary.versionCount}`);
  console.log(`  - Signed: ${summary.statusCounts.signed}`);
  console.log(`  - CHECK: ${summary.statusCounts.needs_verification}`);
  console.log(`  - n.a.: ${summary.statusCounts.not_applicable}`);
}

generateReport(process.argv.slice(2)).then(() => {
  process.exit(0);
}).catch((err) => {
  console.error("[Report Script] Fatal error:", err);
  process.exit(1);
});
