import type { Express } from "express";
import type { Server } from "http";
import type { ServiceConfig } from "./src/config";
import { createConsentRouter } from "./src/consentRoutes";
import type { StudyMapping } from "./src/ingestion/studyMapping";

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  config: ServiceConfig,
  studyMapping: StudyMapping,
): Promise<Server> {
  app.get("/api/health", (_req, res) => {
    res.json({
      status: "healthy",
      studyId: studyMapping.studyId,
      defaultLookupMode: config.report.defaultLookupMode,
      supportedFormats: config.ingestion.supportedFormats,
    });
  });

  app.use("/api/consent-report", createConsentRouter({ config, studyMapping }));

  return httpServer;
}
