import express, { type Request, type Response, type NextFunction } from "express";
import { createServer } from "http";
import multer from "multer";
import { registerRoutes } from "./routes";
import { loadConfig } from "./src/config";
import { defaultStudyMapping, loadStudyMapping } from "./src/ingestion/studyMapping";

process.on("unhandledRejection", (reason) => {
  console.error("[Process] Unhandled Rejection:", reason);
});

process.on("uncaughtException", (error) => {
  console.error("[Process] Uncaught Exception:", error);
  process.exit(1);
});

function gracefulShutdown(signal: string) {
  console.log(`[Process] Received ${signal}, shutting down gracefully...`);
  httpServer.close((err) => {
    if (err) {
      console.error("[Process] Error during shutdown:", err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

const app = express();
const httpServer = createServer(app);

app.use(express.json({ limit: "1mb" }));
app.use(express.urlencoded({ extended: false }));

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

(async () => {
  try {
    const config = loadConfig();
    const studyMapping = config.ingestion.studyMappingPath
      ? loadStudyMapping(config.ingestion.studyMappingPath)
      : defaultStudyMapping();

    await registerRoutes(httpServer, app, config, studyMapping);

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = err instanceof multer.MulterError
        ? 400
        : typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
          ? err.status
          : 500;
      const message = err instanceof Error ? err.message : "Internal Server Error";
      console.error("[express] Request failed:", err);
      res.status(status).json({ message });
    });

    httpServer.listen(config.port, "0.0.0.0", () => {
      log(`serving on port ${config.port} (lookup mode ${config.report.defaultLookupMode})`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    if (error instanceof Error) {
      console.error("Error message:", error.message);
      console.error("Error stack:", error.stack);
    }
    process.exit(1);
  }
})();
