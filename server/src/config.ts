/**
 * Service Configuration
 *
 * Environment-driven settings, validated once at start-up.
 */

import "dotenv/config";
import { z } from "zod";
import { lookupModeZ, type LookupMode } from "@shared/schema";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  CONSENT_LOOKUP_MODE: lookupModeZ.default("interval"),
  STUDY_MAPPING_PATH: z.string().min(1).optional(),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
  CATALOG_SHEET_NAME: z.string().min(1).optional(),
  GROUP_PLACEHOLDER: z.string().default("-"),
});

export type Env = z.infer<typeof envSchema>;

export interface ServiceConfig {
  port: number;
  nodeEnv: Env["NODE_ENV"];
  report: {
    defaultLookupMode: LookupMode;
    groupPlaceholder: string;
    /** Overrides the study mapping's catalog sheet when set */
    catalogSheetName?: string;
  };
  ingestion: {
    maxFileSizeMB: number;
    supportedFormats: string[];
    studyMappingPath?: string;
  };
}

export class ConfigError extends Error {
  constructor(message: string, public issues: string[]) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.errors.map(err => `[${err.path.join(".") || "env"}] ${err.message}`);
    console.error("[Config] Invalid environment:", issues);
    throw new ConfigError("Invalid environment configuration", issues);
  }

  const env = result.data;
  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    report: {
      defaultLookupMode: env.CONSENT_LOOKUP_MODE,
      groupPlaceholder: env.GROUP_PLACEHOLDER,
      catalogSheetName: env.CATALOG_SHEET_NAME,
    },
    ingestion: {
      maxFileSizeMB: env.MAX_UPLOAD_MB,
      supportedFormats: ["xlsx", "xls", "csv"],
      studyMappingPath: env.STUDY_MAPPING_PATH,
    },
  };
}
