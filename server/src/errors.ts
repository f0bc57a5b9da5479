import type { TableKind } from "@shared/schema";

export class IngestionError extends Error {
  readonly code = "INGESTION_FAILED";

  constructor(
    message: string,
    public table: TableKind,
    public missingFields: string[] = [],
    public details: string[] = [],
  ) {
    super(message);
    this.name = "IngestionError";
  }
}

export class CatalogConfigurationError extends Error {
  readonly code = "CATALOG_EMPTY";

  constructor(message: string) {
    super(message);
    this.name = "CatalogConfigurationError";
  }
}

export function isClientError(err: unknown): err is IngestionError | CatalogConfigurationError {
  return err instanceof IngestionError || err instanceof CatalogConfigurationError;
}
