export class SchemaError extends Error {
  readonly missingColumns: string[];

  constructor(table: string, missingColumns: string[]) {
    super(`${table} file is missing required columns: ${missingColumns.join(", ")}`);
    this.name = "SchemaError";
    this.missingColumns = missingColumns;
  }
}

export class UploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UploadError";
  }
}

export function isClientError(error: unknown): error is SchemaError | UploadError {
  return error instanceof SchemaError || error instanceof UploadError;
}

export function getErrorSummary(error: unknown) {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return [error.name, code, error.message].filter(Boolean).join(" | ");
  }
  return String(error ?? "Unknown error");
}
