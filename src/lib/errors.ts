// src/lib/errors.ts
import type { ReportArtifact } from "@/lib/types";

export class SalesLedgerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The database could not be opened or its schema could not be created.
 */
export class StorageUnavailableError extends SalesLedgerError {
  constructor(
    public readonly databasePath: string,
    cause: unknown,
  ) {
    super(
      `Sales ledger storage unavailable at ${databasePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class InvalidStateError extends SalesLedgerError {
  constructor(
    public readonly operation: string,
    public readonly state: string,
  ) {
    super(`Cannot ${operation}: ledger store is ${state}.`);
  }
}

export class MalformedRecordError extends SalesLedgerError {
  constructor(
    public readonly rowId: number | null,
    public readonly issues: string[],
  ) {
    super(
      `Malformed sale record${rowId === null ? "" : ` #${rowId}`}: ${issues.join("; ")}`,
    );
  }
}

export class SaleValidationError extends SalesLedgerError {
  constructor(public readonly errors: Record<string, string[]>) {
    super(
      `Invalid sale: ${Object.entries(errors)
        .map(([field, messages]) => `${field} ${messages.join(", ")}`)
        .join("; ")}`,
    );
  }
}

/**
 * The report was produced but the sink rejected it. Retry with the carried artifact.
 */
export class DeliveryFailureError extends SalesLedgerError {
  constructor(
    public readonly artifact: ReportArtifact,
    cause: unknown,
  ) {
    super(
      `Failed to deliver ${artifact.filename}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
