/**
 * Error types
 *
 * Two tiers cross the dispatcher boundary: store failures are reported to the
 * caller as ordinary text, argument errors are flagged as failed tool calls.
 * "Not found" is neither; the store signals it through its return values.
 */

export type StoreErrorKind = "io_failure" | "constraint_violation";

export class StoreError extends Error {
  readonly kind: StoreErrorKind;

  constructor(kind: StoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
    this.kind = kind;
  }

  static from(error: unknown): StoreError {
    if (error instanceof StoreError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new StoreError(classify(error), message, { cause: error });
  }
}

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function classify(error: unknown): StoreErrorKind {
  return sqliteCode(error)?.startsWith("SQLITE_CONSTRAINT") ? "constraint_violation" : "io_failure";
}

/**
 * Malformed tool invocation: unknown tool, missing or ill-typed arguments.
 */
export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolArgumentError";
  }
}
