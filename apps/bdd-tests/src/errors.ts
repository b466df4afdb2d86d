export type HarnessErrorCode =
  | "not_connected"
  | "invalid_argument"
  | "fixture_not_found"
  | "entries_not_loaded"
  | "index_out_of_range"
  | "tree_size_mismatch"
  | "consistency_proof_invalid"
  | "entry_count_mismatch"
  | "audit_proof_empty"
  | "retry_exhausted"
  | "undefined_step"
  | "ambiguous_step";

// Mismatches may clear once the log merges pending entries; everything else is a script error.
const RETRYABLE: ReadonlySet<HarnessErrorCode> = new Set([
  "tree_size_mismatch",
  "consistency_proof_invalid",
  "entry_count_mismatch",
  "audit_proof_empty"
]);

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly retryable: boolean;

  constructor(code: HarnessErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "HarnessError";
    this.code = code;
    this.retryable = RETRYABLE.has(code);
  }
}

export const isPermanent = (error: unknown) =>
  error instanceof HarnessError && !error.retryable;

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
