/**
 * Ledger errors.
 *
 * Every failed operation throws a LedgerError; the enclosing atomic
 * transaction restores state before the error reaches the caller.
 * `code` is a stable snake_case identifier; `kind` picks the HTTP status.
 */

export type LedgerErrorKind =
  | "unauthenticated"
  | "invalid_input"
  | "unauthorized"
  | "not_found"
  | "rejected";

const STATUS: Record<LedgerErrorKind, number> = {
  unauthenticated: 401,
  invalid_input: 422,
  unauthorized: 403,
  not_found: 404,
  rejected: 409,
};

export class LedgerError extends Error {
  readonly code: string;
  readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind, code: string, detail?: string) {
    super(detail ?? code);
    this.name = "LedgerError";
    this.kind = kind;
    this.code = code;
  }

  get status(): number {
    return STATUS[this.kind];
  }

  toJSON(): { error: string; detail: string } {
    return { error: this.code, detail: this.message };
  }
}

export function invalid(code: string, detail?: string): LedgerError {
  return new LedgerError("invalid_input", code, detail);
}

export function unauthenticated(code: string, detail?: string): LedgerError {
  return new LedgerError("unauthenticated", code, detail);
}

export function unauthorized(code: string, detail?: string): LedgerError {
  return new LedgerError("unauthorized", code, detail);
}

export function notFound(code: string, detail?: string): LedgerError {
  return new LedgerError("not_found", code, detail);
}

export function rejected(code: string, detail?: string): LedgerError {
  return new LedgerError("rejected", code, detail);
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}
