export enum LottoErrorCode {
  INVALID_INPUT = "INVALID_INPUT",
  INVALID_CONFIG = "INVALID_CONFIG",
  UNRECOGNIZED_TIER = "UNRECOGNIZED_TIER",
}

export interface LottoErrorPayload {
  error: LottoErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class LottoError extends Error {
  constructor(public readonly code: LottoErrorCode, message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = "LottoError";
  }
}

export function lottoErrorPayload(code: LottoErrorCode, message: string, details?: Record<string, unknown>): LottoErrorPayload {
  return { error: code, message, details };
}

export function isLottoError(err: unknown): err is LottoError {
  return err instanceof LottoError;
}

export function invalidInput(message: string, details?: Record<string, unknown>): LottoError {
  return new LottoError(LottoErrorCode.INVALID_INPUT, message, details);
}

/**
 * Exhaustiveness guard for closed tier/outcome unions. Reaching it means a
 * union member was added without a matching branch.
 */
export function assertNever(value: never, what = "tier"): never {
  throw new LottoError(LottoErrorCode.UNRECOGNIZED_TIER, `Unrecognized ${what}: ${String(value)}`);
}
