export type RedemptionErrorCode =
  | "UNAUTHORIZED"
  | "ALREADY_CLAIMED"
  | "INVALID_SIGNATURE_FORMAT"
  | "SIGNATURE_RECOVERY_FAILED"
  | "ADMIN_REQUIRED"
  | "AMOUNT_MISMATCH"
  | "INVALID_INPUT"
  | "CREDIT_FAILED"
  | "CREDIT_UNCONFIRMED";

export class RedemptionError extends Error {
  readonly code: RedemptionErrorCode;

  constructor(code: RedemptionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RedemptionError";
    this.code = code;
  }
}

export function isRedemptionError(
  value: unknown,
  code?: RedemptionErrorCode,
): value is RedemptionError {
  if (!(value instanceof RedemptionError)) return false;
  return code === undefined || value.code === code;
}
