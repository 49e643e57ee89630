// Shared error model for the encoder and the rendering surface

export const ErrorCodes = {
  INVALID_INPUT: "INVALID_INPUT",
  INVALID_VALUE: "INVALID_VALUE",
  MISALIGNED: "MISALIGNED",
  CAPACITY_EXCEEDED: "CAPACITY_EXCEEDED",
  UNDEFINED_LOG: "UNDEFINED_LOG",
  DIVISION_BY_ZERO: "DIVISION_BY_ZERO",
  POLYNOMIAL_DIVISION_BY_ZERO: "POLYNOMIAL_DIVISION_BY_ZERO",
  INVALID_MASK: "INVALID_MASK",
  INTERNAL_CONSISTENCY: "INTERNAL_CONSISTENCY",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface QrCodeErrorJson {
  code: ErrorCode;
  message: string;
  details?: unknown;
}

export class QrCodeError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  public constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = "QrCodeError";
    Error.captureStackTrace(this, this.constructor);
  }

  public toJSON(): QrCodeErrorJson {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isQrCodeError(error: unknown): error is QrCodeError {
  return error instanceof QrCodeError;
}
