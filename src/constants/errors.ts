export const ERROR = {
  EMPTY_SYMBOLS: "EMPTY_SYMBOLS",
  BLANK_SYMBOL: "BLANK_SYMBOL",
  DUPLICATE_SYMBOLS: "DUPLICATE_SYMBOLS",
  INVALID_PERIOD: "INVALID_PERIOD",
  INVALID_TIME_ZONE: "INVALID_TIME_ZONE",

  SESSION_ERROR: "SESSION_ERROR",
  SESSION_COOKIE_NOT_FOUND: "SESSION_COOKIE_NOT_FOUND",
  CRUMB_ERROR: "CRUMB_ERROR",
  CRUMB_NOT_FOUND: "CRUMB_NOT_FOUND",

  UNAUTHORIZED: "UNAUTHORIZED",
  DOWNLOAD_FAILED: "DOWNLOAD_FAILED",
  DOWNLOAD_ERROR: "DOWNLOAD_ERROR",

  CANCELLED: "CANCELLED",
} as const;

export type ErrorCode = (typeof ERROR)[keyof typeof ERROR];

export type ErrorKind = "validation" | "auth" | "transport" | "cancelled";

const KIND: Record<ErrorCode, ErrorKind> = {
  EMPTY_SYMBOLS: "validation",
  BLANK_SYMBOL: "validation",
  DUPLICATE_SYMBOLS: "validation",
  INVALID_PERIOD: "validation",
  INVALID_TIME_ZONE: "validation",
  SESSION_ERROR: "auth",
  SESSION_COOKIE_NOT_FOUND: "auth",
  CRUMB_ERROR: "auth",
  CRUMB_NOT_FOUND: "auth",
  UNAUTHORIZED: "transport",
  DOWNLOAD_FAILED: "transport",
  DOWNLOAD_ERROR: "transport",
  CANCELLED: "cancelled",
};

export class QuoteHistoryError extends Error {
  public code: ErrorCode;

  constructor(code: ErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "QuoteHistoryError";
    this.code = code;
  }

  get kind(): ErrorKind {
    return KIND[this.code];
  }
}
