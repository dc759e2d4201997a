import { DateTime, Duration, type DurationLike } from "luxon";
import { ERROR, QuoteHistoryError } from "@/constants/errors";
import type { Period } from ".";

/** Upper bound meaning "up to the latest available data". */
export const OPEN_END = Number.MAX_SAFE_INTEGER;

/** Bars are stamped at the close of the trading day, local time. */
const MARKET_CLOSE = { hour: 16, minute: 0, second: 0, millisecond: 0 } as const;

function nowSeconds(): number {
  return Math.floor(DateTime.now().toSeconds());
}

/**
 * Build a period from Unix seconds.
 * @param start - Must not be in the future.
 * @param end - Defaults to `OPEN_END`.
 */
export function fromSeconds(start: number, end: number = OPEN_END): Period.Spec {
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw new QuoteHistoryError(ERROR.INVALID_PERIOD, "Period bounds must be integer seconds");
  }
  if (start > nowSeconds()) {
    throw new QuoteHistoryError(ERROR.INVALID_PERIOD, "start > now");
  }
  if (start > end) {
    throw new QuoteHistoryError(ERROR.INVALID_PERIOD, "start > end");
  }
  return Object.freeze({ startSeconds: start, endSeconds: end });
}

/** Everything from `duration` ago up to the latest data. Calendar and time zone are ignored. */
export function fromDuration(duration: DurationLike): Period.Spec {
  const length = Duration.fromDurationLike(duration);
  if (!length.isValid) {
    throw new QuoteHistoryError(ERROR.INVALID_PERIOD, `Invalid duration: ${length.invalidReason ?? "unknown"}`);
  }
  const start = Math.floor(DateTime.now().minus(length).toSeconds());
  return fromSeconds(start);
}

export function marketCloseSeconds(timeZone: string, date: string): number {
  const local = DateTime.fromISO(date, { zone: timeZone });
  if (!local.isValid) {
    if (local.invalidReason === "unsupported zone") {
      throw new QuoteHistoryError(ERROR.INVALID_TIME_ZONE, `Unknown time zone: ${timeZone}`);
    }
    throw new QuoteHistoryError(ERROR.INVALID_PERIOD, `Invalid date: ${date}`);
  }
  // set() resolves a local time inside a DST gap by shifting it forward
  return Math.floor(local.set(MARKET_CLOSE).toSeconds());
}

/**
 * Build a period from calendar dates in the exchange's time zone.
 * Each date is taken at 16:00 local time.
 * @param timeZone - IANA name, e.g. "America/New_York".
 * @param start - ISO date, e.g. "2017-10-10".
 * @param end - ISO date; omitted means up to the latest data.
 */
export function fromDates(timeZone: string, start: string, end?: string): Period.Spec {
  const startSeconds = marketCloseSeconds(timeZone, start);
  if (end === undefined) return fromSeconds(startSeconds);
  return fromSeconds(startSeconds, marketCloseSeconds(timeZone, end));
}

export const DEFAULT_PERIOD: Period.Spec = Object.freeze({ startSeconds: 0, endSeconds: OPEN_END });
