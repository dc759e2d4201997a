import type { Readable } from "stream";
import { parse } from "csv-parse";
import { DateTime } from "luxon";
import { TICK_VARIANT } from "@/constants/enums";
import type { History } from "@/domains/history";
import { cancelledError } from "./abort";

type RowParser<V extends TICK_VARIANT> = (fields: string[]) => History.TickByVariant[V] | null;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const INTEGER = /^-?\d+$/;

function parseDate(value: string): string | null {
  if (!ISO_DATE.test(value)) return null;
  return DateTime.fromISO(value, { zone: "utc" }).isValid ? value : null;
}

/** The service writes "null" where it has no value; such a field never parses. */
export function parseDecimal(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed === "" || trimmed === "null") return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!INTEGER.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

function parseHistoryRow(fields: string[]): History.Tick | null {
  if (fields.length !== 7) return null;
  const date = parseDate(fields[0]);
  const [open, high, low, close, adjustedClose] = fields.slice(1, 6).map(parseDecimal);
  const volume = parseInteger(fields[6]);
  if (date === null || open === null || high === null || low === null) return null;
  if (close === null || adjustedClose === null || volume === null) return null;
  return { date, open, high, low, close, adjustedClose, volume };
}

function parseDividendRow(fields: string[]): History.DividendTick | null {
  if (fields.length !== 2) return null;
  const date = parseDate(fields[0]);
  const dividend = parseDecimal(fields[1]);
  if (date === null || dividend === null) return null;
  return { date, dividend };
}

function parseSplitRow(fields: string[]): History.SplitTick | null {
  if (fields.length !== 2) return null;
  const date = parseDate(fields[0]);
  const parts = fields[1].split("/");
  if (date === null || parts.length !== 2) return null;
  const beforeSplit = parseDecimal(parts[0]);
  const afterSplit = parseDecimal(parts[1]);
  if (beforeSplit === null || afterSplit === null) return null;
  return { date, beforeSplit, afterSplit };
}

const ROW_PARSERS: { [V in TICK_VARIANT]: RowParser<V> } = {
  [TICK_VARIANT.HISTORY]: parseHistoryRow,
  [TICK_VARIANT.DIVIDEND]: parseDividendRow,
  [TICK_VARIANT.SPLIT]: parseSplitRow,
};

function isStringRow(record: unknown): record is string[] {
  return Array.isArray(record) && record.every((field) => typeof field === "string");
}

/**
 * Decode a CSV download body into ticks, one record at a time.
 * The header line is skipped, rows that do not fit the variant are dropped.
 */
export async function* decodeTicks<V extends TICK_VARIANT>(
  source: Readable,
  variant: V,
  signal?: AbortSignal,
): AsyncGenerator<History.TickByVariant[V]> {
  const parseRow: RowParser<V> = ROW_PARSERS[variant];
  const parser = parse({
    from_line: 2,
    skip_empty_lines: true,
    relax_column_count: true,
    skip_records_with_error: true,
    trim: true,
  });

  source.on("error", (error) => parser.destroy(error));
  source.pipe(parser);

  try {
    for await (const record of parser) {
      if (signal?.aborted) throw cancelledError(signal.reason);
      if (!isStringRow(record)) continue;
      const tick = parseRow(record);
      if (tick !== null) yield tick;
    }
  } finally {
    source.unpipe(parser);
    source.destroy();
    parser.destroy();
  }
}
