import { Readable } from "stream";
import { vi } from "vitest";
import { QuoteHistoryError, resolveHosts, type ErrorCode } from "@/constants";
import type { ClientContext } from "@/client.types";
import type { Session } from "@/domains/session";

export const STALE: Session.Credentials = Object.freeze({ cookies: Object.freeze({ A3: "d=stale" }), crumb: "stale-crumb" });
export const FRESH: Session.Credentials = Object.freeze({ cookies: Object.freeze({ A3: "d=fresh" }), crumb: "fresh-crumb" });

export function createMockContext(overrides: Partial<ClientContext> = {}): ClientContext {
  const callbacks = overrides.callbacks ?? {};
  return {
    config: {},
    callbacks,
    hosts: resolveHosts(),
    timeout: 0,
    debug: false,
    credentials: vi.fn(async (forceRefresh?: boolean) => (forceRefresh ? FRESH : STALE)),
    throwError(code: ErrorCode, message: string, cause?: unknown): never {
      const error = new QuoteHistoryError(code, message, cause);
      callbacks.onError?.(error);
      throw error;
    },
    ...overrides,
  };
}

export interface MockResponse {
  status: number;
  data: unknown;
  headers: Record<string, string[] | string>;
}

/** A download response whose body streams `body` in one or more chunks. */
export function csvResponse(status: number, ...chunks: string[]): MockResponse {
  return { status, data: Readable.from(chunks), headers: {} };
}

export function textResponse(status: number, data: string, setCookies: string[] = []): MockResponse {
  return { status, data, headers: setCookies.length ? { "set-cookie": setCookies } : {} };
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) out.push(item);
  return out;
}

/** Parse a download URL back into its symbol and query values. */
export function parseDownloadUrl(url: string): { symbol: string; params: Record<string, string> } {
  const parsed = new URL(url);
  const segments = parsed.pathname.split("/");
  return {
    symbol: decodeURIComponent(segments[segments.length - 1]),
    params: Object.fromEntries(parsed.searchParams.entries()),
  };
}

export const HISTORY_CSV =
  "Date,Open,High,Low,Close,Adj Close,Volume\n" +
  "2017-10-10,74.800003,75.419998,74.449997,75.180000,68.957863,16128500\n" +
  "2017-10-11,75.199997,75.690002,74.790001,74.940002,68.737740,13758900\n" +
  "2017-10-12,73.660004,73.839996,71.989998,72.370003,66.380417,30592300\n";
