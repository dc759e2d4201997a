import type { History } from "@/domains/history";

export const endpoints = {
  /** Download URL for one symbol: the symbol is a path segment, the rest is query. */
  download: (base: string, request: History.Request, crumb: string) => {
    const url = new URL(`${base.replace(/\/+$/, "")}/${encodeURIComponent(request.symbol)}`);
    url.searchParams.set("period1", String(request.period.startSeconds));
    url.searchParams.set("period2", String(request.period.endSeconds));
    url.searchParams.set("interval", `1${request.frequency}`);
    url.searchParams.set("events", request.variant);
    url.searchParams.set("crumb", crumb);
    return url.toString();
  },
};
