import type { Readable } from "stream";
import { endpoints, ERROR, FREQUENCY, TICK_VARIANT, DEBUG_EVENT, QuoteHistoryError } from "@/constants";
import {
  Cookies,
  csvHeaders,
  httpGet,
  decodeTicks,
  abortable,
  cancelledError,
  throwIfAborted,
  shouldLog,
  debugLog,
} from "@/utils";
import type { ClientContext } from "@/client.types";
import type { Session } from "../session";
import { DEFAULT_PERIOD } from "../period";
import type { History } from ".";

interface DownloadResponse {
  status: number;
  body: Readable | null;
}

function isReadable(value: unknown): value is Readable {
  return typeof value === "object" && value !== null && "pipe" in value && "destroy" in value;
}

function release(response: DownloadResponse): void {
  response.body?.destroy();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/** Each duplicated value once, in the order its first repeat appears. */
function findDuplicates(symbols: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const symbol of symbols) {
    if (seen.has(symbol)) duplicates.add(symbol);
    seen.add(symbol);
  }
  return [...duplicates];
}

export class HistoryDomain {
  constructor(private _ctx: ClientContext) {}

  /** Daily, weekly or monthly price bars for one symbol. `null` if the symbol is unknown. */
  async get(symbol: string, options: History.Options = {}): Promise<History.Tick[] | null> {
    return this._fetchOne(symbol, TICK_VARIANT.HISTORY, options);
  }

  async getMany(symbols: readonly string[], options: History.Options = {}): Promise<History.Result<TICK_VARIANT.HISTORY>> {
    return this.fetchMany(symbols, TICK_VARIANT.HISTORY, options);
  }

  /** Dividend payments for one symbol. `null` if the symbol is unknown. */
  async dividends(symbol: string, options: History.Options = {}): Promise<History.DividendTick[] | null> {
    return this._fetchOne(symbol, TICK_VARIANT.DIVIDEND, options);
  }

  async dividendsMany(
    symbols: readonly string[],
    options: History.Options = {},
  ): Promise<History.Result<TICK_VARIANT.DIVIDEND>> {
    return this.fetchMany(symbols, TICK_VARIANT.DIVIDEND, options);
  }

  /** Split ratios for one symbol. `null` if the symbol is unknown. */
  async splits(symbol: string, options: History.Options = {}): Promise<History.SplitTick[] | null> {
    return this._fetchOne(symbol, TICK_VARIANT.SPLIT, options);
  }

  async splitsMany(symbols: readonly string[], options: History.Options = {}): Promise<History.Result<TICK_VARIANT.SPLIT>> {
    return this.fetchMany(symbols, TICK_VARIANT.SPLIT, options);
  }

  /**
   * Fetch ticks for every symbol concurrently.
   *
   * The symbol list is validated before any request. Unknown symbols map to `null`.
   * Any other per-symbol failure rejects the whole call once every fetch has settled;
   * an aborted `signal` rejects it with `CANCELLED`.
   */
  async fetchMany<V extends TICK_VARIANT>(
    symbols: readonly string[],
    variant: V,
    options: History.Options = {},
  ): Promise<History.Result<V>> {
    this._validateSymbols(symbols);

    const { period = DEFAULT_PERIOD, frequency = FREQUENCY.DAILY, signal } = options;
    const settled = await Promise.allSettled(
      symbols.map((symbol) =>
        this._fetchTicks<V>(Object.freeze({ symbol, period, frequency, variant }), signal),
      ),
    );

    if (signal?.aborted) this._fail(cancelledError(signal.reason));

    const failure = settled.find((result): result is PromiseRejectedResult => result.status === "rejected");
    if (failure) {
      const reason: unknown = failure.reason;
      if (reason instanceof QuoteHistoryError) this._fail(reason);
      throw reason;
    }

    const result: History.Result<V> = new Map();
    settled.forEach((outcome, i) => {
      if (outcome.status === "fulfilled") result.set(symbols[i], outcome.value);
    });
    return result;
  }

  // ── Internals ───────────────────────────────────────────────────────────────────────────────────────────────────────

  private async _fetchOne<V extends TICK_VARIANT>(
    symbol: string,
    variant: V,
    options: History.Options,
  ): Promise<History.TickByVariant[V][] | null> {
    const result = await this.fetchMany([symbol], variant, options);
    return result.get(symbol) ?? null;
  }

  private _validateSymbols(symbols: readonly string[]): void {
    if (symbols.length === 0) {
      this._ctx.throwError(ERROR.EMPTY_SYMBOLS, "Empty list.");
    }

    const blank = symbols.findIndex((symbol) => symbol.trim() === "");
    if (blank !== -1) {
      this._ctx.throwError(ERROR.BLANK_SYMBOL, `Empty symbol at index ${blank}.`);
    }

    const duplicates = findDuplicates(symbols);
    if (duplicates.length > 0) {
      const list = duplicates.map((symbol) => `"${symbol}"`).join(", ");
      this._ctx.throwError(ERROR.DUPLICATE_SYMBOLS, `Duplicate symbol(s): ${list}.`);
    }
  }

  /** One symbol: request, refresh the crumb once on 401, then decode or settle as absent. */
  private async _fetchTicks<V extends TICK_VARIANT>(
    request: History.Request<V>,
    signal?: AbortSignal,
  ): Promise<History.TickByVariant[V][] | null> {
    const credentials = await abortable(this._ctx.credentials(false), signal);
    const first = await this._download(request, credentials, signal);
    if (first.status !== 401) return this._settle(request, first, signal);

    release(first);
    console.warn(`[quote-history] Unauthorized for "${request.symbol}", refreshing crumb`);
    if (shouldLog(DEBUG_EVENT.RETRY, this._ctx.debug)) {
      debugLog(DEBUG_EVENT.RETRY, { symbol: request.symbol, crumb: credentials.crumb });
    }

    throwIfAborted(signal);
    const refreshed = await abortable(this._ctx.credentials(true, credentials), signal);
    const second = await this._download(request, refreshed, signal);
    if (second.status === 401) {
      release(second);
      throw new QuoteHistoryError(ERROR.UNAUTHORIZED, `Unauthorized for "${request.symbol}" after crumb refresh`);
    }
    return this._settle(request, second, signal);
  }

  private async _download(
    request: History.Request,
    credentials: Session.Credentials,
    signal?: AbortSignal,
  ): Promise<DownloadResponse> {
    throwIfAborted(signal);
    const url = endpoints.download(this._ctx.hosts.DOWNLOAD, request, credentials.crumb);
    if (shouldLog(DEBUG_EVENT.REQUEST, this._ctx.debug)) {
      debugLog(DEBUG_EVENT.REQUEST, { symbol: request.symbol, url });
    }

    try {
      const response = await httpGet<unknown>({
        url,
        headers: csvHeaders(Cookies.serialize(credentials.cookies)),
        responseType: "stream",
        timeout: this._ctx.timeout,
        signal,
      });
      return { status: response.status, body: isReadable(response.data) ? response.data : null };
    } catch (error: unknown) {
      if (signal?.aborted) throw cancelledError(signal.reason);
      throw new QuoteHistoryError(
        ERROR.DOWNLOAD_ERROR,
        `Download error for "${request.symbol}": ${errorMessage(error)}`,
        error,
      );
    }
  }

  private async _settle<V extends TICK_VARIANT>(
    request: History.Request<V>,
    response: DownloadResponse,
    signal?: AbortSignal,
  ): Promise<History.TickByVariant[V][] | null> {
    if (response.status === 404) {
      release(response);
      if (shouldLog(DEBUG_EVENT.NOT_FOUND, this._ctx.debug)) {
        debugLog(DEBUG_EVENT.NOT_FOUND, { symbol: request.symbol });
      }
      this._ctx.callbacks.onNotFound?.(request.symbol);
      return null;
    }

    if (response.status !== 200 || response.body === null) {
      release(response);
      throw new QuoteHistoryError(ERROR.DOWNLOAD_FAILED, `Download failed for "${request.symbol}": ${response.status}`);
    }

    const ticks: History.TickByVariant[V][] = [];
    try {
      for await (const tick of decodeTicks(response.body, request.variant, signal)) {
        ticks.push(tick);
      }
    } catch (error: unknown) {
      if (signal?.aborted) throw cancelledError(signal.reason);
      if (error instanceof QuoteHistoryError) throw error;
      throw new QuoteHistoryError(
        ERROR.DOWNLOAD_ERROR,
        `Download error for "${request.symbol}": ${errorMessage(error)}`,
        error,
      );
    }
    return ticks;
  }

  private _fail(error: QuoteHistoryError): never {
    this._ctx.callbacks.onError?.(error);
    throw error;
  }
}
