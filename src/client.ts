import { QuoteHistoryError, resolveHosts, type ErrorCode } from "@/constants";
import { clearDebugLog } from "@/utils";
import { SessionDomain } from "@/domains/session";
import { HistoryDomain } from "@/domains/history";
import type { ClientContext, QuoteHistoryConfig } from "./client.types";

export class QuoteHistoryClient {
  private _ctx: ClientContext;

  /** Crumb + cookie session shared by every request of this client. */
  public readonly session: SessionDomain;
  /** Price bars, dividends and splits. */
  public readonly history: HistoryDomain;

  constructor(config: QuoteHistoryConfig = {}) {
    const callbacks = config.callbacks ?? {};
    const debug = config.debug ?? false;
    if (debug) clearDebugLog();

    this._ctx = {
      config,
      callbacks,
      hosts: resolveHosts(config.hosts),
      timeout: config.timeout ?? 0,
      debug,
      credentials: (forceRefresh, stale) => this.session.obtain(forceRefresh, stale),
      throwError(code: ErrorCode, message: string, cause?: unknown): never {
        const error = new QuoteHistoryError(code, message, cause);
        callbacks.onError?.(error);
        throw error;
      },
    };

    this.session = new SessionDomain(this._ctx);
    this.history = new HistoryDomain(this._ctx);
  }
}
