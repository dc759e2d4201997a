import { ERROR, DEBUG_EVENT, QuoteHistoryError } from "@/constants";
import { Cookies, baseHeaders, cookieOnlyHeaders, httpGet, shouldLog, debugLog } from "@/utils";
import type { ClientContext } from "@/client.types";
import type { Session } from ".";

const CRUMB_PATTERN = /^[^\s<>"]+$/;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/**
 * Owns the crumb + cookie pair. Reads are plain property reads; writes go
 * through one shared acquisition at a time.
 */
export class SessionDomain {
  private _credentials: Session.Credentials | null = null;
  private _pending: Promise<Session.Credentials> | null = null;

  constructor(private _ctx: ClientContext) {}

  /** Cached credentials, or `null` before the first acquisition. */
  get current(): Session.Credentials | null {
    return this._credentials;
  }

  /**
   * Get the session credentials, acquiring them on first use.
   * @param forceRefresh - Mint a new crumb even if one is cached.
   */
  async credentials(forceRefresh = false): Promise<Session.Credentials> {
    try {
      return await this.obtain(forceRefresh);
    } catch (error: unknown) {
      if (error instanceof QuoteHistoryError) this._ctx.callbacks.onError?.(error);
      throw error;
    }
  }

  /**
   * Same as `credentials()` without the error callback, for callers that report
   * failures themselves.
   * @param stale - The credentials the caller saw rejected. If they were already
   *   replaced, the replacement is returned without another acquisition.
   */
  async obtain(forceRefresh = false, stale?: Session.Credentials): Promise<Session.Credentials> {
    const cached = this._credentials;
    if (cached && !forceRefresh) return cached;
    if (cached && stale && cached !== stale) return cached;
    if (this._pending) return this._pending;

    this._pending = this._acquire();
    try {
      return await this._pending;
    } finally {
      this._pending = null;
    }
  }

  /** Forget the cached credentials; the next request acquires new ones. */
  reset(): void {
    this._credentials = null;
  }

  private async _acquire(): Promise<Session.Credentials> {
    const cookies = await this._fetchCookies();
    const crumb = await this._fetchCrumb(cookies);
    const credentials: Session.Credentials = Object.freeze({ cookies: Object.freeze(cookies), crumb });
    this._credentials = credentials;

    if (shouldLog(DEBUG_EVENT.SESSION, this._ctx.debug)) {
      debugLog(DEBUG_EVENT.SESSION, { crumb, cookies: Object.keys(cookies) });
    }
    this._ctx.callbacks.onSession?.(crumb);
    return credentials;
  }

  /** The landing page answers with any status; only its Set-Cookie matters. */
  private async _fetchCookies(): Promise<Record<string, string>> {
    let setCookies: string[];
    try {
      const response = await httpGet<unknown>({
        url: this._ctx.hosts.SESSION,
        headers: baseHeaders(),
        timeout: this._ctx.timeout,
        maxRedirects: 0,
      });
      setCookies = response.headers["set-cookie"] ?? [];
    } catch (error: unknown) {
      throw new QuoteHistoryError(ERROR.SESSION_ERROR, `Session error: ${errorMessage(error)}`, error);
    }

    const cookies = Cookies.merge({}, Cookies.parse(setCookies));
    if (Object.keys(cookies).length === 0) {
      throw new QuoteHistoryError(ERROR.SESSION_COOKIE_NOT_FOUND, "Session cookie not found");
    }
    return cookies;
  }

  private async _fetchCrumb(cookies: Record<string, string>): Promise<string> {
    let status: number;
    let body: unknown;
    try {
      const response = await httpGet<unknown>({
        url: this._ctx.hosts.CRUMB,
        headers: { ...baseHeaders(), ...cookieOnlyHeaders(Cookies.serialize(cookies)) },
        responseType: "text",
        timeout: this._ctx.timeout,
      });
      status = response.status;
      body = response.data;
    } catch (error: unknown) {
      throw new QuoteHistoryError(ERROR.CRUMB_ERROR, `Crumb fetch error: ${errorMessage(error)}`, error);
    }

    const crumb = typeof body === "string" ? body.trim() : "";
    if (status !== 200 || !CRUMB_PATTERN.test(crumb)) {
      throw new QuoteHistoryError(ERROR.CRUMB_NOT_FOUND, `Crumb not found: ${status}`);
    }
    return crumb;
  }
}
