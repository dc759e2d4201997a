import type { QuoteHistoryError, ErrorCode, Hosts } from "@/constants";
import type { Session } from "@/domains/session";

export interface QuoteHistoryConfig {
  /** Override any of the service endpoints, e.g. to point at a proxy. */
  hosts?: Partial<Hosts>;
  /** Transport timeout per request in milliseconds (default: 0 = none). */
  timeout?: number;
  /** `true`, or a comma list of events (REQUEST, SESSION, RETRY, NOT_FOUND) to append to debug.log. */
  debug?: boolean | string;
  callbacks?: QuoteHistoryCallbacks;
}

export interface QuoteHistoryCallbacks {
  onError?: (error: QuoteHistoryError) => void;
  onSession?: (crumb: string) => void;
  onNotFound?: (symbol: string) => void;
}

export interface ClientContext {
  config: QuoteHistoryConfig;
  callbacks: QuoteHistoryCallbacks;
  hosts: Hosts;
  timeout: number;
  debug: boolean | string;
  /**
   * Current session credentials. `forceRefresh` mints new ones unless `stale` has
   * already been replaced by another caller.
   */
  credentials(forceRefresh?: boolean, stale?: Session.Credentials): Promise<Session.Credentials>;
  throwError(code: ErrorCode, message: string, cause?: unknown): never;
}
