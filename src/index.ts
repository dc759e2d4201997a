export { QuoteHistoryClient } from "./client";
export type { QuoteHistoryConfig, QuoteHistoryCallbacks } from "./client.types";
export {
  FREQUENCY,
  TICK_VARIANT,
  DEBUG_EVENT,
  ERROR,
  HOSTS,
  QuoteHistoryError,
  endpoints,
  resolveHosts,
  type ErrorCode,
  type ErrorKind,
  type Hosts,
} from "./constants";
export { fromSeconds, fromDuration, fromDates, marketCloseSeconds, OPEN_END, DEFAULT_PERIOD } from "./domains/period";
export type { Period } from "./domains/period";
export type { History } from "./domains/history";
export type { Session } from "./domains/session";
export { SessionDomain } from "./domains/session";
export { HistoryDomain } from "./domains/history";
export { decodeTicks } from "./utils";
