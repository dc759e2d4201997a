export enum FREQUENCY {
  DAILY = "d",
  WEEKLY = "wk",
  MONTHLY = "mo",
}

export enum TICK_VARIANT {
  HISTORY = "history",
  DIVIDEND = "div",
  SPLIT = "split",
}

export enum DEBUG_EVENT {
  REQUEST = "REQUEST",
  SESSION = "SESSION",
  RETRY = "RETRY",
  NOT_FOUND = "NOT_FOUND",
}
