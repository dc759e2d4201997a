import { TICK_VARIANT, type FREQUENCY } from "@/constants/enums";
import type { Period } from "../period";

export namespace History {
  export interface Tick {
    /** Calendar date (YYYY-MM-DD) in the exchange's time zone. */
    date: string;
    open: number;
    high: number;
    low: number;
    close: number;
    adjustedClose: number;
    volume: number;
  }

  export interface DividendTick {
    date: string;
    dividend: number;
  }

  export interface SplitTick {
    date: string;
    beforeSplit: number;
    afterSplit: number;
  }

  export interface TickByVariant {
    [TICK_VARIANT.HISTORY]: Tick;
    [TICK_VARIANT.DIVIDEND]: DividendTick;
    [TICK_VARIANT.SPLIT]: SplitTick;
  }

  export type AnyTick = TickByVariant[TICK_VARIANT];

  export interface Request<V extends TICK_VARIANT = TICK_VARIANT> {
    readonly symbol: string;
    readonly period: Period.Spec;
    readonly frequency: FREQUENCY;
    readonly variant: V;
  }

  export interface Options {
    /** Time window to fetch (default: all available history). */
    period?: Period.Spec;
    /** Bar sampling (default: daily). */
    frequency?: FREQUENCY;
    /** Aborts every in-flight request of the call. */
    signal?: AbortSignal;
  }

  /** Per-symbol results in input order; `null` marks a symbol the service does not know. */
  export type Result<V extends TICK_VARIANT> = Map<string, TickByVariant[V][] | null>;
}
