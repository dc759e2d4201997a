export namespace Period {
  export interface Spec {
    /** Inclusive lower bound, Unix seconds (UTC). */
    readonly startSeconds: number;
    /** Upper bound, Unix seconds (UTC). `OPEN_END` when the period runs to the latest data. */
    readonly endSeconds: number;
  }
}
