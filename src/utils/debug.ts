import { appendFileSync, writeFileSync } from "fs";
import type { DEBUG_EVENT } from "@/constants/enums";

const DEBUG_LOG = "debug.log";

export function shouldLog(event: DEBUG_EVENT, debug: boolean | string): boolean {
  if (!debug) return false;
  if (debug === true || debug === "true") return true;
  const filters = debug.split(",").map((s) => s.trim().toUpperCase());
  return filters.includes(event);
}

export function debugLog(event: DEBUG_EVENT, detail: Record<string, unknown>): void {
  appendFileSync(DEBUG_LOG, JSON.stringify({ event, time: new Date().toISOString(), ...detail }) + "\n");
}

export function clearDebugLog(): void {
  writeFileSync(DEBUG_LOG, "");
}
