import { clamp } from "../../shared/format.js";
import type { SchedulerSettings } from "../../shared/types.js";

function asFiniteNumber(value: unknown, fallback: number): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return fallback;
}

function asBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }
  return fallback;
}

export function sanitizeSchedulerSettings(
  candidate: Partial<Record<keyof SchedulerSettings, unknown>>,
  defaults: SchedulerSettings
): SchedulerSettings {
  return {
    weightFlushDelayMs: clamp(
      Math.round(asFiniteNumber(candidate.weightFlushDelayMs, defaults.weightFlushDelayMs)),
      0,
      60000
    ),
    sessionFlushDelayMs: clamp(
      Math.round(asFiniteNumber(candidate.sessionFlushDelayMs, defaults.sessionFlushDelayMs)),
      0,
      60000
    ),
    hydrationConcurrency: clamp(
      Math.round(asFiniteNumber(candidate.hydrationConcurrency, defaults.hydrationConcurrency)),
      1,
      16
    ),
    restoreScopeOnStartup: asBoolean(candidate.restoreScopeOnStartup, defaults.restoreScopeOnStartup)
  };
}
