import { DEFAULT_UNPLAYABLE_REASON } from "../../shared/constants.js";
import { firstLine } from "../../shared/format.js";
import { canonicalKey } from "./path-key.js";

export function normalizeUnplayableReason(raw: string | null | undefined): string {
  if (typeof raw !== "string") {
    return DEFAULT_UNPLAYABLE_REASON;
  }
  const line = firstLine(raw);
  return line.length > 0 ? line : DEFAULT_UNPLAYABLE_REASON;
}

/** Tracks that failed to play, keyed by canonical path. Scope-independent. */
export class UnplayableTracker {
  private readonly reasons = new Map<string, string>();

  /** Returns true when the set changed. */
  public mark(filePath: string, reason?: string | null): boolean {
    const key = canonicalKey(filePath);
    const normalized = normalizeUnplayableReason(reason);
    const wasMarked = this.reasons.has(key);
    this.reasons.set(key, normalized);
    return !wasMarked;
  }

  public clear(filePath: string): boolean {
    return this.reasons.delete(canonicalKey(filePath));
  }

  public clearAll(): boolean {
    if (this.reasons.size === 0) {
      return false;
    }
    this.reasons.clear();
    return true;
  }

  public reason(filePath: string): string | null {
    return this.reasons.get(canonicalKey(filePath)) ?? null;
  }

  public isUnplayableKey(key: string): boolean {
    return this.reasons.has(key);
  }

  public size(): number {
    return this.reasons.size;
  }

  public entries(): Array<[string, string]> {
    return [...this.reasons.entries()];
  }
}
