import { MIN_SHUFFLE_WEIGHT } from "../../shared/constants.js";
import { clamp } from "../../shared/format.js";

export type RandomSource = () => number;

/** What the engine needs to know about the active scope's population. */
export interface ShuffleSource {
  /** Candidate keys in scope order. */
  population(): string[];
  weightOf(key: string): number;
  /** Resolvable to a record and not marked unplayable. */
  isPlayable(key: string): boolean;
}

export interface ShuffleSnapshot {
  order: readonly string[];
  cursor: number;
}

export function effectiveWeight(weight: number): number {
  if (!Number.isFinite(weight)) {
    return MIN_SHUFFLE_WEIGHT;
  }
  return Math.max(MIN_SHUFFLE_WEIGHT, weight);
}

/**
 * Efraimidis–Spirakis: each key gets `-ln(u) / w` and the permutation is the ascending
 * order of those values. At every prefix the next key is drawn with probability
 * proportional to its weight among the keys still left.
 */
export function weightedPermutation(
  keys: readonly string[],
  weightOf: (key: string) => number,
  random: RandomSource
): string[] {
  if (keys.length < 2) {
    return [...keys];
  }

  const keyed = keys.map((key) => {
    const weight = effectiveWeight(weightOf(key));
    const u = Math.max(Number.MIN_VALUE, random());
    return { key, sortKey: -Math.log(u) / weight };
  });
  keyed.sort((a, b) => a.sortKey - b.sortKey);
  return keyed.map((entry) => entry.key);
}

/**
 * Where a key joining mid-traversal lands in the unconsumed window `[lowerBound, length]`.
 * `u^w` leans toward 0 as the weight grows, so heavy keys land earlier.
 */
export function insertionIndex(u: number, weight: number, lowerBound: number, length: number): number {
  const start = clamp(lowerBound, 0, length);
  const remaining = length - start;
  const fraction = Math.pow(clamp(u, 0, 1), effectiveWeight(weight));
  return Math.min(length, start + Math.floor(fraction * (remaining + 1)));
}

/** One cumulative-weight draw. */
export function weightedPick(
  keys: readonly string[],
  weightOf: (key: string) => number,
  random: RandomSource
): string | null {
  if (keys.length === 0) {
    return null;
  }

  const weights = keys.map((key) => effectiveWeight(weightOf(key)));
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  if (!Number.isFinite(total) || total <= 0) {
    return keys[Math.floor(random() * keys.length)] ?? keys[0] ?? null;
  }

  let remaining = random() * total;
  for (let i = 0; i < keys.length; i += 1) {
    remaining -= weights[i] ?? 0;
    if (remaining <= 0) {
      return keys[i] ?? null;
    }
  }
  return keys[keys.length - 1] ?? null;
}

/**
 * A weighted permutation of the active scope plus a cursor. `order[0..cursor)` is history,
 * `order[cursor..)` is what is still to come. Not safe for concurrent owners; the scheduler
 * is the only caller.
 */
export class WeightedShuffle {
  private order: string[] = [];
  private cursor = 0;
  private readonly source: ShuffleSource;
  private readonly random: RandomSource;

  public constructor(source: ShuffleSource, random: RandomSource = Math.random) {
    this.source = source;
    this.random = random;
  }

  public snapshot(): ShuffleSnapshot {
    return { order: [...this.order], cursor: this.cursor };
  }

  public reset(): void {
    this.order = [];
    this.cursor = 0;
  }

  /**
   * Fresh build over the playable part of `population`. When `currentKey` is playable and
   * there is anything else to play, it is pinned as already consumed so the next draw
   * differs from it.
   */
  public createShuffle(population?: readonly string[], currentKey?: string | null): void {
    const playable = this.playableKeys(population ?? this.source.population());
    const weightOf = (key: string) => this.source.weightOf(key);

    if (currentKey != null && playable.length > 1 && playable.includes(currentKey)) {
      const rest = playable.filter((key) => key !== currentKey);
      this.order = [currentKey, ...weightedPermutation(rest, weightOf, this.random)];
      this.cursor = 1;
      return;
    }

    this.order = weightedPermutation(playable, weightOf, this.random);
    this.cursor = 0;
  }

  /**
   * Patches a live permutation: removed keys leave both history and the remaining window,
   * added keys are dropped into the remaining window without disturbing anything else.
   * Does nothing before the first build.
   */
  public integrate(added: readonly string[], removed: readonly string[]): void {
    if (this.order.length === 0) {
      return;
    }

    if (removed.length > 0) {
      const removedSet = new Set(removed);
      let consumedRemoved = 0;
      for (let i = 0; i < this.cursor && i < this.order.length; i += 1) {
        const key = this.order[i];
        if (key !== undefined && removedSet.has(key)) {
          consumedRemoved += 1;
        }
      }
      this.order = this.order.filter((key) => !removedSet.has(key));
      this.cursor = clamp(this.cursor - consumedRemoved, 0, this.order.length);
    }

    if (added.length > 0) {
      const present = new Set(this.order);
      const lowerBound = Math.min(this.cursor, this.order.length);
      for (const key of added) {
        if (present.has(key) || !this.source.isPlayable(key)) {
          continue;
        }
        const position = insertionIndex(this.random(), this.source.weightOf(key), lowerBound, this.order.length);
        this.order.splice(position, 0, key);
        present.add(key);
      }
    }
  }

  public next(currentKey?: string | null): string | null {
    return this.scan(true, currentKey ?? null);
  }

  /** What `next()` would return, without consuming it. */
  public peek(currentKey?: string | null): string | null {
    return this.scan(false, currentKey ?? null);
  }

  /** Steps back through history. Never rebuilds. */
  public previous(): string | null {
    for (let i = this.cursor - 2; i >= 0; i -= 1) {
      const key = this.order[i];
      if (key !== undefined && this.source.isPlayable(key)) {
        this.cursor = i + 1;
        return key;
      }
    }
    return null;
  }

  /** Fresh build, consuming its first playable element. */
  public randomStart(): string | null {
    this.createShuffle(undefined, null);
    for (let i = 0; i < this.order.length; i += 1) {
      const key = this.order[i];
      if (key !== undefined && this.source.isPlayable(key)) {
        this.cursor = i + 1;
        return key;
      }
    }
    return null;
  }

  /**
   * One weighted draw among playable keys other than `currentKey`. Needs at least two
   * playable keys in scope. Leaves the permutation untouched.
   */
  public randomExcludingCurrent(currentKey: string | null): string | null {
    const playable = this.playableKeys(this.source.population());
    if (playable.length < 2) {
      return null;
    }

    const candidates = playable.filter((key) => key !== currentKey);
    return weightedPick(candidates, (key) => this.source.weightOf(key), this.random);
  }

  private scan(commit: boolean, currentKey: string | null): string | null {
    let rebuilt = false;
    if (this.order.length === 0 || this.cursor >= this.order.length) {
      this.createShuffle(undefined, currentKey);
      rebuilt = true;
    }

    for (;;) {
      let index = this.cursor;
      while (index < this.order.length) {
        const key = this.order[index];
        index += 1;
        if (key !== undefined && this.source.isPlayable(key)) {
          if (commit) {
            this.cursor = index;
          }
          return key;
        }
      }

      if (rebuilt) {
        if (commit) {
          this.cursor = index;
        }
        return null;
      }

      // the rest of this pass is unplayable; reshuffle once and try again
      this.createShuffle(undefined, currentKey);
      rebuilt = true;
    }
  }

  private playableKeys(population: readonly string[]): string[] {
    const seen = new Set<string>();
    const playable: string[] = [];
    for (const key of population) {
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      if (this.source.isPlayable(key)) {
        playable.push(key);
      }
    }
    return playable;
  }
}
