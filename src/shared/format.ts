import type { PlaybackScope } from "./types.js";

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function describeScope(scope: PlaybackScope): string {
  return scope.kind === "queue" ? "queue" : `playlist:${scope.playlistId}`;
}

export function firstLine(value: string): string {
  const trimmed = value.trim();
  const newline = trimmed.indexOf("\n");
  return (newline === -1 ? trimmed : trimmed.slice(0, newline)).trim();
}
