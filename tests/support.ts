import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import type { RandomSource } from "../src/main/services/weighted-shuffle.js";

/** mulberry32; same seed, same sequence. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export async function makeTempDir(prefix = "scoped-shuffle-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Creates empty files with the given names under `dir` and returns their paths. */
export async function touchFiles(dir: string, names: string[]): Promise<string[]> {
  const paths: string[] = [];
  for (const name of names) {
    const filePath = path.join(dir, name);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, "");
    paths.push(filePath);
  }
  return paths;
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, "utf8")) as unknown;
}
