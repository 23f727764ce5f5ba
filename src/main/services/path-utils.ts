import path from "node:path";
import { promises as fs } from "node:fs";
import { SUPPORTED_AUDIO_EXTENSIONS } from "../../shared/constants.js";

export function isAudioFile(filePath: string): boolean {
  return SUPPORTED_AUDIO_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/** Keeps the order of `paths`, dropping those that are not regular files. */
export async function filterExistingFiles(paths: string[]): Promise<string[]> {
  const checks = await Promise.all(paths.map(async (filePath) => ({
    filePath,
    exists: await fileExists(filePath)
  })));
  return checks.filter((entry) => entry.exists).map((entry) => entry.filePath);
}

export async function listAudioFilesRecursive(rootPath: string): Promise<string[]> {
  const normalized = path.resolve(rootPath);
  const results: string[] = [];
  const stack = [normalized];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) {
      continue;
    }

    let entries;
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch {
      continue;
    }

    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        stack.push(full);
      } else if (entry.isFile() && isAudioFile(full)) {
        results.push(full);
      }
    }
  }

  results.sort((a, b) => a.localeCompare(b));
  return results;
}
