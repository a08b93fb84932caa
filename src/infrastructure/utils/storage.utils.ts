import { mkdirSync, readdirSync } from "node:fs";
import { basename, extname, join } from "node:path";
import { OutputDirectoryError } from "../../core/domain/errors.js";

/** All files under `dir`, depth first, each level sorted by name. */
export function listFilesRecursive(dir: string, results: string[] = []): string[] {
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
  );
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      listFilesRecursive(full, results);
    } else if (entry.isFile()) {
      results.push(full);
    }
  }
  return results;
}

/**
 * One output file name per input: base name without its last extension plus
 * `extension`. A name already taken in this run gets the next free `__<n>`
 * suffix, in input order.
 */
export function deriveOutputNames(inputs: string[], extension: string): string[] {
  const used = new Set<string>();
  const suffixes = new Map<string, number>();
  return inputs.map((input) => {
    const stem = basename(input, extname(input)) || basename(input);
    let suffix = suffixes.get(stem) ?? 0;
    let name = `${stem}${extension}`;
    while (used.has(name)) {
      suffix++;
      name = `${stem}__${suffix}${extension}`;
    }
    suffixes.set(stem, suffix);
    used.add(name);
    return name;
  });
}

export function ensureOutputDir(dir: string): void {
  try {
    mkdirSync(dir, { recursive: true });
  } catch (e) {
    throw new OutputDirectoryError(dir, e);
  }
}
