import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigSchema, type ConfigInput } from "../../src/adapters/validation.js";
import type { Config } from "../../src/core/domain/entities/config.entity.js";

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "instrumentation-extractor-"));
}

export function makeConfig(input: ConfigInput = {}): Config {
  return ConfigSchema.parse(input);
}
