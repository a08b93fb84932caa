import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import type { IConfigService } from "../../core/domain/services/config.service.js";
import type { Config } from "../../core/domain/entities/config.entity.js";
import { ConfigurationError } from "../../core/domain/errors.js";
import { ConfigSchema } from "../../adapters/validation.js";

/** ./config/config.yaml under the working directory at load time. */
export function defaultConfigPath(): string {
  return resolve(process.cwd(), "config", "config.yaml");
}

/** `${VAR}` string values are replaced from the environment. */
function substituteEnv(value: unknown): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return process.env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map(substituteEnv);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v);
    return out;
  }
  return value;
}

export class ConfigService implements IConfigService {
  private config: Config;
  readonly path: string | null;

  /**
   * An explicit path (argument or CONFIG_PATH) must exist; the default
   * ./config/config.yaml is optional and built-in defaults apply without it.
   */
  constructor(configPath?: string) {
    loadEnv();
    const explicitPath = configPath || process.env.CONFIG_PATH;
    if (explicitPath) {
      this.path = resolve(explicitPath);
    } else {
      const fallback = defaultConfigPath();
      this.path = existsSync(fallback) ? fallback : null;
    }
    this.config = this.path ? this.loadConfig(this.path) : this.validate({}, "defaults");
  }

  private loadConfig(path: string): Config {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new ConfigurationError(`Failed to load config from ${path}. ${msg}`, { path }, e);
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new ConfigurationError(`Invalid YAML in ${path}. ${msg}`, { path }, e);
    }
    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) parsed = {};
    if (typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ConfigurationError(`Config at ${path} must be a YAML object.`, { path });
    }
    return this.validate(substituteEnv(parsed), path);
  }

  private validate(raw: unknown, source: string): Config {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      );
      throw new ConfigurationError(
        `Invalid config at ${source}. ${issues.join("; ")}`,
        { path: source, issues },
      );
    }
    return result.data;
  }

  getConfig(): Config {
    return this.config;
  }
}
