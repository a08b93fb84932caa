import type { Config } from "../../core/domain/entities/config.entity.js";
import { ConfigService } from "../services/config.service.js";

/** Validated config from `path`, CONFIG_PATH, ./config/config.yaml or built-in defaults. */
export function loadConfig(path?: string): Config {
  return new ConfigService(path).getConfig();
}
