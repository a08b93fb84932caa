import type { Config } from "../entities/config.entity.js";

export interface IConfigService {
  getConfig(): Config;
}
