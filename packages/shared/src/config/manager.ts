import fs from "fs";
import type { SynthesisConfig, ValidationResult } from "./types";
import { defaultSchemaPath, validate, validateConfig } from "./loader";

/**
 * ConfigurationManager loads a synthesis config once and serves dot-path reads
 * (e.g. "alpha.thetaDegrees"). Use createConfigManager() to instantiate.
 */
export class ConfigurationManager {
  private config: SynthesisConfig | null = null;
  private configPath: string | null = null;
  private readonly schemaPath: string;

  constructor(schemaPath: string = defaultSchemaPath) {
    this.schemaPath = schemaPath;
  }

  async load(configPath: string): Promise<SynthesisConfig> {
    const raw = await fs.promises.readFile(configPath, "utf-8");
    const cfg: unknown = JSON.parse(raw);

    validate(cfg, this.schemaPath);

    this.config = cfg;
    this.configPath = configPath;
    return cfg;
  }

  validate(config: unknown): ValidationResult {
    return validateConfig(config, this.schemaPath);
  }

  get path(): string | null {
    return this.configPath;
  }

  /**
   * Returns the whole loaded configuration.
   */
  snapshot(): SynthesisConfig {
    if (!this.config) {
      throw new Error("Config not loaded");
    }
    return this.config;
  }

  /**
   * Get configuration value at a dot-separated key path.
   */
  get<T>(keyPath: string): T {
    if (!this.config) {
      throw new Error("Config not loaded");
    }
    return this.getValueAtPath(this.config, keyPath.split(".")) as T;
  }

  private getValueAtPath(config: SynthesisConfig, pathParts: string[]): unknown {
    let current: unknown = config;

    for (const part of pathParts) {
      if (current === null || current === undefined) {
        throw new Error(`Invalid path: cannot access property '${part}' of ${current}`);
      }
      if (typeof current !== "object") {
        throw new Error(`Invalid path: '${part}' is not an object property`);
      }
      if (!(part in current)) {
        throw new Error(`Invalid path: property '${part}' does not exist`);
      }
      current = (current as Record<string, unknown>)[part];
    }

    return current;
  }
}

/**
 * Factory function to create a ConfigurationManager with a loaded config.
 */
export async function createConfigManager(
  configPath: string,
  schemaPath?: string
): Promise<ConfigurationManager> {
  const manager = new ConfigurationManager(schemaPath);
  await manager.load(configPath);
  return manager;
}
