import { isLogLevel, type LogLevel } from "./observability";

type EnvSource = Record<string, string | undefined>;

export const ENV_KEYS = {
  config: "SYNTH_CONFIG",
  logLevel: "SYNTH_LOG_LEVEL",
  logDir: "SYNTH_LOG_DIR"
} as const;

const PLACEHOLDER_PATTERNS = [/CHANGE_ME/i, /REPLACE_ME/i, /^<.*>$/];

export interface EnvOverrides {
  configPath?: string;
  logLevel?: LogLevel;
  logDir?: string;
}

function readValue(source: EnvSource, key: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!trimmed.length || PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed))) {
    return undefined;
  }
  return trimmed;
}

export class EnvValidationError extends Error {
  constructor(public readonly key: string, value: string) {
    super(`[env] Invalid value for ${key}: ${value}`);
    this.name = "EnvValidationError";
  }
}

/**
 * Reads SYNTH_* overrides. Empty and placeholder values count as unset; an
 * unknown log level is rejected.
 */
export function readEnvOverrides(source: EnvSource = process.env): EnvOverrides {
  const overrides: EnvOverrides = {};
  const configPath = readValue(source, ENV_KEYS.config);
  if (configPath) {
    overrides.configPath = configPath;
  }
  const level = readValue(source, ENV_KEYS.logLevel);
  if (level) {
    const normalized = level.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new EnvValidationError(ENV_KEYS.logLevel, level);
    }
    overrides.logLevel = normalized;
  }
  const logDir = readValue(source, ENV_KEYS.logDir);
  if (logDir) {
    overrides.logDir = logDir;
  }
  return overrides;
}
