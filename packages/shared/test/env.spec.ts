import { describe, expect, it } from "vitest";
import { EnvValidationError, readEnvOverrides } from "../src/env";
import { LogLevel } from "../src/observability";

describe("env overrides", () => {
  it("reads config path, log level and log directory", () => {
    expect(
      readEnvOverrides({
        SYNTH_CONFIG: " /etc/synth.json ",
        SYNTH_LOG_LEVEL: "DEBUG",
        SYNTH_LOG_DIR: "results/logs"
      })
    ).toEqual({ configPath: "/etc/synth.json", logLevel: LogLevel.DEBUG, logDir: "results/logs" });
  });

  it("treats empty and placeholder values as unset", () => {
    expect(readEnvOverrides({ SYNTH_CONFIG: "", SYNTH_LOG_DIR: "<log-dir>", SYNTH_LOG_LEVEL: "CHANGE_ME" })).toEqual({});
  });

  it("throws on an unknown log level", () => {
    expect(() => readEnvOverrides({ SYNTH_LOG_LEVEL: "verbose" })).toThrowError(EnvValidationError);
  });
});
