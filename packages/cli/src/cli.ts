import {
  LogLevel,
  defaultConfigPath,
  isDomainError,
  loadConfig,
  readEnvOverrides,
  type SynthesisConfig
} from "@constant-synthesis/shared";
import { runDemonstration } from "./demo";
import { createCliLogger } from "./logging";
import { formatReport } from "./report";

export interface CliOptions {
  configPath?: string;
  env?: Record<string, string | undefined>;
  sessionId?: string;
  write?: (text: string) => void;
  writeError?: (text: string) => void;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

function describeError(error: unknown): Record<string, unknown> {
  if (isDomainError(error)) {
    return { kind: error.name, parameter: error.parameter, value: String(error.value), message: error.message };
  }
  if (error instanceof Error) {
    return { kind: error.name, message: error.message };
  }
  return { kind: "unknown", message: String(error) };
}

/**
 * Loads the config, runs the demonstration and prints the report. Resolves
 * to the process exit code; it never rejects.
 */
export async function runCli(options: CliOptions = {}): Promise<number> {
  const write: (text: string) => void = options.write ?? (text => process.stdout.write(text));
  const writeError: (text: string) => void = options.writeError ?? (text => process.stderr.write(text));

  let config: SynthesisConfig;
  let overrides: ReturnType<typeof readEnvOverrides>;
  try {
    overrides = readEnvOverrides(options.env ?? process.env);
    config = loadConfig(options.configPath ?? overrides.configPath ?? defaultConfigPath);
  } catch (error) {
    writeError(`synth: ${describeError(error).message}\n`);
    return EXIT_FAILURE;
  }

  const logger = createCliLogger({
    level: overrides.logLevel ?? config.logging.level,
    outputDir: overrides.logDir ?? config.logging.outputDir,
    maxFileSizeMb: config.logging.maxFileSizeMb,
    maxFiles: config.logging.maxFiles,
    sessionId: options.sessionId,
    consoleImpl: options.consoleImpl
  });

  try {
    await logger.start();
    logger.log(LogLevel.INFO, "demo.started", { sessionId: logger.sessionId });
    const run = runDemonstration(config, { logger });
    write(formatReport(run) + "\n");
    logger.log(LogLevel.INFO, "demo.completed", { verified: run.verification.passed });
    return run.verification.passed ? EXIT_OK : EXIT_FAILURE;
  } catch (error) {
    const details = describeError(error);
    logger.log(LogLevel.CRITICAL, "demo.failed", details);
    writeError(`synth: ${details.message}\n`);
    return EXIT_FAILURE;
  } finally {
    await logger.stop();
  }
}
