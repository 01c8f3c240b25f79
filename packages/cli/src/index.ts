export { runCli, EXIT_OK, EXIT_FAILURE, type CliOptions } from "./cli";
export { runDemonstration, type DemonstrationRun, type DemonstrationOptions, type HierarchyLevel } from "./demo";
export { formatReport, formatNumber } from "./report";
export { createCliLogger, type CliLoggerOptions } from "./logging";
