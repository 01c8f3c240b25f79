#!/usr/bin/env node
import "dotenv/config";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { runCli } from "./cli";

yargs(hideBin(process.argv))
  .scriptName("synth")
  .command<{ config?: string }>(
    "$0",
    "Run the constant-synthesis demonstration",
    builder => builder
      .option("config", {
        type: "string",
        describe: "Path to a synthesis config JSON file (defaults to SYNTH_CONFIG or the bundled default)"
      }),
    async args => {
      process.exitCode = await runCli({ configPath: args.config });
    }
  )
  .help()
  .strict()
  .parseAsync()
  .catch(error => {
    console.error("synth: argument parsing failed", error);
    process.exitCode = 1;
  });
