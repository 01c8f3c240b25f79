import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { SynthesisConfig, ValidationResult } from "./types";

export const defaultSchemaPath = path.resolve(__dirname, "../../../../config/schema/synthesis-config.schema.json");
export const defaultConfigPath = path.resolve(__dirname, "../../../../config/synthesis/default.synthesis.json");

function compileSchema(schemaFilePath: string) {
  const schemaRaw = fs.readFileSync(schemaFilePath, "utf-8");
  const schema = JSON.parse(schemaRaw);
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  return { ajv, validateFn: ajv.compile<SynthesisConfig>(schema) };
}

/**
 * Validates config and returns structured result without throwing.
 */
export function validateConfig(config: unknown, schemaFilePath: string = defaultSchemaPath): ValidationResult {
  const { validateFn } = compileSchema(schemaFilePath);
  if (!validateFn(config)) {
    const errors = validateFn.errors?.map(err => `${err.instancePath} ${err.message}`) || [];
    return { valid: false, errors };
  }
  return { valid: true };
}

/**
 * Validates config and throws on validation failure.
 */
export function validate(config: unknown, schemaFilePath: string = defaultSchemaPath): asserts config is SynthesisConfig {
  const { ajv, validateFn } = compileSchema(schemaFilePath);
  if (!validateFn(config)) {
    const msg = ajv.errorsText(validateFn.errors, { separator: "\n" });
    throw new Error(`Config validation failed:\n${msg}`);
  }
}

export function loadConfig(filePath: string = defaultConfigPath, schemaFilePath: string = defaultSchemaPath): SynthesisConfig {
  const raw = fs.readFileSync(filePath, "utf-8");
  const cfg: unknown = JSON.parse(raw);
  validate(cfg, schemaFilePath);
  return cfg;
}
