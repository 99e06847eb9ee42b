import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { AnySchemaObject, ValidateFunction } from "ajv";
import type { RecoveryConfig, ValidationResult } from "./types";

export const defaultSchemaPath = path.resolve(
  __dirname,
  "../../../../config/schema/recovery-config.schema.json"
);

const validators = new Map<string, { ajv: Ajv2020; validate: ValidateFunction<RecoveryConfig> }>();

function isSchemaObject(value: unknown): value is AnySchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function compileSchema(schemaFilePath: string) {
  const cached = validators.get(schemaFilePath);
  if (cached) {
    return cached;
  }
  const schema: unknown = JSON.parse(fs.readFileSync(schemaFilePath, "utf-8"));
  if (!isSchemaObject(schema)) {
    throw new Error(`Schema at ${schemaFilePath} is not a JSON object`);
  }
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  const entry = { ajv, validate: ajv.compile<RecoveryConfig>(schema) };
  validators.set(schemaFilePath, entry);
  return entry;
}

/**
 * Validates config and returns structured result without throwing.
 * @param config - Configuration object to validate
 * @param schemaFilePath - Path to JSON schema file
 */
export function validateConfig(config: unknown, schemaFilePath: string = defaultSchemaPath): ValidationResult {
  const { validate: validateFn } = compileSchema(schemaFilePath);
  if (!validateFn(config)) {
    const errors = validateFn.errors?.map(err => `${err.instancePath} ${err.message}`) || [];
    return { valid: false, errors };
  }
  return { valid: true };
}

/**
 * Validates config and throws on validation failure.
 */
export function validate(config: unknown, schemaFilePath: string = defaultSchemaPath): asserts config is RecoveryConfig {
  const { ajv, validate: validateFn } = compileSchema(schemaFilePath);
  if (!validateFn(config)) {
    const msg = ajv.errorsText(validateFn.errors, { separator: "\n" });
    throw new Error(`Config validation failed:\n${msg}`);
  }
}

export function loadConfig(filePath: string, schemaFilePath: string = defaultSchemaPath): RecoveryConfig {
  const cfg: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  validate(cfg, schemaFilePath);
  return cfg;
}
