import { readFileSync } from "node:fs";
import { parse } from "dotenv";
import type { EnvService } from "./schema";
import { ENV_SCHEMAS } from "./schema";

type EnvSource = Record<string, string | undefined>;

const PLACEHOLDER_PATTERNS = [/CHANGE_ME/i, /REPLACE_ME/i, /^<.*>$/];

export class EnvValidationError extends Error {
  constructor(service: EnvService, public readonly missing: string[]) {
    super(
      `[env] Missing required environment variables for ${service}: ${[...missing]
        .sort()
        .join(", ")}`
    );
    this.name = "EnvValidationError";
  }
}

export function getMissingEnvVars(service: EnvService, source: EnvSource = process.env): string[] {
  const schema = ENV_SCHEMAS[service];

  return schema.required.filter(key => {
    const value = source[key];
    if (value === undefined) {
      return true;
    }

    if (schema.allowEmpty?.includes(key)) {
      return false;
    }

    const trimmed = value.trim();
    if (!trimmed.length) {
      return true;
    }

    return PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed));
  });
}

export function assertEnvVars(service: EnvService, source: EnvSource = process.env): void {
  const missing = getMissingEnvVars(service, source);
  if (missing.length) {
    throw new EnvValidationError(service, missing);
  }
}

/**
 * Asserts the required keys and returns every declared key that carries a
 * non-empty value. Undeclared keys are dropped.
 */
export function readEnv(service: EnvService, source: EnvSource = process.env): Record<string, string> {
  assertEnvVars(service, source);
  const schema = ENV_SCHEMAS[service];
  const values: Record<string, string> = {};
  for (const key of [...schema.required, ...(schema.optional ?? [])]) {
    const value = source[key]?.trim();
    if (value) {
      values[key] = value;
    }
  }
  return values;
}

/** Parses a dotenv file. Keys already present in `source` win over the file. */
export function mergeEnvFile(filePath: string, source: EnvSource = process.env): EnvSource {
  const fromFile = parse(readFileSync(filePath, "utf8"));
  return { ...fromFile, ...source };
}
