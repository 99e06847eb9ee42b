import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { assertEnvVars, EnvValidationError, getMissingEnvVars, mergeEnvFile, readEnv } from "../src/env/validator";

describe("env validator", () => {
  it("returns missing and placeholder keys", () => {
    const missing = getMissingEnvVars("orchestrator", {
      RECOVERY_CONFIG: "<path-to-config>"
    });

    expect(missing).toEqual(["RECOVERY_CONFIG", "LOGS_DIR"]);
  });

  it("allows optional keys to be empty", () => {
    expect(() =>
      assertEnvVars("orchestrator", {
        RECOVERY_CONFIG: "config/recovery/default.recovery.json",
        LOGS_DIR: "./results/logs",
        SESSION_ID: ""
      })
    ).not.toThrow();
  });

  it("throws with the sorted missing keys", () => {
    expect(() => assertEnvVars("orchestrator", {})).toThrowError(
      new EnvValidationError("orchestrator", ["RECOVERY_CONFIG", "LOGS_DIR"]).message
    );
    expect(() => assertEnvVars("orchestrator", {})).toThrowError(
      "[env] Missing required environment variables for orchestrator: LOGS_DIR, RECOVERY_CONFIG"
    );
  });

  it("reads declared keys and drops empty and undeclared ones", () => {
    const values = readEnv("orchestrator", {
      RECOVERY_CONFIG: " /etc/recovery.json ",
      LOGS_DIR: "/var/log/recovery",
      SESSION_ID: "",
      CONFIG_WATCH: "1",
      UNRELATED: "value"
    });
    expect(values).toEqual({
      RECOVERY_CONFIG: "/etc/recovery.json",
      LOGS_DIR: "/var/log/recovery",
      CONFIG_WATCH: "1"
    });
  });

  it("merges a dotenv file under the process values", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "warden-env-"));
    const file = path.join(dir, ".env");
    fs.writeFileSync(file, "# local overrides\nLOGS_DIR=./file-logs\nLOG_LEVEL=debug\n");
    try {
      const merged = mergeEnvFile(file, { RECOVERY_CONFIG: "recovery.json", LOG_LEVEL: "warn" });
      expect(merged).toEqual({
        LOGS_DIR: "./file-logs",
        LOG_LEVEL: "warn",
        RECOVERY_CONFIG: "recovery.json"
      });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
