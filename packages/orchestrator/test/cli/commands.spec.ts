import { describe, it, expect, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { createCli, formatPlan, type CliIo } from "../../src/cli/commands";
import { RecoveryPlanCatalog } from "../../src/recovery/catalog";

const defaultConfigPath = path.resolve(__dirname, "../../../../config/recovery/default.recovery.json");

function captureIo() {
  const out: string[] = [];
  const err: string[] = [];
  let exitCode: number | undefined;
  const io: CliIo = {
    out: line => out.push(line),
    err: line => err.push(line),
    setExitCode: code => {
      exitCode = code;
    }
  };
  return { io, out, err, exitCode: () => exitCode };
}

describe("formatPlan", () => {
  it("renders one aligned line per plan", () => {
    const restart = new RecoveryPlanCatalog().get("restart_generic");
    if (!restart) {
      throw new Error("restart plan missing");
    }
    expect(formatPlan(restart)).toBe("restart_generic    Restart   priority=100 impact=Low steps=5 timeout=60000ms");
  });
});

describe("warden cli", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) {
      fs.rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it("lists plans by priority", async () => {
    const { io, out } = captureIo();
    await createCli(["plans"], io).parseAsync();
    expect(out).toEqual([
      "isolate_generic    Isolate   priority=200 impact=High steps=4 timeout=60000ms",
      "failover_generic   Failover  priority=150 impact=Medium steps=5 timeout=120000ms",
      "restart_generic    Restart   priority=100 impact=Low steps=5 timeout=60000ms",
      "degrade_generic    Degrade   priority=50 impact=Medium steps=4 timeout=30000ms"
    ]);
  });

  it("prints plan summaries as JSON", async () => {
    const { io, out } = captureIo();
    await createCli(["plans", "--json"], io).parseAsync();
    const summaries: Array<{ id: string; steps: Array<{ name: string; retryCount: number }> }> = JSON.parse(out[0]);
    expect(summaries.map(summary => summary.id)).toEqual([
      "isolate_generic",
      "failover_generic",
      "restart_generic",
      "degrade_generic"
    ]);
    expect(summaries[2].steps[4]).toEqual({ name: "Verify Health", timeoutMs: 10_000, retryCount: 3 });
  });

  it("accepts the shipped config", async () => {
    const { io, out, exitCode } = captureIo();
    await createCli(["validate", defaultConfigPath], io).parseAsync();
    expect(out).toEqual([`${defaultConfigPath}: valid`]);
    expect(exitCode()).toBeUndefined();
  });

  it("lists schema violations", async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "warden-cli-"));
    const config = JSON.parse(fs.readFileSync(defaultConfigPath, "utf-8"));
    config.recovery.maxConcurrentRecoveries = 0;
    const file = path.join(tmpDir, "broken.json");
    fs.writeFileSync(file, JSON.stringify(config));

    const { io, err, exitCode } = captureIo();
    await createCli(["validate", file], io).parseAsync();
    expect(err).toEqual([`${file}: invalid`, "  - /recovery/maxConcurrentRecoveries must be >= 1"]);
    expect(exitCode()).toBe(1);
  });

  it("reports unreadable files", async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "warden-cli-"));
    const file = path.join(tmpDir, "garbage.json");
    fs.writeFileSync(file, "{ not json");

    const { io, err, exitCode } = captureIo();
    await createCli(["validate", file], io).parseAsync();
    expect(err).toHaveLength(1);
    expect(err[0].startsWith(`${file}: unreadable (`)).toBe(true);
    expect(exitCode()).toBe(1);
  });
});
