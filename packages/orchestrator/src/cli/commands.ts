import { readFile } from "node:fs/promises";
import path from "node:path";
import yargs, { type Argv } from "yargs";
import { validateConfig, type RecoveryPlan } from "@warden/shared";
import { RecoveryPlanCatalog } from "../recovery/catalog";
import { run } from "../main";
import { describeError } from "../errors";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

const processIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
  setExitCode: code => {
    process.exitCode = code;
  }
};

export function formatPlan(plan: RecoveryPlan): string {
  return [
    plan.id.padEnd(18),
    plan.strategy.padEnd(9),
    `priority=${plan.priority}`,
    `impact=${plan.userImpact}`,
    `steps=${plan.steps.length}`,
    `timeout=${plan.timeoutMs}ms`
  ].join(" ");
}

function summarizePlan(plan: RecoveryPlan) {
  return {
    id: plan.id,
    strategy: plan.strategy,
    priority: plan.priority,
    userImpact: plan.userImpact,
    timeoutMs: plan.timeoutMs,
    retryPolicy: plan.retryPolicy,
    steps: plan.steps.map(step => ({
      name: step.name,
      timeoutMs: step.timeoutMs,
      retryCount: step.retryCount ?? plan.retryPolicy.maxRetries
    }))
  };
}

export function createCli(argv: string[], io: CliIo = processIo): Argv {
  return yargs(argv)
    .scriptName("warden")
    .command<{ json: boolean }>(
      "plans",
      "List the built-in recovery plans",
      builder => builder.option("json", {
        type: "boolean",
        default: false,
        describe: "Print full plan summaries as JSON"
      }),
      args => {
        const plans = Object.values(new RecoveryPlanCatalog().list()).sort((a, b) => b.priority - a.priority);
        if (args.json) {
          io.out(JSON.stringify(plans.map(summarizePlan), null, 2));
          return;
        }
        for (const plan of plans) {
          io.out(formatPlan(plan));
        }
      }
    )
    .command<{ file: string }>(
      "validate <file>",
      "Validate a recovery config file against the schema",
      builder => builder.positional("file", {
        type: "string",
        demandOption: true,
        describe: "Path to the JSON config"
      }),
      async args => {
        const resolved = path.resolve(process.cwd(), args.file);
        let parsed: unknown;
        try {
          parsed = JSON.parse(await readFile(resolved, "utf-8"));
        } catch (error) {
          io.err(`${args.file}: unreadable (${describeError(error)})`);
          io.setExitCode(1);
          return;
        }
        const result = validateConfig(parsed);
        if (result.valid) {
          io.out(`${args.file}: valid`);
          return;
        }
        io.err(`${args.file}: invalid`);
        for (const message of result.errors ?? []) {
          io.err(`  - ${message}`);
        }
        io.setExitCode(1);
      }
    )
    .command(
      "run",
      "Start the orchestrator using RECOVERY_CONFIG and LOGS_DIR",
      builder => builder,
      async () => {
        await run();
      }
    )
    .demandCommand()
    .help()
    .strict();
}
