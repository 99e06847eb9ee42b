import {
  WILDCARD_SERVICE,
  isRecoveryStrategy,
  type RecoveryPlan,
  type RecoveryStep,
  type RecoveryStrategy
} from "@warden/shared";
import { PlanValidationError } from "../errors";
import { BUILTIN_PLANS } from "./builtinPlans";

function isNonNegativeNumber(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function validateStep(step: RecoveryStep, index: number, issues: string[]): void {
  const label = `step ${index + 1}`;
  if (!step.name || !step.name.trim()) {
    issues.push(`${label} has no name`);
  }
  if (typeof step.action !== "function") {
    issues.push(`${label} has no action`);
  }
  if (!Number.isFinite(step.timeoutMs) || step.timeoutMs <= 0) {
    issues.push(`${label} timeoutMs must be > 0`);
  }
  if (step.retryCount !== undefined && (!Number.isInteger(step.retryCount) || step.retryCount < 0)) {
    issues.push(`${label} retryCount must be a non-negative integer`);
  }
}

export function validatePlan(plan: RecoveryPlan): string[] {
  const issues: string[] = [];
  if (!plan.id || !plan.id.trim()) {
    issues.push("id must not be empty");
  }
  if (!plan.serviceName || !plan.serviceName.trim()) {
    issues.push("serviceName must not be empty");
  }
  if (!isRecoveryStrategy(plan.strategy)) {
    issues.push(`unknown strategy '${String(plan.strategy)}'`);
  }
  if (!Array.isArray(plan.steps) || plan.steps.length === 0) {
    issues.push("plan needs at least one step");
  } else {
    plan.steps.forEach((step, index) => validateStep(step, index, issues));
  }
  plan.rollbackSteps?.forEach((step, index) => validateStep(step, index, issues));
  if (!Number.isFinite(plan.timeoutMs) || plan.timeoutMs <= 0) {
    issues.push("timeoutMs must be > 0");
  }
  const policy = plan.retryPolicy;
  if (!policy) {
    issues.push("retryPolicy is required");
  } else {
    if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
      issues.push("retryPolicy.maxRetries must be a non-negative integer");
    }
    if (!isNonNegativeNumber(policy.baseDelayMs)) {
      issues.push("retryPolicy.baseDelayMs must be >= 0");
    }
    if (!isNonNegativeNumber(policy.maxDelayMs)) {
      issues.push("retryPolicy.maxDelayMs must be >= 0");
    }
  }
  return issues;
}

function freezePlan(plan: RecoveryPlan): RecoveryPlan {
  const freezeSteps = (steps: readonly RecoveryStep[]) =>
    Object.freeze(steps.map(step => Object.freeze({ ...step })));
  return Object.freeze({
    ...plan,
    steps: freezeSteps(plan.steps),
    rollbackSteps: plan.rollbackSteps ? freezeSteps(plan.rollbackSteps) : undefined,
    retryPolicy: Object.freeze({ ...plan.retryPolicy }),
    preconditions: plan.preconditions ? Object.freeze([...plan.preconditions]) : undefined
  });
}

/** Plans keyed by id; lookups go through (service or wildcard, strategy). */
export class RecoveryPlanCatalog {
  private readonly plans = new Map<string, RecoveryPlan>();

  constructor(options: { builtins?: boolean } = {}) {
    if (options.builtins ?? true) {
      for (const plan of BUILTIN_PLANS) {
        this.register(plan);
      }
    }
  }

  register(plan: RecoveryPlan): RecoveryPlan {
    const issues = validatePlan(plan);
    if (issues.length > 0) {
      throw new PlanValidationError(plan.id || "<unnamed>", issues);
    }
    const frozen = freezePlan(plan);
    this.plans.set(frozen.id, frozen);
    return frozen;
  }

  get(id: string): RecoveryPlan | undefined {
    return this.plans.get(id);
  }

  /** Exact service match first (highest priority wins), then the wildcard plan. */
  resolve(serviceName: string, strategy: RecoveryStrategy): RecoveryPlan | undefined {
    let exact: RecoveryPlan | undefined;
    let wildcard: RecoveryPlan | undefined;
    for (const plan of this.plans.values()) {
      if (plan.strategy !== strategy) {
        continue;
      }
      if (plan.serviceName === serviceName) {
        if (!exact || plan.priority > exact.priority) {
          exact = plan;
        }
      } else if (plan.serviceName === WILDCARD_SERVICE) {
        if (!wildcard || plan.priority > wildcard.priority) {
          wildcard = plan;
        }
      }
    }
    return exact ?? wildcard;
  }

  list(): Record<string, RecoveryPlan> {
    return Object.fromEntries(this.plans);
  }
}
