export class RecoveryError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "RecoveryError";
  }
}

export class ServiceRegistrationError extends RecoveryError {
  readonly serviceName: string;

  constructor(serviceName: string, reason: string) {
    super(`Cannot register service '${serviceName}': ${reason}`);
    this.name = "ServiceRegistrationError";
    this.serviceName = serviceName;
  }
}

export class PlanValidationError extends RecoveryError {
  readonly planId: string;
  readonly issues: string[];

  constructor(planId: string, issues: string[]) {
    super(`Recovery plan '${planId}' is invalid: ${issues.join("; ")}`);
    this.name = "PlanValidationError";
    this.planId = planId;
    this.issues = issues;
  }
}

export class StepTimeoutError extends RecoveryError {
  readonly stepName: string;
  readonly timeoutMs: number;

  constructor(stepName: string, timeoutMs: number) {
    super(`${stepName} timed out after ${timeoutMs}ms`);
    this.name = "StepTimeoutError";
    this.stepName = stepName;
    this.timeoutMs = timeoutMs;
  }
}

export class HealthCheckTimeoutError extends RecoveryError {
  readonly serviceName: string;
  readonly timeoutMs: number;

  constructor(serviceName: string, timeoutMs: number) {
    super(`Health check for '${serviceName}' timed out after ${timeoutMs}ms`);
    this.name = "HealthCheckTimeoutError";
    this.serviceName = serviceName;
    this.timeoutMs = timeoutMs;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
