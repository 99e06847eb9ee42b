import {
  WILDCARD_SERVICE,
  type HookResult,
  type RecoveryPlan,
  type RecoveryStep,
  type RecoveryStepContext,
  type ServiceHandleRef
} from "@warden/shared";

async function succeeded(result: HookResult | undefined): Promise<boolean> {
  return (await result) !== false;
}

function hookStep(
  name: string,
  description: string,
  timeoutMs: number,
  retryCount: number,
  invoke: (ctx: RecoveryStepContext) => HookResult | undefined
): RecoveryStep {
  return {
    name,
    description,
    timeoutMs,
    retryCount,
    action: ctx => succeeded(invoke(ctx))
  };
}

function requireFailoverTarget(ctx: RecoveryStepContext): ServiceHandleRef {
  if (!ctx.failoverTarget) {
    throw new Error(`No failover target registered for '${ctx.serviceName}'`);
  }
  return ctx.failoverTarget;
}

const restartPlan: RecoveryPlan = {
  id: "restart_generic",
  serviceName: WILDCARD_SERVICE,
  strategy: "Restart",
  priority: 100,
  estimatedDurationMs: 30_000,
  userImpact: "Low",
  timeoutMs: 60_000,
  description: "Stop the service, release its resources and start it again",
  retryPolicy: {
    maxRetries: 2,
    backoff: "Exponential",
    baseDelayMs: 5_000,
    maxDelayMs: 30_000,
    jitter: true
  },
  steps: [
    hookStep("Prepare Restart", "Prepare service for restart", 5_000, 1, ctx =>
      ctx.service.prepareRestart?.(ctx.signal)
    ),
    hookStep("Stop Service", "Gracefully stop service", 10_000, 1, ctx => ctx.service.stop?.(ctx.signal)),
    hookStep("Clear Resources", "Clear service resources", 5_000, 1, ctx =>
      ctx.service.clearResources?.(ctx.signal)
    ),
    hookStep("Start Service", "Start service", 10_000, 2, ctx => ctx.service.start?.(ctx.signal)),
    {
      name: "Verify Health",
      description: "Verify service health",
      timeoutMs: 10_000,
      retryCount: 3,
      action: ctx => ctx.checkHealth()
    }
  ]
};

const degradePlan: RecoveryPlan = {
  id: "degrade_generic",
  serviceName: WILDCARD_SERVICE,
  strategy: "Degrade",
  priority: 50,
  estimatedDurationMs: 5_000,
  userImpact: "Medium",
  timeoutMs: 30_000,
  description: "Keep the service up with reduced load and features",
  retryPolicy: {
    maxRetries: 1,
    backoff: "Fixed",
    baseDelayMs: 2_000,
    maxDelayMs: 2_000,
    jitter: false
  },
  steps: [
    {
      name: "Assess Degradation Options",
      description: "Assess degradation options",
      timeoutMs: 2_000,
      retryCount: 1,
      action: ctx => {
        ctx.state.set("degradation.options", {
          performanceLimits: typeof ctx.service.applyPerformanceLimits === "function",
          featureToggles: typeof ctx.service.disableNonEssentialFeatures === "function"
        });
        return true;
      }
    },
    hookStep("Apply Performance Limits", "Apply performance limitations", 3_000, 1, ctx =>
      ctx.service.applyPerformanceLimits?.(ctx.signal)
    ),
    hookStep("Disable Non-Essential Features", "Disable non-essential features", 5_000, 1, ctx =>
      ctx.service.disableNonEssentialFeatures?.(ctx.signal)
    ),
    {
      name: "Verify Degraded Operation",
      description: "Verify degraded operation",
      timeoutMs: 5_000,
      retryCount: 2,
      action: ctx => ctx.checkHealth(undefined, { acceptDegraded: true })
    }
  ]
};

const isolatePlan: RecoveryPlan = {
  id: "isolate_generic",
  serviceName: WILDCARD_SERVICE,
  strategy: "Isolate",
  priority: 200,
  estimatedDurationMs: 10_000,
  userImpact: "High",
  timeoutMs: 60_000,
  description: "Cut the service off from its dependents",
  retryPolicy: {
    maxRetries: 1,
    backoff: "Fixed",
    baseDelayMs: 1_000,
    maxDelayMs: 1_000,
    jitter: false
  },
  steps: [
    {
      name: "Assess Isolation Impact",
      description: "Assess isolation impact",
      timeoutMs: 2_000,
      retryCount: 1,
      action: ctx => {
        ctx.state.set(
          "isolation.dependents",
          ctx.dependents.map(dependent => dependent.name)
        );
        return true;
      }
    },
    {
      name: "Reroute Dependencies",
      description: "Reroute service dependencies",
      timeoutMs: 5_000,
      retryCount: 1,
      action: async ctx => {
        for (const dependent of ctx.dependents) {
          const ok = await succeeded(dependent.service.onDependencyIsolated?.(ctx.serviceName, ctx.signal));
          if (!ok) {
            throw new Error(`Dependent '${dependent.name}' refused to reroute`);
          }
        }
        return true;
      }
    },
    hookStep("Isolate Service", "Isolate problematic service", 3_000, 1, ctx =>
      ctx.service.isolate?.(ctx.signal)
    ),
    {
      name: "Verify System Stability",
      description: "Verify system stability",
      timeoutMs: 10_000,
      retryCount: 2,
      action: async ctx => {
        for (const dependent of ctx.dependents) {
          if (!(await ctx.checkHealth(dependent.name, { acceptDegraded: true }))) {
            return false;
          }
        }
        return true;
      }
    }
  ]
};

const failoverPlan: RecoveryPlan = {
  id: "failover_generic",
  serviceName: WILDCARD_SERVICE,
  strategy: "Failover",
  priority: 150,
  estimatedDurationMs: 60_000,
  userImpact: "Medium",
  timeoutMs: 120_000,
  description: "Hand the service's state and traffic to its registered backup",
  retryPolicy: {
    maxRetries: 1,
    backoff: "Fixed",
    baseDelayMs: 5_000,
    maxDelayMs: 5_000,
    jitter: false
  },
  preconditions: ["failover target registered"],
  steps: [
    {
      name: "Identify Backup Service",
      description: "Identify backup service",
      timeoutMs: 5_000,
      retryCount: 1,
      action: ctx => {
        ctx.state.set("failover.target", requireFailoverTarget(ctx).name);
        return true;
      }
    },
    hookStep("Prepare Backup Service", "Prepare backup service", 15_000, 1, ctx =>
      requireFailoverTarget(ctx).service.prepareFailover?.(ctx.signal)
    ),
    {
      name: "Transfer Service State",
      description: "Transfer service state",
      timeoutMs: 20_000,
      retryCount: 1,
      action: async ctx => {
        const target = requireFailoverTarget(ctx);
        if (!ctx.service.exportState) {
          return true;
        }
        const state: unknown = await ctx.service.exportState(ctx.signal);
        return succeeded(target.service.importState?.(state, ctx.signal));
      }
    },
    hookStep("Activate Backup Service", "Activate backup service", 10_000, 2, ctx =>
      requireFailoverTarget(ctx).service.activate?.(ctx.signal)
    ),
    {
      name: "Verify Failover Success",
      description: "Verify failover success",
      timeoutMs: 10_000,
      retryCount: 3,
      action: ctx => ctx.checkHealth(requireFailoverTarget(ctx).name)
    }
  ]
};

export const BUILTIN_PLANS: readonly RecoveryPlan[] = [restartPlan, degradePlan, isolatePlan, failoverPlan];
