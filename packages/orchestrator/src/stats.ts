import type {
  OrchestratorHealth,
  RecoveryExecution,
  RecoveryStatistics,
  ServiceHealth
} from "@warden/shared";

export function computeStatistics(
  services: readonly ServiceHealth[],
  executions: readonly RecoveryExecution[],
  queued: number
): RecoveryStatistics {
  const stats: RecoveryStatistics = {
    totalServices: services.length,
    healthyServices: 0,
    degradedServices: 0,
    unhealthyServices: 0,
    failedServices: 0,
    recoveringServices: 0,
    totalRecoveries: 0,
    successfulRecoveries: 0,
    failedRecoveries: 0,
    cancelledRecoveries: 0,
    activeRecoveries: 0,
    queuedRecoveries: queued
  };

  for (const service of services) {
    stats.totalRecoveries += service.recoveryCount;
    switch (service.status) {
      case "Healthy":
        stats.healthyServices += 1;
        break;
      case "Recovering":
        stats.recoveringServices += 1;
        break;
      case "Degraded":
        stats.degradedServices += 1;
        stats.unhealthyServices += 1;
        break;
      case "Unhealthy":
        stats.unhealthyServices += 1;
        break;
      case "Failed":
        stats.failedServices += 1;
        stats.unhealthyServices += 1;
        break;
    }
  }

  for (const execution of executions) {
    switch (execution.status) {
      case "Success":
        stats.successfulRecoveries += 1;
        break;
      case "Failed":
        stats.failedRecoveries += 1;
        break;
      case "Cancelled":
        stats.cancelledRecoveries += 1;
        break;
      case "Running":
        stats.activeRecoveries += 1;
        break;
      default:
        break;
    }
  }

  return stats;
}

export function assessOrchestratorHealth(statistics: RecoveryStatistics): OrchestratorHealth {
  const settled = statistics.successfulRecoveries + statistics.failedRecoveries;
  const recoveryRate = settled === 0 ? 100 : (statistics.successfulRecoveries / settled) * 100;
  const unhealthyRatio =
    statistics.totalServices === 0 ? 0 : statistics.unhealthyServices / statistics.totalServices;

  let status: OrchestratorHealth["status"] = "healthy";
  if (unhealthyRatio > 0.5) {
    status = "critical";
  } else if (unhealthyRatio > 0.2) {
    status = "degraded";
  } else if (recoveryRate < 95) {
    status = "warning";
  }
  return { status, recoveryRate, statistics };
}
