import type { MonitoredService, ServiceHandleRef, ServiceHealth } from "@warden/shared";
import { ServiceRegistrationError } from "../errors";

export interface RegisterServiceOptions {
  /** Registered service that takes over when this one fails over. */
  failoverTarget?: string;
  metadata?: Record<string, unknown>;
}

interface RegistryEntry {
  service: MonitoredService;
  health: ServiceHealth;
}

export function cloneHealth(health: ServiceHealth): ServiceHealth {
  return {
    ...health,
    dependencies: [...health.dependencies],
    metadata: { ...health.metadata }
  };
}

export class ServiceRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  register(
    name: string,
    service: MonitoredService,
    dependencies: readonly string[] = [],
    options: RegisterServiceOptions = {}
  ): ServiceHealth {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ServiceRegistrationError(name, "name must not be empty");
    }
    if (options.failoverTarget !== undefined && options.failoverTarget.trim() === trimmed) {
      throw new ServiceRegistrationError(trimmed, "a service cannot fail over to itself");
    }
    const now = this.now();
    const health: ServiceHealth = {
      name: trimmed,
      status: "Healthy",
      lastCheckTime: now,
      consecutiveFailures: 0,
      uptimeStart: now,
      responseTimeMs: 0,
      errorRate: 0,
      dependencies: [...new Set(dependencies)],
      failoverTarget: options.failoverTarget?.trim() || undefined,
      recoveryCount: 0,
      metadata: { ...options.metadata }
    };
    this.entries.set(trimmed, { service, health });
    return cloneHealth(health);
  }

  unregister(name: string): boolean {
    return this.entries.delete(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  get(name: string): ServiceHealth | undefined {
    const entry = this.entries.get(name);
    return entry ? cloneHealth(entry.health) : undefined;
  }

  getAll(): Record<string, ServiceHealth> {
    const result: Record<string, ServiceHealth> = {};
    for (const [name, entry] of this.entries) {
      result[name] = cloneHealth(entry.health);
    }
    return result;
  }

  getService(name: string): MonitoredService | undefined {
    return this.entries.get(name)?.service;
  }

  /**
   * Mutates the live record. Only the monitor, the executor and manual
   * overrides go through here.
   */
  update(name: string, mutate: (health: ServiceHealth) => void): ServiceHealth | undefined {
    const entry = this.entries.get(name);
    if (!entry) {
      return undefined;
    }
    mutate(entry.health);
    return cloneHealth(entry.health);
  }

  dependentsOf(name: string): ServiceHandleRef[] {
    const dependents: ServiceHandleRef[] = [];
    for (const [serviceName, entry] of this.entries) {
      if (serviceName !== name && entry.health.dependencies.includes(name)) {
        dependents.push({ name: serviceName, service: entry.service });
      }
    }
    return dependents;
  }

  failoverTargetOf(name: string): ServiceHandleRef | undefined {
    const target = this.entries.get(name)?.health.failoverTarget;
    if (!target) {
      return undefined;
    }
    const entry = this.entries.get(target);
    return entry ? { name: target, service: entry.service } : undefined;
  }
}
