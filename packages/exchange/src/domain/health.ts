export type HealthStatus = "HEALTHY" | "DEGRADED" | "UNHEALTHY";

export interface HealthChecks {
  apiReachable: boolean;
  balanceAvailable: boolean;
  configComplete: boolean;
  strategiesLoaded: boolean;
}

const CHECK_NAMES = ["apiReachable", "balanceAvailable", "configComplete", "strategiesLoaded"] as const;

export interface HealthAssessment {
  status: HealthStatus;
  failed: (keyof HealthChecks)[];
}

/** HEALTHY when every check passes; DEGRADED while the exchange side still works. */
export function classifyHealth(checks: HealthChecks): HealthAssessment {
  const failed = CHECK_NAMES.filter((k) => !checks[k]);
  if (failed.length === 0) return { status: "HEALTHY", failed };
  if (checks.apiReachable || checks.balanceAvailable) return { status: "DEGRADED", failed };
  return { status: "UNHEALTHY", failed };
}
