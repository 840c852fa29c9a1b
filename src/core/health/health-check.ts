// SPDX-License-Identifier: Apache-2.0

export type HealthStatus = 'healthy' | 'unhealthy';

export interface HealthCheckResult {
  readonly status: HealthStatus;
  readonly description?: string;
  readonly error?: Error;
}

/**
 * A probe registered under `InjectTokens.HealthCheck`. Polling the probes is left to the host.
 */
export interface HealthCheck {
  readonly name: string;

  check(signal?: AbortSignal): Promise<HealthCheckResult>;
}
