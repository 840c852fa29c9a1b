// SPDX-License-Identifier: Apache-2.0

import {type HealthCheck, type HealthCheckResult} from '../../core/health/health-check.js';

export interface PingableClient {
  ping(): Promise<{success: boolean; error?: Error}>;
}

/**
 * Reports a ClickHouse client healthy when the server answers its ping.
 */
export class ClickHouseHealthCheck implements HealthCheck {
  public constructor(
    public readonly name: string,
    private readonly client: PingableClient,
  ) {}

  public async check(): Promise<HealthCheckResult> {
    try {
      const result: {success: boolean; error?: Error} = await this.client.ping();
      if (result.success) {
        return {status: 'healthy'};
      }
      return {status: 'unhealthy', description: result.error?.message, error: result.error};
    } catch (error) {
      return {
        status: 'unhealthy',
        description: error instanceof Error ? error.message : String(error),
        error: error instanceof Error ? error : undefined,
      };
    }
  }
}
