// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  HostingLogger: Symbol.for('HostingLogger'),
  ResourceLoggerService: Symbol.for('ResourceLoggerService'),
  EndpointAllocator: Symbol.for('EndpointAllocator'),
  ClickHouseAdminClientFactory: Symbol.for('ClickHouseAdminClientFactory'),
  ClickHouseDatabaseInitializer: Symbol.for('ClickHouseDatabaseInitializer'),
  ClickHouseClient: Symbol.for('ClickHouseClient'),
  HealthCheck: Symbol.for('HealthCheck'),
} as const;
