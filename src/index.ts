// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';

export {DistributedApplicationBuilder, type DistributedApplicationBuilderOptions} from './business/app-model/application-builder.js';
export {DistributedApplication} from './business/app-model/distributed-application.js';
export {ResourceBuilder} from './business/app-model/resource-builder.js';
export {ResourceCollection} from './business/app-model/resource-collection.js';
export {
  type ClassConstructor,
  type ConnectionProperty,
  ContainerResource,
  hasConnectionString,
  Resource,
  type ResourceWithConnectionString,
  type ResourceWithParent,
} from './business/app-model/resource.js';
export * from './business/app-model/annotations.js';
export {ParameterResource, type ParameterDefault} from './business/app-model/parameter-resource.js';
export * from './business/app-model/value-reference.js';
export {EndpointReference} from './business/app-model/endpoint-reference.js';
export {ConnectionExpression, type ExpressionSegment} from './business/app-model/connection-expression.js';
export {ConnectionExpressionBuilder} from './business/app-model/connection-expression-builder.js';
export {ApplicationResolutionContext, type ResolutionContext} from './business/app-model/resolution-context.js';
export * from './business/app-model/eventing.js';
export {type EndpointAllocator, LocalEndpointAllocator} from './business/app-model/endpoint-allocator.js';
export {ManifestPublisher, type ManifestNode, type ManifestValue} from './business/app-model/manifest-publisher.js';
export {VolumeNameGenerator} from './business/app-model/volume-name-generator.js';
export {ConnectionString} from './business/utils/connection-string.js';

export {ClickHouseServerResource} from './integration/clickhouse/clickhouse-server-resource.js';
export {ClickHouseDatabaseResource} from './integration/clickhouse/clickhouse-database-resource.js';
export {ClickHouseContainerImageTags} from './integration/clickhouse/clickhouse-container-image-tags.js';
export {
  ClickHouseBuilderExtensions,
  type ClickHouseServerOptions,
} from './integration/clickhouse/clickhouse-builder-extensions.js';
export {ClickHouseDatabaseInitializer} from './integration/clickhouse/clickhouse-database-initializer.js';
export {
  type ClickHouseAdminClient,
  type ClickHouseAdminClientFactory,
  type ClickHouseAdminCredentials,
} from './integration/clickhouse/clickhouse-admin-client.js';
export {
  GotClickHouseAdminClient,
  GotClickHouseAdminClientFactory,
} from './integration/clickhouse/impl/got-clickhouse-admin-client.js';
export {ClickHouseAdminError} from './integration/clickhouse/errors/clickhouse-admin-error.js';

export {ClickHouseClientSettings} from './integration/clickhouse-client/clickhouse-client-settings.js';
export {
  type ClickHouseClientOptions,
  ClickHouseClientOptionsParser,
} from './integration/clickhouse-client/clickhouse-client-options.js';
export {
  ClickHouseClientRegistration,
  type ClickHouseClientRegistrationOptions,
} from './integration/clickhouse-client/clickhouse-client-registration.js';
export {ClickHouseHealthCheck, type PingableClient} from './integration/clickhouse-client/clickhouse-health-check.js';

export {Container, type InstanceOverrides} from './core/dependency-injection/container-init.js';
export {InjectTokens} from './core/dependency-injection/inject-tokens.js';
export {type ServiceRegistration, ServiceRegistrations} from './core/dependency-injection/service-registration.js';
export {type HealthCheck, type HealthCheckResult, type HealthStatus} from './core/health/health-check.js';
export {type HostingLogger} from './core/logging/hosting-logger.js';
export {WinstonHostingLogger} from './core/logging/winston-hosting-logger.js';
export {ResourceLoggerService} from './core/logging/resource-logger-service.js';

export {HostingError} from './core/errors/hosting-error.js';
export {IllegalArgumentError} from './core/errors/illegal-argument-error.js';
export {MissingArgumentError} from './core/errors/missing-argument-error.js';
export {UnsupportedOperationError} from './core/errors/unsupported-operation-error.js';
export {DuplicateResourceError} from './core/errors/duplicate-resource-error.js';
export {UnresolvedReferenceError} from './core/errors/unresolved-reference-error.js';
export {ApplicationStartError} from './core/errors/application-start-error.js';
export {OperationCancelledError} from './core/errors/operation-cancelled-error.js';

export {type Config} from './data/configuration/api/config.js';
export {type ConfigSource} from './data/configuration/spi/config-source.js';
export {ConfigurationError} from './data/configuration/api/configuration-error.js';
export {DuplicateConfigSourceError} from './data/configuration/api/duplicate-config-source-error.js';
export {LayeredConfig} from './data/configuration/impl/layered-config.js';
export {MemoryConfigSource} from './data/configuration/impl/memory-config-source.js';
export {EnvironmentConfigSource} from './data/configuration/impl/environment-config-source.js';
