// SPDX-License-Identifier: Apache-2.0

import {type DistributedApplicationBuilder} from '../../business/app-model/application-builder.js';
import {type ResourceBuilder} from '../../business/app-model/resource-builder.js';
import {ParameterResource} from '../../business/app-model/parameter-resource.js';
import {ConnectionStringAvailableEvent, ResourceReadyEvent} from '../../business/app-model/eventing.js';
import {ValueReferences} from '../../business/app-model/value-reference.js';
import {VolumeNameGenerator} from '../../business/app-model/volume-name-generator.js';
import {type EnvironmentCallbackContext} from '../../business/app-model/annotations.js';
import {type Resource} from '../../business/app-model/resource.js';
import {StringEx} from '../../business/utils/string-ex.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {ApplicationStartError} from '../../core/errors/application-start-error.js';
import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';
import * as constants from '../../core/constants.js';
import {ClickHouseServerResource} from './clickhouse-server-resource.js';
import {ClickHouseDatabaseResource} from './clickhouse-database-resource.js';
import {ClickHouseContainerImageTags} from './clickhouse-container-image-tags.js';
import {type ClickHouseDatabaseInitializer} from './clickhouse-database-initializer.js';

export interface ClickHouseServerOptions {
  /**
   * The host port; the orchestrator picks one when omitted.
   */
  readonly port?: number;
  readonly userName?: ResourceBuilder<ParameterResource>;

  /**
   * The server password. A secret `<name>-password` parameter with a generated default is used when omitted.
   */
  readonly password?: ResourceBuilder<ParameterResource>;
}

/**
 * Adds ClickHouse servers and databases to an application model.
 */
export class ClickHouseBuilderExtensions {
  private constructor() {
    throw new UnsupportedOperationError('This class cannot be instantiated');
  }

  /**
   * Adds a ClickHouse server running the `clickhouse/clickhouse-server` container image.
   *
   * @param builder - the application builder
   * @param name - the resource name, also the connection string name used by consumers
   * @param options - host port and credentials
   */
  public static addClickHouse(
    builder: DistributedApplicationBuilder,
    name: string,
    options: ClickHouseServerOptions = {},
  ): ResourceBuilder<ClickHouseServerResource> {
    StringEx.requireNonEmpty(name, 'name');

    const passwordParameter: ParameterResource =
      options.password?.resource ?? ParameterResource.generatedPassword(`${name}-password`);
    const server: ClickHouseServerResource = new ClickHouseServerResource(
      name,
      options.userName?.resource,
      passwordParameter,
    );

    const resourceBuilder: ResourceBuilder<ClickHouseServerResource> = builder.addResource(server);

    let connectionString: string | undefined;

    builder.eventing.subscribe(
      server,
      ConnectionStringAvailableEvent,
      async (_event: ConnectionStringAvailableEvent, signal: AbortSignal): Promise<void> => {
        connectionString = await server.connectionStringExpression.getValue(builder.createResolutionContext(signal));
        if (connectionString === undefined) {
          throw new ApplicationStartError(
            `ConnectionStringAvailableEvent was published for the '${server.name}' resource but the connection string was undefined.`,
          );
        }
      },
    );

    builder.eventing.subscribe(
      server,
      ResourceReadyEvent,
      async (event: ResourceReadyEvent, signal: AbortSignal): Promise<void> => {
        if (connectionString === undefined) {
          throw new ApplicationStartError(
            `ResourceReadyEvent was published for the '${server.name}' resource but the connection string was undefined.`,
          );
        }

        const databases: ClickHouseDatabaseResource[] = [];
        for (const resourceName of server.databases.keys()) {
          const resource: Resource | undefined = builder.resources.find(resourceName);
          if (resource instanceof ClickHouseDatabaseResource) {
            databases.push(resource);
          }
        }

        const initializer: ClickHouseDatabaseInitializer = event.services.resolve<ClickHouseDatabaseInitializer>(
          InjectTokens.ClickHouseDatabaseInitializer,
        );
        await initializer.createDatabases(server, connectionString, databases, signal);
      },
    );

    return resourceBuilder
      .withEndpoint({
        name: ClickHouseServerResource.PRIMARY_ENDPOINT_NAME,
        port: options.port,
        targetPort: constants.CLICKHOUSE_HTTP_PORT,
        scheme: 'http',
      })
      .withImage(ClickHouseContainerImageTags.Image, ClickHouseContainerImageTags.Tag)
      .withImageRegistry(ClickHouseContainerImageTags.Registry)
      .withEnvironment((context: EnvironmentCallbackContext): void => {
        context.environmentVariables.set(constants.CLICKHOUSE_USER_ENV_VAR, server.userNameReference);
        if (server.passwordParameter) {
          context.environmentVariables.set(
            constants.CLICKHOUSE_PASSWORD_ENV_VAR,
            ValueReferences.parameter(server.passwordParameter),
          );
        }
      })
      .withHttpHealthCheck(constants.CLICKHOUSE_HEALTH_CHECK_PATH);
  }

  /**
   * Adds a database to a ClickHouse server. The database is created once the server is ready.
   *
   * @param builder - the server's resource builder
   * @param name - the resource name, unique across the whole application model
   * @param databaseName - the database to create, defaults to the resource name
   * @throws DuplicateResourceError if any resource already uses the name; the server is left unchanged
   */
  public static addDatabase(
    builder: ResourceBuilder<ClickHouseServerResource>,
    name: string,
    databaseName: string = name,
  ): ResourceBuilder<ClickHouseDatabaseResource> {
    StringEx.requireNonEmpty(name, 'name');

    const database: ClickHouseDatabaseResource = new ClickHouseDatabaseResource(name, databaseName, builder.resource);
    const databaseBuilder: ResourceBuilder<ClickHouseDatabaseResource> =
      builder.applicationBuilder.addResource(database);
    builder.resource.addDatabase(name, databaseName);

    return databaseBuilder;
  }

  /**
   * Mounts a named volume at the ClickHouse data directory.
   *
   * @param name - the volume name, generated from the application and resource names when omitted
   */
  public static withDataVolume(
    builder: ResourceBuilder<ClickHouseServerResource>,
    name?: string,
    isReadOnly: boolean = false,
  ): ResourceBuilder<ClickHouseServerResource> {
    return builder.withVolume(
      name ?? VolumeNameGenerator.generate(builder, 'data'),
      constants.CLICKHOUSE_DATA_PATH,
      isReadOnly,
    );
  }

  /**
   * Mounts a host directory at the ClickHouse data directory.
   */
  public static withDataBindMount(
    builder: ResourceBuilder<ClickHouseServerResource>,
    source: string,
    isReadOnly: boolean = false,
  ): ResourceBuilder<ClickHouseServerResource> {
    StringEx.requireNonEmpty(source, 'source');
    return builder.withBindMount(source, constants.CLICKHOUSE_DATA_PATH, isReadOnly);
  }
}
