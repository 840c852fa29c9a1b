// SPDX-License-Identifier: Apache-2.0

import {createClient, type ClickHouseClient} from '@clickhouse/client';
import {type DependencyContainer, type InjectionToken} from 'tsyringe-neo';
import {type Config} from '../../data/configuration/api/config.js';
import {ConfigurationError} from '../../data/configuration/api/configuration-error.js';
import {ServiceRegistrations} from '../../core/dependency-injection/service-registration.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type HealthCheck} from '../../core/health/health-check.js';
import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';
import {StringEx} from '../../business/utils/string-ex.js';
import {ClickHouseClientSettings} from './clickhouse-client-settings.js';
import {type ClickHouseClientOptions, ClickHouseClientOptionsParser} from './clickhouse-client-options.js';
import {ClickHouseHealthCheck} from './clickhouse-health-check.js';

export interface ClickHouseClientRegistrationOptions {
  /**
   * Runs after the settings have been read from configuration.
   */
  readonly configure?: (settings: ClickHouseClientSettings) => void;

  /**
   * Creates the client from its options, `createClient` unless replaced.
   */
  readonly clientFactory?: (options: ClickHouseClientOptions) => ClickHouseClient;
}

/**
 * Binds a ClickHouse client, configured from a connection string, into a service container.
 */
export class ClickHouseClientRegistration {
  private constructor() {
    throw new UnsupportedOperationError('This class cannot be instantiated');
  }

  /**
   * The token a client is registered under; keyed clients each have their own.
   */
  public static clientToken(serviceKey?: string): InjectionToken<ClickHouseClient> {
    return serviceKey === undefined ? InjectTokens.ClickHouseClient : Symbol.for(`ClickHouseClient:${serviceKey}`);
  }

  /**
   * Registers a singleton client for the connection string named `connectionName`.
   *
   * @throws ConfigurationError if no connection string is configured or a setting is invalid
   */
  public static addClickHouseClient(
    services: DependencyContainer,
    configuration: Config,
    connectionName: string,
    options: ClickHouseClientRegistrationOptions = {},
  ): ClickHouseClientSettings {
    StringEx.requireNonEmpty(connectionName, 'connectionName');
    return ClickHouseClientRegistration.register(services, configuration, connectionName, undefined, options);
  }

  /**
   * Registers a singleton client under the token of `serviceKey`, which is also the connection string name.
   *
   * @throws ConfigurationError if no connection string is configured or a setting is invalid
   */
  public static addKeyedClickHouseClient(
    services: DependencyContainer,
    configuration: Config,
    serviceKey: string,
    options: ClickHouseClientRegistrationOptions = {},
  ): ClickHouseClientSettings {
    StringEx.requireNonEmpty(serviceKey, 'serviceKey');
    return ClickHouseClientRegistration.register(services, configuration, serviceKey, serviceKey, options);
  }

  private static register(
    services: DependencyContainer,
    configuration: Config,
    connectionName: string,
    serviceKey: string | undefined,
    options: ClickHouseClientRegistrationOptions,
  ): ClickHouseClientSettings {
    const settings: ClickHouseClientSettings = ClickHouseClientSettings.fromConfig(
      configuration,
      connectionName,
      serviceKey,
    );
    options.configure?.(settings);

    const connectionString: string | undefined = settings.connectionString;
    if (StringEx.isEmpty(connectionString)) {
      throw new ConfigurationError(
        `A ClickHouse client could not be configured. Ensure valid connection information was provided in ` +
          `'ConnectionStrings:${connectionName}' or either ConnectionString must be provided in the ` +
          `'ClickHouse:Driver${serviceKey === undefined ? '' : `:${serviceKey}`}' configuration section.`,
        undefined,
        {connectionName},
      );
    }

    const clientOptions: ClickHouseClientOptions = ClickHouseClientOptionsParser.parse(connectionString);
    const clientFactory: (options: ClickHouseClientOptions) => ClickHouseClient = options.clientFactory ?? createClient;
    const token: InjectionToken<ClickHouseClient> = ClickHouseClientRegistration.clientToken(serviceKey);

    ServiceRegistrations.register(
      services,
      ServiceRegistrations.factory<ClickHouseClient>(token, (): ClickHouseClient => clientFactory(clientOptions)),
    );

    if (!settings.disableHealthChecks) {
      const name: string = serviceKey === undefined ? 'ClickHouse' : `ClickHouse_${serviceKey}`;
      ServiceRegistrations.register(
        services,
        ServiceRegistrations.factory<HealthCheck>(
          InjectTokens.HealthCheck,
          (container: DependencyContainer): HealthCheck =>
            new ClickHouseHealthCheck(name, container.resolve<ClickHouseClient>(token)),
        ),
      );
    }

    return settings;
  }
}
