// SPDX-License-Identifier: Apache-2.0

import {container, type InjectionToken} from 'tsyringe-neo';
import {type HostingLogger} from '../logging/hosting-logger.js';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {WinstonHostingLogger} from '../logging/winston-hosting-logger.js';
import {ResourceLoggerService} from '../logging/resource-logger-service.js';
import {type ServiceRegistration, ServiceRegistrations} from './service-registration.js';
import {LocalEndpointAllocator} from '../../business/app-model/endpoint-allocator.js';
import {GotClickHouseAdminClientFactory} from '../../integration/clickhouse/impl/got-clickhouse-admin-client.js';
import {ClickHouseDatabaseInitializer} from '../../integration/clickhouse/clickhouse-database-initializer.js';

export type InstanceOverrides = Map<symbol, ServiceRegistration>;

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance: Container | undefined;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logLevel - the log level to use, defaults to constants.HOSTING_LOG_LEVEL
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   */
  public init(
    logLevel: string = constants.HOSTING_LOG_LEVEL,
    developmentMode: boolean = false,
    overrides: InstanceOverrides = new Map<symbol, ServiceRegistration>(),
  ): void {
    if (Container.isInitialized) {
      container.resolve<HostingLogger>(InjectTokens.HostingLogger).debug('Container already initialized');
      return;
    }

    const defaults: ServiceRegistration[] = [
      ServiceRegistrations.value(InjectTokens.LogLevel, logLevel),
      ServiceRegistrations.value(InjectTokens.DevelopmentMode, developmentMode),
      ServiceRegistrations.singleton(InjectTokens.HostingLogger, WinstonHostingLogger),
      ServiceRegistrations.singleton(InjectTokens.ResourceLoggerService, ResourceLoggerService),
      ServiceRegistrations.singleton(InjectTokens.EndpointAllocator, LocalEndpointAllocator),
      ServiceRegistrations.singleton(InjectTokens.ClickHouseAdminClientFactory, GotClickHouseAdminClientFactory),
      ServiceRegistrations.singleton(InjectTokens.ClickHouseDatabaseInitializer, ClickHouseDatabaseInitializer),
    ];

    for (const [token, override] of overrides) {
      ServiceRegistrations.register(container, {...override, token});
    }

    const overridden: Set<InjectionToken<unknown>> = new Set<InjectionToken<unknown>>(overrides.keys());
    for (const registration of defaults) {
      if (!overridden.has(registration.token)) {
        ServiceRegistrations.register(container, registration);
      }
    }

    container.resolve<HostingLogger>(InjectTokens.HostingLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param logLevel - the log level to use, defaults to constants.HOSTING_LOG_LEVEL
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   */
  public reset(logLevel?: string, developmentMode?: boolean, overrides?: InstanceOverrides): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<HostingLogger>(InjectTokens.HostingLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logLevel, developmentMode, overrides);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
