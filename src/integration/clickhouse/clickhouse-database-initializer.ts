// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type ResourceLoggerService} from '../../core/logging/resource-logger-service.js';
import {type HostingLogger} from '../../core/logging/hosting-logger.js';
import {OperationCancelledError} from '../../core/errors/operation-cancelled-error.js';
import {ConnectionString} from '../../business/utils/connection-string.js';
import * as constants from '../../core/constants.js';
import {type ClickHouseAdminClient, type ClickHouseAdminClientFactory} from './clickhouse-admin-client.js';
import {type ClickHouseServerResource} from './clickhouse-server-resource.js';
import {type ClickHouseDatabaseResource} from './clickhouse-database-resource.js';

/**
 * Creates the databases registered on a running ClickHouse server.
 */
@injectable()
export class ClickHouseDatabaseInitializer {
  private readonly adminClientFactory: ClickHouseAdminClientFactory;
  private readonly resourceLoggerService: ResourceLoggerService;

  public constructor(
    @inject(InjectTokens.ClickHouseAdminClientFactory) adminClientFactory?: ClickHouseAdminClientFactory,
    @inject(InjectTokens.ResourceLoggerService) resourceLoggerService?: ResourceLoggerService,
  ) {
    this.adminClientFactory = patchInject(
      adminClientFactory,
      InjectTokens.ClickHouseAdminClientFactory,
      this.constructor.name,
    );
    this.resourceLoggerService = patchInject(
      resourceLoggerService,
      InjectTokens.ResourceLoggerService,
      this.constructor.name,
    );
  }

  /**
   * Runs `CREATE DATABASE IF NOT EXISTS` for each database, one after the other. A database that cannot be created
   * is logged against the server and skipped.
   *
   * @param server - the server the databases belong to
   * @param connectionString - the resolved connection string of the server
   * @param databases - the databases to create, in order
   * @param signal - abandons the remaining databases when aborted
   * @throws OperationCancelledError if the signal is aborted
   */
  public async createDatabases(
    server: ClickHouseServerResource,
    connectionString: string,
    databases: readonly ClickHouseDatabaseResource[],
    signal: AbortSignal,
  ): Promise<void> {
    const logger: HostingLogger = this.resourceLoggerService.getLogger(server);
    const client: ClickHouseAdminClient = this.createClient(connectionString);

    for (const database of databases) {
      OperationCancelledError.throwIfAborted(signal);
      await this.createDatabase(client, database, logger, signal);
    }
  }

  private createClient(connectionString: string): ClickHouseAdminClient {
    const parsed: ConnectionString = ConnectionString.parse(connectionString);
    const baseUrl: string = `http://${parsed.get('Host')}:${parsed.get('Port')}`;

    return this.adminClientFactory.create(baseUrl, {
      userName: parsed.get('Username') ?? constants.CLICKHOUSE_DEFAULT_USER_NAME,
      password: parsed.get('Password'),
    });
  }

  private async createDatabase(
    client: ClickHouseAdminClient,
    database: ClickHouseDatabaseResource,
    logger: HostingLogger,
    signal: AbortSignal,
  ): Promise<void> {
    logger.debug(`Creating database '${database.databaseName}'`);

    try {
      // ClickHouse identifiers are quoted with backticks
      await client.execute(`CREATE DATABASE IF NOT EXISTS \`${database.databaseName}\``, signal);
      logger.debug(`Database '${database.databaseName}' created successfully`);
    } catch (error) {
      if (signal.aborted) {
        throw new OperationCancelledError(undefined, error);
      }
      logger.error(`Failed to create database '${database.databaseName}'`, error);
    }
  }
}
