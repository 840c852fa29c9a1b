// SPDX-License-Identifier: Apache-2.0

import {type createClient} from '@clickhouse/client';
import {ConnectionString} from '../../business/utils/connection-string.js';
import {ConfigurationError} from '../../data/configuration/api/configuration-error.js';
import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';
import * as constants from '../../core/constants.js';

export type ClickHouseClientOptions = NonNullable<Parameters<typeof createClient>[0]>;

export class ClickHouseClientOptionsParser {
  private constructor() {
    throw new UnsupportedOperationError('This class cannot be instantiated');
  }

  /**
   * Converts `Host=..;Port=..;Username=..;Password=..;Database=..` into client options. `Protocol` selects
   * http or https, `Port` defaults to 8123.
   *
   * @throws ConfigurationError if the connection string is malformed or has no host
   */
  public static parse(connectionString: string): ClickHouseClientOptions {
    let parsed: ConnectionString;
    try {
      parsed = ConnectionString.parse(connectionString);
    } catch (error) {
      throw new ConfigurationError('The ClickHouse connection string is malformed', error);
    }

    const host: string | undefined = parsed.get('Host');
    if (!host) {
      throw new ConfigurationError('The ClickHouse connection string does not specify a Host');
    }

    const protocol: string = (parsed.get('Protocol') ?? 'http').toLowerCase();
    if (protocol !== 'http' && protocol !== 'https') {
      throw new ConfigurationError(`Unsupported ClickHouse protocol '${protocol}'`, undefined, {protocol});
    }

    const port: string = parsed.get('Port') || String(constants.CLICKHOUSE_HTTP_PORT);
    const username: string | undefined = parsed.get('Username');
    const password: string | undefined = parsed.get('Password');
    const database: string | undefined = parsed.get('Database');

    return {
      url: `${protocol}://${host}:${port}`,
      ...(username ? {username} : {}),
      ...(password === undefined ? {} : {password}),
      ...(database ? {database} : {}),
    };
  }
}
