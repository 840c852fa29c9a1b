// SPDX-License-Identifier: Apache-2.0

import {type Config} from '../../data/configuration/api/config.js';
import * as constants from '../../core/constants.js';

/**
 * Settings of a ClickHouse client binding. Read from the `ClickHouse:Driver` section, then from the keyed
 * `ClickHouse:Driver:<key>` section, with `ConnectionStrings:<name>` taking precedence for the connection string.
 */
export class ClickHouseClientSettings {
  public connectionString?: string;
  public disableHealthChecks: boolean = false;

  /**
   * @throws ConfigurationError if `DisableHealthChecks` is not a boolean
   */
  public static fromConfig(configuration: Config, connectionName: string, serviceKey?: string): ClickHouseClientSettings {
    const settings: ClickHouseClientSettings = new ClickHouseClientSettings();
    const sections: string[] = [constants.CLICKHOUSE_CLIENT_CONFIG_SECTION];
    if (serviceKey !== undefined) {
      sections.push(`${constants.CLICKHOUSE_CLIENT_CONFIG_SECTION}:${serviceKey}`);
    }

    for (const section of sections) {
      settings.connectionString = configuration.getString(`${section}:ConnectionString`) ?? settings.connectionString;
      settings.disableHealthChecks =
        configuration.getBoolean(`${section}:DisableHealthChecks`) ?? settings.disableHealthChecks;
    }

    const namedConnectionString: string | undefined = configuration.getString(
      `${constants.CONNECTION_STRINGS_SECTION}:${connectionName}`,
    );
    if (namedConnectionString !== undefined) {
      settings.connectionString = namedConnectionString;
    }

    return settings;
  }
}
