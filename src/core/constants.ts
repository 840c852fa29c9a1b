// SPDX-License-Identifier: Apache-2.0

export function getEnvironmentVariable(name: string): string | undefined {
  return process.env[name];
}

export const HOSTING_LOGS_DIR: string | undefined = getEnvironmentVariable('CLICKHOUSE_HOSTING_LOGS_DIR');
export const HOSTING_LOG_LEVEL: string = getEnvironmentVariable('CLICKHOUSE_HOSTING_LOG_LEVEL') || 'info';
export const DEFAULT_APPLICATION_NAME: string = 'apphost';

// ClickHouse container
export const CLICKHOUSE_HTTP_PORT: number = 8123;
export const CLICKHOUSE_PRIMARY_ENDPOINT_NAME: string = 'http';
export const CLICKHOUSE_DEFAULT_USER_NAME: string = 'default';
export const CLICKHOUSE_USER_ENV_VAR: string = 'CLICKHOUSE_USER';
export const CLICKHOUSE_PASSWORD_ENV_VAR: string = 'CLICKHOUSE_PASSWORD';
export const CLICKHOUSE_DATA_PATH: string = '/var/lib/clickhouse';
export const CLICKHOUSE_HEALTH_CHECK_PATH: string = '/ping';
export const CLICKHOUSE_USER_HEADER: string = 'X-ClickHouse-User';
export const CLICKHOUSE_KEY_HEADER: string = 'X-ClickHouse-Key';

// ClickHouse client configuration
export const CLICKHOUSE_CLIENT_CONFIG_SECTION: string = 'ClickHouse:Driver';
export const CONNECTION_STRINGS_SECTION: string = 'ConnectionStrings';
export const PARAMETERS_SECTION: string = 'Parameters';

export const GENERATED_PASSWORD_LENGTH: number = 22;
