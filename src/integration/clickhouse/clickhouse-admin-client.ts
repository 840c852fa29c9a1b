// SPDX-License-Identifier: Apache-2.0

export interface ClickHouseAdminCredentials {
  readonly userName: string;
  readonly password?: string;
}

/**
 * Sends administrative statements to the HTTP interface of a running ClickHouse server.
 */
export interface ClickHouseAdminClient {
  readonly baseUrl: string;

  /**
   * Executes a single statement.
   *
   * @param sql - the statement, sent as the request body
   * @param signal - aborts the request
   * @throws ClickHouseAdminError if the server answers with a non-2xx status
   */
  execute(sql: string, signal?: AbortSignal): Promise<void>;
}

export interface ClickHouseAdminClientFactory {
  create(baseUrl: string, credentials: ClickHouseAdminCredentials): ClickHouseAdminClient;
}
