// SPDX-License-Identifier: Apache-2.0

import got, {type Response} from 'got';
import {StatusCodes} from 'http-status-codes';
import {injectable} from 'tsyringe-neo';
import {
  type ClickHouseAdminClient,
  type ClickHouseAdminClientFactory,
  type ClickHouseAdminCredentials,
} from '../clickhouse-admin-client.js';
import {ClickHouseAdminError} from '../errors/clickhouse-admin-error.js';
import * as constants from '../../../core/constants.js';

export class GotClickHouseAdminClient implements ClickHouseAdminClient {
  private readonly headers: Record<string, string>;

  public constructor(
    public readonly baseUrl: string,
    credentials: ClickHouseAdminCredentials,
  ) {
    this.headers = {[constants.CLICKHOUSE_USER_HEADER]: credentials.userName};
    if (credentials.password !== undefined) {
      this.headers[constants.CLICKHOUSE_KEY_HEADER] = credentials.password;
    }
  }

  public async execute(sql: string, signal?: AbortSignal): Promise<void> {
    let response: Response<string>;
    try {
      response = await got.post(this.baseUrl, {
        body: sql,
        headers: this.headers,
        signal,
        retry: {limit: 0},
        throwHttpErrors: false,
      });
    } catch (error) {
      throw new ClickHouseAdminError(`Request to ${this.baseUrl} failed`, undefined, error, {baseUrl: this.baseUrl});
    }

    if (response.statusCode < StatusCodes.OK || response.statusCode >= StatusCodes.MULTIPLE_CHOICES) {
      throw new ClickHouseAdminError(
        `ClickHouse responded with status ${response.statusCode}: ${response.body.trim()}`,
        response.statusCode,
        undefined,
        {baseUrl: this.baseUrl},
      );
    }
  }
}

@injectable()
export class GotClickHouseAdminClientFactory implements ClickHouseAdminClientFactory {
  public create(baseUrl: string, credentials: ClickHouseAdminCredentials): ClickHouseAdminClient {
    return new GotClickHouseAdminClient(baseUrl, credentials);
  }
}
