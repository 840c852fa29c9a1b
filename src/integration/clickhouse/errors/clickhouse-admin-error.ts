// SPDX-License-Identifier: Apache-2.0

import {HostingError} from '../../../core/errors/hosting-error.js';

/**
 * Raised when the ClickHouse HTTP interface rejects an administrative statement.
 */
export class ClickHouseAdminError extends HostingError {
  public constructor(
    message: string,
    public readonly responseStatusCode?: number,
    cause?: unknown,
    meta: Record<string, unknown> = {},
  ) {
    super(message, cause, {...meta, statusCode: responseStatusCode});
  }
}
