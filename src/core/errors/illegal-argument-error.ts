// SPDX-License-Identifier: Apache-2.0

import {HostingError} from './hosting-error.js';

export class IllegalArgumentError extends HostingError {
  /**
   * Create an error for an argument that was supplied but cannot be used
   *
   * @param message - the error message
   * @param parameterName - the name of the offending parameter
   * @param cause - source error (if any)
   */
  public constructor(
    message: string,
    public readonly parameterName?: string,
    cause?: unknown,
  ) {
    super(message, cause, parameterName ? {parameterName} : {});
  }
}
