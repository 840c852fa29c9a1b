// SPDX-License-Identifier: Apache-2.0

import {HostingError} from './hosting-error.js';

export class MissingArgumentError extends HostingError {
  /**
   * Create an error for a required argument that was not supplied
   *
   * @param message - the error message
   * @param parameterName - the name of the missing parameter
   */
  public constructor(
    message: string,
    public readonly parameterName?: string,
  ) {
    super(message, undefined, parameterName ? {parameterName} : {});
  }
}
