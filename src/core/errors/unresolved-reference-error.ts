// SPDX-License-Identifier: Apache-2.0

import {HostingError} from './hosting-error.js';

/**
 * Thrown when a value reference points at an endpoint or parameter that has not been allocated yet.
 */
export class UnresolvedReferenceError extends HostingError {
  public constructor(
    message: string,
    public readonly reference: string,
  ) {
    super(message, undefined, {reference});
  }
}
