// SPDX-License-Identifier: Apache-2.0

import {HostingError} from './hosting-error.js';

export class OperationCancelledError extends HostingError {
  public constructor(message: string = 'The operation was cancelled', cause?: unknown) {
    super(message, cause);
  }

  /**
   * Throws an OperationCancelledError when the given signal has been aborted.
   */
  public static throwIfAborted(signal: AbortSignal | undefined, message?: string): void {
    if (signal?.aborted) {
      throw new OperationCancelledError(message, signal.reason);
    }
  }
}
