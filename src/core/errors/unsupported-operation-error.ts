// SPDX-License-Identifier: Apache-2.0

import {HostingError} from './hosting-error.js';

export class UnsupportedOperationError extends HostingError {
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
