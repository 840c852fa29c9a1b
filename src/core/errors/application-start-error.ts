// SPDX-License-Identifier: Apache-2.0

import {HostingError} from './hosting-error.js';

/**
 * Fatal error raised while starting the application; startup is aborted.
 */
export class ApplicationStartError extends HostingError {
  public constructor(message: string, cause?: unknown, meta?: Record<string, unknown>) {
    super(message, cause, meta);
  }
}
