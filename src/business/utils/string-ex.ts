// SPDX-License-Identifier: Apache-2.0

import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';

export class StringEx {
  public static readonly EMPTY: string = '';

  private constructor() {
    throw new UnsupportedOperationError('This class cannot be instantiated');
  }

  public static isEmpty(value: string | null | undefined): value is '' | null | undefined {
    return value === undefined || value === null || value.length === 0;
  }

  /**
   * Returns the value unchanged, or throws when it is null, undefined or empty.
   *
   * @param value - the argument to check
   * @param parameterName - the argument name reported in the error
   */
  public static requireNonEmpty(value: string | null | undefined, parameterName: string): string {
    if (StringEx.isEmpty(value)) {
      throw new IllegalArgumentError(`${parameterName} must not be null or empty`, parameterName);
    }
    return value;
  }

  public static equalsIgnoreCase(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
  }
}
