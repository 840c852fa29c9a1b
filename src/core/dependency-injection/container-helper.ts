// SPDX-License-Identifier: Apache-2.0

import {container, type InjectionToken} from 'tsyringe-neo';
import {HostingError} from '../errors/hosting-error.js';

/**
 * Resolves a constructor parameter from the container when the caller did not supply one.
 *
 * @param parameter - the value passed to the constructor, if any
 * @param token - the token the parameter is registered under
 * @param callingClass - the name of the class being constructed, used in the error message
 */
export function patchInject<T>(parameter: T | undefined, token: InjectionToken<T>, callingClass: string): T {
  if (parameter !== undefined) {
    return parameter;
  }

  if (!container.isRegistered(token, true)) {
    throw new HostingError(`${callingClass}: ${String(token)} is not registered with the container`);
  }

  return container.resolve<T>(token);
}
