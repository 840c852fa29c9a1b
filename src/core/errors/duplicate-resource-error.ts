// SPDX-License-Identifier: Apache-2.0

import {HostingError} from './hosting-error.js';

/**
 * Thrown when a resource is added under a name that is already taken anywhere in the application model.
 */
export class DuplicateResourceError extends HostingError {
  public constructor(
    public readonly resourceName: string,
    resourceType: string,
    existingType: string,
  ) {
    super(
      `Cannot add resource of type '${resourceType}' with name '${resourceName}' because resource of type ` +
        `'${existingType}' with that name already exists. Resource names are case-insensitive.`,
      undefined,
      {resourceName, resourceType, existingType},
    );
  }
}
