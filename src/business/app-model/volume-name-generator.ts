// SPDX-License-Identifier: Apache-2.0

import {type Resource} from './resource.js';
import {type ResourceBuilder} from './resource-builder.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';

export class VolumeNameGenerator {
  private static readonly VALID_SUFFIX: RegExp = /^[\w.-]+$/;

  private constructor() {
    throw new UnsupportedOperationError('This class cannot be instantiated');
  }

  /**
   * Generates `<application>-<resource>-<suffix>`, with the application name lower-cased and characters
   * not allowed in volume names replaced by underscores.
   */
  public static generate(builder: ResourceBuilder<Resource>, suffix: string): string {
    if (!VolumeNameGenerator.VALID_SUFFIX.test(suffix)) {
      throw new IllegalArgumentError(
        `The suffix '${suffix}' contains invalid characters. Only [a-zA-Z0-9_.-] are allowed.`,
        'suffix',
      );
    }

    const application: string = builder.applicationBuilder.applicationName.toLowerCase().replaceAll(/[^\w.-]/g, '_');
    return `${application}-${builder.resource.name}-${suffix}`;
  }
}
