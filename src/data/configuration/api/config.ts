// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';

/**
 * Represents a single application wide multi-layer configuration.
 */
export interface Config {
  /**
   * All the configuration sources which were used to build this configuration, highest ordinal first.
   */
  readonly sources: ConfigSource[];

  /**
   * Adds a configuration source to the configuration.
   *
   * A {@link ConfigSource} with the same name and ordinal as an existing source will be considered a duplicate,
   * even if it is a different instance.
   *
   * @param source - The configuration source to be added.
   * @throws {DuplicateConfigSourceError} if the configuration source has already been added.
   */
  addSource(source: ConfigSource): void;

  /**
   * Returns the value from the source with the highest ordinal that defines the key.
   */
  getString(key: string): string | undefined;

  /**
   * Returns the value parsed as a boolean.
   *
   * @throws {ConfigurationError} if the value is present but is not `true` or `false`.
   */
  getBoolean(key: string): boolean | undefined;
}
