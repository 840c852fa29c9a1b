// SPDX-License-Identifier: Apache-2.0

/**
 * A single layer of flat `Section:Key` configuration values.
 */
export interface ConfigSource {
  /**
   * The name of the configuration source.
   */
  readonly name: string;

  /**
   * The ordinal of the source; values from sources with a higher ordinal take precedence.
   */
  readonly ordinal: number;

  /**
   * The prefix, if any, stripped from the keys read by this source.
   */
  readonly prefix?: string;

  /**
   * All keys held by this source, using `:` as the section separator.
   */
  keys(): string[];

  /**
   * Returns the raw value for the key, or undefined when this source does not define it. Keys are case-insensitive.
   */
  getValue(key: string): string | undefined;
}
