// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';

/**
 * A {@link ConfigSource} over an in-memory set of values, used for host supplied settings and tests.
 */
export class MemoryConfigSource implements ConfigSource {
  private readonly data: Map<string, {key: string; value: string}> = new Map();

  public constructor(
    values: Record<string, string> = {},
    public readonly ordinal: number = 200,
    public readonly name: string = 'MemoryConfigSource',
  ) {
    for (const [key, value] of Object.entries(values)) {
      this.set(key, value);
    }
  }

  public set(key: string, value: string): void {
    this.data.set(key.toLowerCase(), {key, value});
  }

  public keys(): string[] {
    return [...this.data.values()].map((entry): string => entry.key);
  }

  public getValue(key: string): string | undefined {
    return this.data.get(key.toLowerCase())?.value;
  }
}
