// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';

/**
 * A {@link ConfigSource} that reads configuration data from the environment.
 *
 * <p>
 * Strings are read verbatim from the environment variables. A double underscore in a variable name separates
 * sections, so `ConnectionStrings__orders` is read as `ConnectionStrings:orders`. When a prefix is given only
 * variables starting with it are read, and the prefix is removed from the key.
 */
export class EnvironmentConfigSource implements ConfigSource {
  private readonly data: Map<string, {key: string; value: string}> = new Map();

  public constructor(
    public readonly prefix?: string,
    environment: NodeJS.ProcessEnv = process.env,
  ) {
    for (const [variable, value] of Object.entries(environment)) {
      if (value === undefined || (prefix && !variable.startsWith(prefix))) {
        continue;
      }

      const key: string = (prefix ? variable.slice(prefix.length) : variable).replaceAll('__', ':');
      this.data.set(key.toLowerCase(), {key, value});
    }
  }

  public get name(): string {
    return 'EnvironmentConfigSource';
  }

  public get ordinal(): number {
    return 100;
  }

  public keys(): string[] {
    return [...this.data.values()].map((entry): string => entry.key);
  }

  public getValue(key: string): string | undefined {
    return this.data.get(key.toLowerCase())?.value;
  }
}
