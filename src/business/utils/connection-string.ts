// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';

/**
 * A parsed `Key=Value;Key=Value` connection string. Keys are case-insensitive, values are trimmed
 * and never unescaped.
 */
export class ConnectionString {
  private readonly entries: Map<string, {key: string; value: string}> = new Map();

  private constructor() {}

  public static parse(text: string): ConnectionString {
    const connectionString: ConnectionString = new ConnectionString();

    for (const segment of text.split(';')) {
      if (segment.trim().length === 0) {
        continue;
      }

      const separator: number = segment.indexOf('=');
      if (separator <= 0) {
        throw new IllegalArgumentError(`Invalid connection string segment: '${segment.trim()}'`, 'text');
      }

      const key: string = segment.slice(0, separator).trim();
      const value: string = segment.slice(separator + 1).trim();
      connectionString.entries.set(key.toLowerCase(), {key, value});
    }

    return connectionString;
  }

  public has(key: string): boolean {
    return this.entries.has(key.toLowerCase());
  }

  public get(key: string): string | undefined {
    return this.entries.get(key.toLowerCase())?.value;
  }

  public get keys(): string[] {
    return [...this.entries.values()].map((entry): string => entry.key);
  }

  public toString(): string {
    return [...this.entries.values()].map((entry): string => `${entry.key}=${entry.value}`).join(';');
  }
}
