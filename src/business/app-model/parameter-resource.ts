// SPDX-License-Identifier: Apache-2.0

import {randomInt} from 'node:crypto';
import {Resource} from './resource.js';
import {type Config} from '../../data/configuration/api/config.js';
import * as constants from '../../core/constants.js';

export type ParameterDefault = (configuration: Config) => string | undefined;

/**
 * A value supplied to the application from outside, such as a user name or password. The configured value
 * `Parameters:<name>` wins over the default.
 */
export class ParameterResource extends Resource {
  public constructor(
    name: string,
    private readonly defaultValue?: ParameterDefault,
    public readonly secret: boolean = false,
  ) {
    super(name);
  }

  public get configurationKey(): string {
    return `${constants.PARAMETERS_SECTION}:${this.name}`;
  }

  public get hasDefault(): boolean {
    return this.defaultValue !== undefined;
  }

  public getValue(configuration: Config): string | undefined {
    return configuration.getString(this.configurationKey) ?? this.defaultValue?.(configuration);
  }

  /**
   * Creates a secret parameter whose default is a password generated once and reused afterwards.
   */
  public static generatedPassword(name: string, length: number = constants.GENERATED_PASSWORD_LENGTH): ParameterResource {
    let generated: string | undefined;
    return new ParameterResource(name, (): string => (generated ??= ParameterResource.generatePassword(length)), true);
  }

  private static generatePassword(length: number): string {
    const lower: string = 'abcdefghijklmnopqrstuvwxyz';
    const upper: string = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
    const digits: string = '0123456789';
    const all: string = lower + upper + digits;

    // one character of each class, the remainder drawn from all of them, then shuffled
    const characters: string[] = [lower, upper, digits].map((set: string): string => set[randomInt(set.length)]);
    while (characters.length < length) {
      characters.push(all[randomInt(all.length)]);
    }
    for (let index: number = characters.length - 1; index > 0; index--) {
      const other: number = randomInt(index + 1);
      [characters[index], characters[other]] = [characters[other], characters[index]];
    }

    return characters.join('');
  }
}
