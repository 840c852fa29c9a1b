// SPDX-License-Identifier: Apache-2.0

import {type Config} from '../api/config.js';
import {type ConfigSource} from '../spi/config-source.js';
import {DuplicateConfigSourceError} from '../api/duplicate-config-source-error.js';
import {ConfigurationError} from '../api/configuration-error.js';

export class LayeredConfig implements Config {
  private readonly _sources: ConfigSource[] = [];

  public constructor(...sources: ConfigSource[]) {
    for (const source of sources) {
      this.addSource(source);
    }
  }

  public get sources(): ConfigSource[] {
    return [...this._sources];
  }

  public addSource(source: ConfigSource): void {
    const duplicate: boolean = this._sources.some(
      (s: ConfigSource): boolean => s === source || (s.name === source.name && s.ordinal === source.ordinal),
    );
    if (duplicate) {
      throw new DuplicateConfigSourceError(source);
    }

    this._sources.push(source);
    // stable sort keeps insertion order between sources of equal ordinal
    this._sources.sort((l: ConfigSource, r: ConfigSource): number => r.ordinal - l.ordinal);
  }

  public getString(key: string): string | undefined {
    for (const source of this._sources) {
      const value: string | undefined = source.getValue(key);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  public getBoolean(key: string): boolean | undefined {
    const value: string | undefined = this.getString(key);
    if (value === undefined) {
      return undefined;
    }

    switch (value.trim().toLowerCase()) {
      case 'true': {
        return true;
      }
      case 'false': {
        return false;
      }
      default: {
        throw new ConfigurationError(`Value of '${key}' is "${value}" but should be a boolean`, undefined, {key});
      }
    }
  }
}
