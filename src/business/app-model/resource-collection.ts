// SPDX-License-Identifier: Apache-2.0

import {type ClassConstructor, type Resource} from './resource.js';
import {DuplicateResourceError} from '../../core/errors/duplicate-resource-error.js';

/**
 * The resources of an application model, in registration order. Names are unique across the whole model and
 * compared case-insensitively.
 */
export class ResourceCollection implements Iterable<Resource> {
  private readonly resources: Map<string, Resource> = new Map();

  public add(resource: Resource): void {
    const existing: Resource | undefined = this.find(resource.name);
    if (existing) {
      throw new DuplicateResourceError(resource.name, resource.typeName, existing.typeName);
    }
    this.resources.set(resource.name.toLowerCase(), resource);
  }

  public find(name: string): Resource | undefined {
    return this.resources.get(name.toLowerCase());
  }

  public has(name: string): boolean {
    return this.resources.has(name.toLowerCase());
  }

  public ofType<T extends Resource>(type: ClassConstructor<T>): T[] {
    return [...this.resources.values()].filter((resource): resource is T => resource instanceof type);
  }

  public get size(): number {
    return this.resources.size;
  }

  public [Symbol.iterator](): Iterator<Resource> {
    return this.resources.values();
  }
}
