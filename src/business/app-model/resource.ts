// SPDX-License-Identifier: Apache-2.0

import {StringEx} from '../utils/string-ex.js';
import {type ResourceAnnotation} from './annotations.js';
import {type ConnectionExpression} from './connection-expression.js';

export type ClassConstructor<T> = abstract new (...arguments_: never[]) => T;

/**
 * A named entity in the application model. Annotations describe how the host should run it.
 */
export abstract class Resource {
  private readonly _annotations: ResourceAnnotation[] = [];

  protected constructor(public readonly name: string) {
    StringEx.requireNonEmpty(name, 'name');
  }

  public get annotations(): readonly ResourceAnnotation[] {
    return this._annotations;
  }

  public addAnnotation(annotation: ResourceAnnotation): void {
    this._annotations.push(annotation);
  }

  public annotationsOfType<T extends ResourceAnnotation>(type: ClassConstructor<T>): T[] {
    return this._annotations.filter((annotation): annotation is T => annotation instanceof type);
  }

  public lastAnnotationOfType<T extends ResourceAnnotation>(type: ClassConstructor<T>): T | undefined {
    return this.annotationsOfType(type).at(-1);
  }

  public get typeName(): string {
    return this.constructor.name;
  }
}

/**
 * A resource the host runs as a container.
 */
export abstract class ContainerResource extends Resource {}

export interface ConnectionProperty {
  readonly key: string;
  readonly value: ConnectionExpression;
}

export interface ResourceWithConnectionString {
  readonly name: string;
  readonly connectionStringExpression: ConnectionExpression;

  /**
   * The individual parts of the connection string, in a fixed order, for manifest and introspection tooling.
   */
  getConnectionProperties(): ConnectionProperty[];
}

export interface ResourceWithParent<T extends Resource> {
  readonly parent: T;
}

export function hasConnectionString(resource: Resource): resource is Resource & ResourceWithConnectionString {
  return (
    'connectionStringExpression' in resource &&
    'getConnectionProperties' in resource &&
    typeof resource.getConnectionProperties === 'function'
  );
}
