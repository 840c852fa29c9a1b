// SPDX-License-Identifier: Apache-2.0

import {type ParameterResource} from './parameter-resource.js';
import {type ResolutionContext} from './resolution-context.js';
import {type AllocatedEndpoint, type EndpointAnnotation} from './annotations.js';
import {UnresolvedReferenceError} from '../../core/errors/unresolved-reference-error.js';
import {OperationCancelledError} from '../../core/errors/operation-cancelled-error.js';
import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';

export enum EndpointProperty {
  HOST = 'host',
  PORT = 'port',
  SCHEME = 'scheme',
  URL = 'url',
  HOST_AND_PORT = 'hostAndPort',
  TARGET_PORT = 'targetPort',
}

export interface LiteralValueReference {
  readonly kind: 'literal';
  readonly value: string;
}

export interface ParameterValueReference {
  readonly kind: 'parameter';
  readonly parameter: ParameterResource;
}

export interface EndpointPropertyValueReference {
  readonly kind: 'endpoint-property';
  readonly resourceName: string;
  readonly endpointName: string;
  readonly property: EndpointProperty;
}

/**
 * A scalar whose value is only known once the application is running. References are immutable; resolving one
 * always reads the current state of the resolution context.
 */
export type ValueReference = LiteralValueReference | ParameterValueReference | EndpointPropertyValueReference;

export class ValueReferences {
  private constructor() {
    throw new UnsupportedOperationError('This class cannot be instantiated');
  }

  public static literal(value: string): LiteralValueReference {
    const reference: LiteralValueReference = {kind: 'literal', value};
    return Object.freeze(reference);
  }

  public static parameter(parameter: ParameterResource): ParameterValueReference {
    const reference: ParameterValueReference = {kind: 'parameter', parameter};
    return Object.freeze(reference);
  }

  public static endpointProperty(
    resourceName: string,
    endpointName: string,
    property: EndpointProperty,
  ): EndpointPropertyValueReference {
    const reference: EndpointPropertyValueReference = {kind: 'endpoint-property', resourceName, endpointName, property};
    return Object.freeze(reference);
  }

  public static isValueReference(value: unknown): value is ValueReference {
    return (
      typeof value === 'object' &&
      value !== null &&
      'kind' in value &&
      (value.kind === 'literal' || value.kind === 'parameter' || value.kind === 'endpoint-property')
    );
  }

  /**
   * The placeholder form used in manifests, e.g. `{db.bindings.http.host}` or `{db-password.value}`.
   */
  public static render(reference: ValueReference): string {
    switch (reference.kind) {
      case 'literal': {
        return reference.value;
      }
      case 'parameter': {
        return `{${reference.parameter.name}.value}`;
      }
      case 'endpoint-property': {
        return `{${reference.resourceName}.bindings.${reference.endpointName}.${reference.property}}`;
      }
    }
  }

  /**
   * Resolves the reference against the current state of the context.
   *
   * @returns the value, or undefined when a parameter exists but has no value
   * @throws UnresolvedReferenceError when the referenced endpoint is unknown or not allocated yet
   * @throws OperationCancelledError when the context's signal has been aborted
   */
  public static async resolve(reference: ValueReference, context: ResolutionContext): Promise<string | undefined> {
    OperationCancelledError.throwIfAborted(context.signal);

    switch (reference.kind) {
      case 'literal': {
        return reference.value;
      }
      case 'parameter': {
        return context.getParameterValue(reference.parameter);
      }
      case 'endpoint-property': {
        return ValueReferences.resolveEndpointProperty(reference, context);
      }
    }
  }

  private static resolveEndpointProperty(
    reference: EndpointPropertyValueReference,
    context: ResolutionContext,
  ): string {
    const endpoint: EndpointAnnotation | undefined = context.getEndpoint(
      reference.resourceName,
      reference.endpointName,
    );
    if (!endpoint) {
      throw new UnresolvedReferenceError(
        `The endpoint '${reference.endpointName}' is not defined for the resource '${reference.resourceName}'`,
        ValueReferences.render(reference),
      );
    }

    if (reference.property === EndpointProperty.TARGET_PORT) {
      return String(endpoint.targetPort);
    }

    const allocated: AllocatedEndpoint | undefined = endpoint.allocatedEndpoint;
    if (!allocated) {
      throw new UnresolvedReferenceError(
        `The endpoint '${reference.endpointName}' of the resource '${reference.resourceName}' has not been allocated yet`,
        ValueReferences.render(reference),
      );
    }

    switch (reference.property) {
      case EndpointProperty.HOST: {
        return allocated.host;
      }
      case EndpointProperty.PORT: {
        return String(allocated.port);
      }
      case EndpointProperty.SCHEME: {
        return allocated.scheme;
      }
      case EndpointProperty.URL: {
        return allocated.url;
      }
      case EndpointProperty.HOST_AND_PORT: {
        return allocated.hostAndPort;
      }
    }
  }
}
