// SPDX-License-Identifier: Apache-2.0

import {StatusCodes} from 'http-status-codes';
import {type Resource} from './resource.js';
import {type DistributedApplicationBuilder} from './application-builder.js';
import {
  ContainerImageAnnotation,
  ContainerMountAnnotation,
  EndpointAnnotation,
  type EndpointOptions,
  EnvironmentCallbackAnnotation,
  type EnvironmentCallbackContext,
  HttpHealthCheckAnnotation,
  type ResourceAnnotation,
} from './annotations.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {HostingError} from '../../core/errors/hosting-error.js';
import {StringEx} from '../utils/string-ex.js';

/**
 * Fluent access to a resource that has been added to the application model.
 */
export class ResourceBuilder<T extends Resource> {
  public constructor(
    public readonly applicationBuilder: DistributedApplicationBuilder,
    public readonly resource: T,
  ) {}

  public withAnnotation(annotation: ResourceAnnotation): this {
    this.resource.addAnnotation(annotation);
    return this;
  }

  public withEndpoint(options: EndpointOptions): this {
    if (this.findEndpoint(options.name)) {
      throw new HostingError(`Endpoint with name '${options.name}' already exists on resource '${this.resource.name}'`);
    }
    return this.withAnnotation(new EndpointAnnotation(options));
  }

  /**
   * Runs the callback against an existing endpoint, e.g. to pin its host port or allocated address.
   */
  public configureEndpoint(name: string, callback: (endpoint: EndpointAnnotation) => void): this {
    const endpoint: EndpointAnnotation | undefined = this.findEndpoint(name);
    if (!endpoint) {
      throw new IllegalArgumentError(`Endpoint '${name}' does not exist on resource '${this.resource.name}'`, 'name');
    }
    callback(endpoint);
    return this;
  }

  public withImage(image: string, tag: string = 'latest'): this {
    StringEx.requireNonEmpty(image, 'image');
    const existing: ContainerImageAnnotation | undefined = this.resource.lastAnnotationOfType(ContainerImageAnnotation);
    if (existing) {
      existing.image = image;
      existing.tag = tag;
      return this;
    }
    return this.withAnnotation(new ContainerImageAnnotation(image, tag));
  }

  public withImageRegistry(registry: string): this {
    const existing: ContainerImageAnnotation | undefined = this.resource.lastAnnotationOfType(ContainerImageAnnotation);
    if (!existing) {
      throw new HostingError(`The resource '${this.resource.name}' does not have a container image specified`);
    }
    existing.registry = registry;
    return this;
  }

  public withEnvironment(callback: (context: EnvironmentCallbackContext) => void): this {
    return this.withAnnotation(new EnvironmentCallbackAnnotation(callback));
  }

  /**
   * Registers an HTTP health check against the given endpoint, or the first http endpoint when none is named.
   */
  public withHttpHealthCheck(path: string = '/', endpointName?: string, statusCode: number = StatusCodes.OK): this {
    const endpoint: EndpointAnnotation | undefined = endpointName
      ? this.findEndpoint(endpointName)
      : this.resource
          .annotationsOfType(EndpointAnnotation)
          .find((e: EndpointAnnotation): boolean => e.scheme === 'http' || e.scheme === 'https');

    if (!endpoint) {
      throw new IllegalArgumentError(
        `No http endpoint ${endpointName ? `named '${endpointName}' ` : ''}exists on resource '${this.resource.name}'`,
        'endpointName',
      );
    }

    const key: string = `${this.resource.name}_${endpoint.name}_${endpoint.scheme}_check`;
    return this.withAnnotation(new HttpHealthCheckAnnotation(key, path, endpoint.name, statusCode));
  }

  public withVolume(name: string, target: string, isReadOnly: boolean = false): this {
    return this.withAnnotation(new ContainerMountAnnotation(name, target, 'volume', isReadOnly));
  }

  public withBindMount(source: string, target: string, isReadOnly: boolean = false): this {
    StringEx.requireNonEmpty(source, 'source');
    return this.withAnnotation(new ContainerMountAnnotation(source, target, 'bind', isReadOnly));
  }

  private findEndpoint(name: string): EndpointAnnotation | undefined {
    return this.resource
      .annotationsOfType(EndpointAnnotation)
      .find((endpoint: EndpointAnnotation): boolean => endpoint.name === name);
  }
}
