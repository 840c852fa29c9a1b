// SPDX-License-Identifier: Apache-2.0

import {container, type DependencyContainer} from 'tsyringe-neo';
import {type Resource} from './resource.js';
import {ResourceCollection} from './resource-collection.js';
import {ResourceBuilder} from './resource-builder.js';
import {DistributedApplicationEventing} from './eventing.js';
import {ParameterResource} from './parameter-resource.js';
import {ApplicationResolutionContext, type ResolutionContext} from './resolution-context.js';
import {DistributedApplication} from './distributed-application.js';
import {type Config} from '../../data/configuration/api/config.js';
import {LayeredConfig} from '../../data/configuration/impl/layered-config.js';
import {EnvironmentConfigSource} from '../../data/configuration/impl/environment-config-source.js';
import {Container} from '../../core/dependency-injection/container-init.js';
import * as constants from '../../core/constants.js';

export interface DistributedApplicationBuilderOptions {
  readonly applicationName?: string;
  readonly configuration?: Config;
  readonly services?: DependencyContainer;
  readonly isPublishMode?: boolean;
}

/**
 * Collects the resources of an application and the lifecycle callbacks subscribed for them.
 */
export class DistributedApplicationBuilder {
  public readonly applicationName: string;
  public readonly configuration: Config;
  public readonly services: DependencyContainer;
  public readonly isPublishMode: boolean;
  public readonly resources: ResourceCollection = new ResourceCollection();
  public readonly eventing: DistributedApplicationEventing = new DistributedApplicationEventing();

  public constructor(options: DistributedApplicationBuilderOptions = {}) {
    this.applicationName = options.applicationName ?? constants.DEFAULT_APPLICATION_NAME;
    this.configuration = options.configuration ?? new LayeredConfig(new EnvironmentConfigSource());
    this.services = options.services ?? container.createChildContainer();
    this.isPublishMode = options.isPublishMode ?? false;
  }

  /**
   * Creates a builder backed by a child of the global container, initialising the container first if needed.
   */
  public static create(options: DistributedApplicationBuilderOptions = {}): DistributedApplicationBuilder {
    Container.getInstance().init();
    return new DistributedApplicationBuilder(options);
  }

  /**
   * Adds the resource to the model.
   *
   * @throws DuplicateResourceError if any resource with the same name already exists
   */
  public addResource<T extends Resource>(resource: T): ResourceBuilder<T> {
    this.resources.add(resource);
    return new ResourceBuilder<T>(this, resource);
  }

  /**
   * Wraps a resource without adding it to the model.
   */
  public createResourceBuilder<T extends Resource>(resource: T): ResourceBuilder<T> {
    return new ResourceBuilder<T>(this, resource);
  }

  public addParameter(name: string, value?: string, secret: boolean = false): ResourceBuilder<ParameterResource> {
    const parameter: ParameterResource = new ParameterResource(
      name,
      value === undefined ? undefined : (): string => value,
      secret,
    );
    return this.addResource(parameter);
  }

  public createResolutionContext(signal?: AbortSignal): ResolutionContext {
    return new ApplicationResolutionContext(this.resources, this.configuration, signal);
  }

  public build(): DistributedApplication {
    return new DistributedApplication(this);
  }
}
