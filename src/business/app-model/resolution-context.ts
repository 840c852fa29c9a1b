// SPDX-License-Identifier: Apache-2.0

import {EndpointAnnotation} from './annotations.js';
import {type ParameterResource} from './parameter-resource.js';
import {type Resource} from './resource.js';
import {type Config} from '../../data/configuration/api/config.js';
import {StringEx} from '../utils/string-ex.js';

/**
 * The state value references are resolved against: allocated endpoints, parameter values and cancellation.
 */
export interface ResolutionContext {
  readonly signal?: AbortSignal;

  getEndpoint(resourceName: string, endpointName: string): EndpointAnnotation | undefined;

  getParameterValue(parameter: ParameterResource): Promise<string | undefined>;
}

/**
 * Resolves endpoints from the resources of an application model and parameters from its configuration.
 */
export class ApplicationResolutionContext implements ResolutionContext {
  public constructor(
    private readonly resources: Iterable<Resource>,
    private readonly configuration: Config,
    public readonly signal?: AbortSignal,
  ) {}

  public getEndpoint(resourceName: string, endpointName: string): EndpointAnnotation | undefined {
    for (const resource of this.resources) {
      if (StringEx.equalsIgnoreCase(resource.name, resourceName)) {
        return resource
          .annotationsOfType(EndpointAnnotation)
          .find((endpoint: EndpointAnnotation): boolean => endpoint.name === endpointName);
      }
    }
    return undefined;
  }

  public async getParameterValue(parameter: ParameterResource): Promise<string | undefined> {
    return parameter.getValue(this.configuration);
  }
}
