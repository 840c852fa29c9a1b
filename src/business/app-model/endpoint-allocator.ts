// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type HostingLogger} from '../../core/logging/hosting-logger.js';
import {OperationCancelledError} from '../../core/errors/operation-cancelled-error.js';
import {AllocatedEndpoint, EndpointAnnotation} from './annotations.js';
import {type Resource} from './resource.js';

/**
 * Assigns host addresses to resource endpoints. Supplied by the orchestrator that runs the containers.
 */
export interface EndpointAllocator {
  allocate(resources: readonly Resource[], signal: AbortSignal): Promise<void>;
}

/**
 * Binds every unallocated endpoint to localhost on its host port, or on its target port when no host port is set.
 */
@injectable()
export class LocalEndpointAllocator implements EndpointAllocator {
  private readonly logger: HostingLogger;

  public constructor(@inject(InjectTokens.HostingLogger) logger?: HostingLogger) {
    this.logger = patchInject(logger, InjectTokens.HostingLogger, this.constructor.name);
  }

  public async allocate(resources: readonly Resource[], signal: AbortSignal): Promise<void> {
    for (const resource of resources) {
      OperationCancelledError.throwIfAborted(signal);
      for (const endpoint of resource.annotationsOfType(EndpointAnnotation)) {
        if (endpoint.allocatedEndpoint) {
          continue;
        }
        endpoint.allocatedEndpoint = new AllocatedEndpoint('localhost', endpoint.port ?? endpoint.targetPort, endpoint.scheme);
        this.logger.debug(`Allocated endpoint '${endpoint.name}' of '${resource.name}' at ${endpoint.allocatedEndpoint.url}`);
      }
    }
  }
}
