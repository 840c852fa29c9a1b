// SPDX-License-Identifier: Apache-2.0

import {type DependencyContainer} from 'tsyringe-neo';
import {type DistributedApplicationBuilder} from './application-builder.js';
import {hasConnectionString, type Resource} from './resource.js';
import {ConnectionStringAvailableEvent, type ResourceEvent, ResourceReadyEvent} from './eventing.js';
import {type EndpointAllocator} from './endpoint-allocator.js';
import {type EnvironmentValue, EnvironmentCallbackAnnotation} from './annotations.js';
import {type ResolutionContext} from './resolution-context.js';
import {ConnectionExpression} from './connection-expression.js';
import {ValueReferences} from './value-reference.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type HostingLogger} from '../../core/logging/hosting-logger.js';
import {ApplicationStartError} from '../../core/errors/application-start-error.js';
import {OperationCancelledError} from '../../core/errors/operation-cancelled-error.js';
import {HostingError} from '../../core/errors/hosting-error.js';

/**
 * A built application model. Starting it allocates endpoints and then drives the lifecycle events.
 */
export class DistributedApplication {
  private started: boolean = false;

  public constructor(private readonly builder: DistributedApplicationBuilder) {}

  public get services(): DependencyContainer {
    return this.builder.services;
  }

  public get resources(): readonly Resource[] {
    return [...this.builder.resources];
  }

  /**
   * Allocates endpoints, then publishes ConnectionStringAvailable for every resource with a connection string and
   * ResourceReady for every resource, in registration order.
   *
   * @throws ApplicationStartError if allocation or any lifecycle callback fails
   * @throws OperationCancelledError if the signal is aborted
   */
  public async start(signal: AbortSignal = new AbortController().signal): Promise<void> {
    if (this.started) {
      throw new HostingError('The application has already been started');
    }
    this.started = true;

    const logger: HostingLogger = this.services.resolve<HostingLogger>(InjectTokens.HostingLogger);
    const allocator: EndpointAllocator = this.services.resolve<EndpointAllocator>(InjectTokens.EndpointAllocator);
    const resources: readonly Resource[] = this.resources;

    logger.debug(`Starting application '${this.builder.applicationName}' with ${resources.length} resources`);

    try {
      await allocator.allocate(resources, signal);
    } catch (error) {
      this.rethrowFatal(error, 'Failed to allocate endpoints');
    }

    for (const resource of resources) {
      if (hasConnectionString(resource)) {
        await this.publish(new ConnectionStringAvailableEvent(resource, this.services), signal);
      }
    }

    for (const resource of resources) {
      await this.publish(new ResourceReadyEvent(resource, this.services), signal);
    }

    logger.info(`Application '${this.builder.applicationName}' started`);
  }

  /**
   * Evaluates the environment callbacks of a resource and resolves every value, for the container runtime.
   */
  public async getEnvironmentVariables(resource: Resource, signal?: AbortSignal): Promise<Record<string, string>> {
    const variables: Map<string, EnvironmentValue> = new Map();
    for (const annotation of resource.annotationsOfType(EnvironmentCallbackAnnotation)) {
      annotation.callback({environmentVariables: variables, isPublishMode: false});
    }

    const context: ResolutionContext = this.builder.createResolutionContext(signal);
    const resolved: Record<string, string> = {};
    for (const [name, value] of variables) {
      const text: string | undefined = await DistributedApplication.resolveEnvironmentValue(value, context);
      if (text !== undefined) {
        resolved[name] = text;
      }
    }
    return resolved;
  }

  public async dispose(): Promise<void> {
    await this.services.dispose();
  }

  private static async resolveEnvironmentValue(
    value: EnvironmentValue,
    context: ResolutionContext,
  ): Promise<string | undefined> {
    if (typeof value === 'string') {
      return value;
    }
    if (value instanceof ConnectionExpression) {
      return value.getValue(context);
    }
    return ValueReferences.resolve(value, context);
  }

  private async publish(event: ResourceEvent, signal: AbortSignal): Promise<void> {
    try {
      await this.builder.eventing.publish(event, signal);
    } catch (error) {
      this.rethrowFatal(error, `Failed to start resource '${event.resource.name}'`);
    }
  }

  private rethrowFatal(error: unknown, message: string): never {
    if (error instanceof OperationCancelledError || error instanceof ApplicationStartError) {
      throw error;
    }
    throw new ApplicationStartError(message, error);
  }
}
