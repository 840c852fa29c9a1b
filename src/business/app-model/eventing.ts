// SPDX-License-Identifier: Apache-2.0

import {type DependencyContainer} from 'tsyringe-neo';
import {type ClassConstructor, type Resource} from './resource.js';
import {OperationCancelledError} from '../../core/errors/operation-cancelled-error.js';

export abstract class ResourceEvent {
  public constructor(
    public readonly resource: Resource,
    public readonly services: DependencyContainer,
  ) {}
}

/**
 * Published once the endpoints a resource's connection string depends on have been allocated.
 */
export class ConnectionStringAvailableEvent extends ResourceEvent {}

/**
 * Published once a resource is running and healthy.
 */
export class ResourceReadyEvent extends ResourceEvent {}

export type ResourceEventCallback<E extends ResourceEvent> = (event: E, signal: AbortSignal) => Promise<void>;

export interface EventSubscription {
  readonly resource: Resource;
  readonly eventType: ClassConstructor<ResourceEvent>;
}

interface Subscription extends EventSubscription {
  invoke(event: ResourceEvent, signal: AbortSignal): Promise<void>;
}

/**
 * Dispatches lifecycle events to the callbacks subscribed for a resource. Callbacks run one at a time in
 * subscription order and the first failure is propagated to the publisher.
 */
export class DistributedApplicationEventing {
  private readonly subscriptions: Subscription[] = [];

  public subscribe<E extends ResourceEvent>(
    resource: Resource,
    eventType: ClassConstructor<E>,
    callback: ResourceEventCallback<E>,
  ): EventSubscription {
    const subscription: Subscription = {
      resource,
      eventType,
      invoke: async (event: ResourceEvent, signal: AbortSignal): Promise<void> => {
        if (event instanceof eventType) {
          await callback(event, signal);
        }
      },
    };
    this.subscriptions.push(subscription);
    return subscription;
  }

  public unsubscribe(subscription: EventSubscription): boolean {
    const index: number = this.subscriptions.findIndex((s: Subscription): boolean => s === subscription);
    if (index === -1) {
      return false;
    }
    this.subscriptions.splice(index, 1);
    return true;
  }

  public async publish(event: ResourceEvent, signal: AbortSignal = new AbortController().signal): Promise<void> {
    const matching: Subscription[] = this.subscriptions.filter(
      (s: Subscription): boolean => s.resource === event.resource && event instanceof s.eventType,
    );

    for (const subscription of matching) {
      OperationCancelledError.throwIfAborted(signal);
      await subscription.invoke(event, signal);
    }
  }
}
