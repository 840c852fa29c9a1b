// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {container} from 'tsyringe-neo';
import {
  ConnectionStringAvailableEvent,
  DistributedApplicationEventing,
  type EventSubscription,
  ResourceReadyEvent,
} from '../../../../src/business/app-model/eventing.js';
import {OperationCancelledError} from '../../../../src/core/errors/operation-cancelled-error.js';
import {TestContainerResource} from '../../../test-utility.js';

describe('DistributedApplicationEventing', (): void => {
  let eventing: DistributedApplicationEventing;
  let first: TestContainerResource;
  let second: TestContainerResource;

  beforeEach((): void => {
    eventing = new DistributedApplicationEventing();
    first = new TestContainerResource('first');
    second = new TestContainerResource('second');
  });

  it('should deliver events only to callbacks of the same resource and type', async (): Promise<void> => {
    const calls: string[] = [];
    eventing.subscribe(first, ResourceReadyEvent, async (): Promise<void> => {
      calls.push('first-ready');
    });
    eventing.subscribe(first, ConnectionStringAvailableEvent, async (): Promise<void> => {
      calls.push('first-connection');
    });
    eventing.subscribe(second, ResourceReadyEvent, async (): Promise<void> => {
      calls.push('second-ready');
    });

    await eventing.publish(new ResourceReadyEvent(first, container));

    expect(calls).to.deep.equal(['first-ready']);
  });

  it('should run callbacks one at a time in subscription order', async (): Promise<void> => {
    const calls: string[] = [];
    eventing.subscribe(first, ResourceReadyEvent, async (): Promise<void> => {
      await new Promise<void>((resolve): void => {
        setTimeout(resolve, 5);
      });
      calls.push('slow');
    });
    eventing.subscribe(first, ResourceReadyEvent, async (): Promise<void> => {
      calls.push('fast');
    });

    await eventing.publish(new ResourceReadyEvent(first, container));

    expect(calls).to.deep.equal(['slow', 'fast']);
  });

  it('should pass the event and signal to the callback', async (): Promise<void> => {
    const controller: AbortController = new AbortController();
    const event: ResourceReadyEvent = new ResourceReadyEvent(first, container);
    let received: ResourceReadyEvent | undefined;
    let receivedSignal: AbortSignal | undefined;
    eventing.subscribe(first, ResourceReadyEvent, async (e: ResourceReadyEvent, signal: AbortSignal): Promise<void> => {
      received = e;
      receivedSignal = signal;
    });

    await eventing.publish(event, controller.signal);

    expect(received).to.equal(event);
    expect(receivedSignal).to.equal(controller.signal);
  });

  it('should propagate the first failure and skip later callbacks', async (): Promise<void> => {
    const calls: string[] = [];
    eventing.subscribe(first, ResourceReadyEvent, async (): Promise<void> => {
      throw new Error('callback failed');
    });
    eventing.subscribe(first, ResourceReadyEvent, async (): Promise<void> => {
      calls.push('second');
    });

    await expect(eventing.publish(new ResourceReadyEvent(first, container))).to.be.rejectedWith(Error);
    expect(calls).to.be.empty;
  });

  it('should not run callbacks once the signal is aborted', async (): Promise<void> => {
    const controller: AbortController = new AbortController();
    const calls: string[] = [];
    eventing.subscribe(first, ResourceReadyEvent, async (): Promise<void> => {
      calls.push('first');
      controller.abort();
    });
    eventing.subscribe(first, ResourceReadyEvent, async (): Promise<void> => {
      calls.push('second');
    });

    await expect(eventing.publish(new ResourceReadyEvent(first, container), controller.signal)).to.be.rejectedWith(
      OperationCancelledError,
    );
    expect(calls).to.deep.equal(['first']);
  });

  it('should stop delivering to unsubscribed callbacks', async (): Promise<void> => {
    const calls: string[] = [];
    const subscription: EventSubscription = eventing.subscribe(first, ResourceReadyEvent, async (): Promise<void> => {
      calls.push('ready');
    });

    expect(eventing.unsubscribe(subscription)).to.be.true;
    expect(eventing.unsubscribe(subscription)).to.be.false;
    await eventing.publish(new ResourceReadyEvent(first, container));

    expect(calls).to.be.empty;
  });
});
