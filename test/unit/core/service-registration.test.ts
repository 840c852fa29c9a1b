// SPDX-License-Identifier: Apache-2.0

import sinon, {type SinonStub} from 'sinon';
import {expect} from 'chai';
import {describe, it, afterEach, beforeEach} from 'mocha';
import {container, type DependencyContainer} from 'tsyringe-neo';

import {ServiceRegistrations} from '../../../src/core/dependency-injection/service-registration.js';
import {InjectTokens} from '../../../src/core/dependency-injection/inject-tokens.js';
import {resetTestContainer} from '../../test-container.js';

class Counter {
  public count: number = 0;
}

describe('ServiceRegistrations', (): void => {
  const token: symbol = Symbol.for('Counter');
  let services: DependencyContainer;

  beforeEach((): void => {
    services = container.createChildContainer();
  });

  it('should hand out one instance of a singleton class', (): void => {
    ServiceRegistrations.register(services, ServiceRegistrations.singleton(token, Counter));

    const first: Counter = services.resolve<Counter>(token);
    first.count++;

    expect(first).to.be.instanceOf(Counter);
    expect(services.resolve<Counter>(token).count).to.equal(1);
  });

  it('should hand out a registered value', (): void => {
    ServiceRegistrations.register(services, ServiceRegistrations.value(token, 'info'));

    expect(services.resolve<string>(token)).to.equal('info');
  });

  it('should build a shared factory instance once', (): void => {
    const factory: SinonStub<[DependencyContainer], Counter> = sinon.stub<[DependencyContainer], Counter>();
    factory.callsFake((): Counter => new Counter());
    ServiceRegistrations.register(services, ServiceRegistrations.factory<Counter>(token, factory));

    const first: Counter = services.resolve<Counter>(token);

    expect(services.resolve<Counter>(token)).to.equal(first);
    expect(factory.calledOnce).to.be.true;
  });

  it('should build a new instance on each resolve of a factory that is not shared', (): void => {
    const factory: SinonStub<[DependencyContainer], Counter> = sinon.stub<[DependencyContainer], Counter>();
    factory.callsFake((): Counter => new Counter());
    ServiceRegistrations.register(services, ServiceRegistrations.factory<Counter>(token, factory, false));

    const first: Counter = services.resolve<Counter>(token);

    expect(services.resolve<Counter>(token)).to.not.equal(first);
    expect(factory.calledTwice).to.be.true;
  });

  describe('as container overrides', (): void => {
    afterEach((): void => {
      resetTestContainer();
    });

    it('should use an override in place of the default service', (): void => {
      const allocator: {allocate(): void} = {allocate: (): void => {}};

      resetTestContainer(
        new Map([[InjectTokens.EndpointAllocator, ServiceRegistrations.value(InjectTokens.EndpointAllocator, allocator)]]),
      );

      expect(container.resolve(InjectTokens.EndpointAllocator)).to.equal(allocator);
      expect(container.resolve<string>(InjectTokens.LogLevel)).to.equal('silent');
    });
  });
});
