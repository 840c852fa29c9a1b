// SPDX-License-Identifier: Apache-2.0

import {type ClassProvider, type DependencyContainer, type InjectionToken, Lifecycle} from 'tsyringe-neo';

type ServiceClass = ClassProvider<unknown>['useClass'];

/**
 * How a hosting service is put into a dependency container: a class resolved once, a fixed value, or a factory.
 */
export type ServiceRegistration =
  | {readonly kind: 'singleton'; readonly token: InjectionToken<unknown>; readonly useClass: ServiceClass}
  | {readonly kind: 'value'; readonly token: InjectionToken<unknown>; readonly useValue: unknown}
  | {
      readonly kind: 'factory';
      readonly token: InjectionToken<unknown>;
      readonly useFactory: (container: DependencyContainer) => unknown;
    };

export class ServiceRegistrations {
  private constructor() {}

  public static singleton(token: InjectionToken<unknown>, useClass: ServiceClass): ServiceRegistration {
    return {kind: 'singleton', token, useClass};
  }

  public static value(token: InjectionToken<unknown>, useValue: unknown): ServiceRegistration {
    return {kind: 'value', token, useValue};
  }

  /**
   * A factory registration. Unless `shared` is false the first instance built is handed to every later resolve.
   */
  public static factory<T>(
    token: InjectionToken<T>,
    factory: (container: DependencyContainer) => T,
    shared: boolean = true,
  ): ServiceRegistration {
    let cachedInstance: T | undefined;
    const useFactory: (container: DependencyContainer) => T = (container: DependencyContainer): T => {
      if (!shared) {
        return factory(container);
      }
      if (cachedInstance === undefined) {
        cachedInstance = factory(container);
      }
      return cachedInstance;
    };
    return {kind: 'factory', token, useFactory};
  }

  public static register(container: DependencyContainer, registration: ServiceRegistration): void {
    switch (registration.kind) {
      case 'singleton': {
        container.register(registration.token, {useClass: registration.useClass}, {lifecycle: Lifecycle.Singleton});
        break;
      }
      case 'value': {
        container.register(registration.token, {useValue: registration.useValue});
        break;
      }
      case 'factory': {
        container.register(registration.token, {useFactory: registration.useFactory});
        break;
      }
    }
  }
}
