// SPDX-License-Identifier: Apache-2.0

import {EndpointProperty, type EndpointPropertyValueReference, ValueReferences} from './value-reference.js';

/**
 * Points at a named endpoint of a resource. Holds the resource name only, not the resource itself.
 */
export class EndpointReference {
  public constructor(
    public readonly resourceName: string,
    public readonly endpointName: string,
  ) {}

  public property(property: EndpointProperty): EndpointPropertyValueReference {
    return ValueReferences.endpointProperty(this.resourceName, this.endpointName, property);
  }

  public get host(): EndpointPropertyValueReference {
    return this.property(EndpointProperty.HOST);
  }

  public get port(): EndpointPropertyValueReference {
    return this.property(EndpointProperty.PORT);
  }

  public get url(): EndpointPropertyValueReference {
    return this.property(EndpointProperty.URL);
  }
}
