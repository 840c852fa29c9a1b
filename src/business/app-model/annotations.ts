// SPDX-License-Identifier: Apache-2.0

import {type ValueReference} from './value-reference.js';
import {type ConnectionExpression} from './connection-expression.js';

/**
 * Marker base class for everything attached to a resource.
 */
export abstract class ResourceAnnotation {}

export class AllocatedEndpoint {
  public constructor(
    public readonly host: string,
    public readonly port: number,
    public readonly scheme: string = 'http',
  ) {}

  public get hostAndPort(): string {
    return `${this.host}:${this.port}`;
  }

  public get url(): string {
    return `${this.scheme}://${this.hostAndPort}`;
  }
}

export interface EndpointOptions {
  readonly name: string;
  readonly targetPort: number;
  readonly port?: number;
  readonly scheme?: string;
  readonly transport?: string;
  readonly protocol?: 'tcp' | 'udp';
  readonly isExternal?: boolean;
}

export class EndpointAnnotation extends ResourceAnnotation {
  public readonly name: string;
  public readonly targetPort: number;
  public port?: number;
  public readonly scheme: string;
  public readonly transport: string;
  public readonly protocol: 'tcp' | 'udp';
  public isExternal: boolean;

  /**
   * Filled in by the orchestrator once a host address has been assigned.
   */
  public allocatedEndpoint?: AllocatedEndpoint;

  public constructor(options: EndpointOptions) {
    super();
    this.name = options.name;
    this.targetPort = options.targetPort;
    this.port = options.port;
    this.scheme = options.scheme ?? 'tcp';
    this.transport = options.transport ?? this.scheme;
    this.protocol = options.protocol ?? 'tcp';
    this.isExternal = options.isExternal ?? false;
  }
}

export class ContainerImageAnnotation extends ResourceAnnotation {
  public constructor(
    public image: string,
    public tag: string,
    public registry?: string,
  ) {
    super();
  }

  public get reference(): string {
    const image: string = `${this.image}:${this.tag}`;
    return this.registry ? `${this.registry}/${image}` : image;
  }
}

export type EnvironmentValue = string | ValueReference | ConnectionExpression;

export interface EnvironmentCallbackContext {
  readonly environmentVariables: Map<string, EnvironmentValue>;
  readonly isPublishMode: boolean;
}

export class EnvironmentCallbackAnnotation extends ResourceAnnotation {
  public constructor(public readonly callback: (context: EnvironmentCallbackContext) => void) {
    super();
  }
}

export class HealthCheckAnnotation extends ResourceAnnotation {
  public constructor(public readonly key: string) {
    super();
  }
}

export class HttpHealthCheckAnnotation extends HealthCheckAnnotation {
  public constructor(
    key: string,
    public readonly path: string,
    public readonly endpointName: string,
    public readonly statusCode: number,
  ) {
    super(key);
  }
}

export type ContainerMountType = 'volume' | 'bind';

export class ContainerMountAnnotation extends ResourceAnnotation {
  public constructor(
    public readonly source: string,
    public readonly target: string,
    public readonly type: ContainerMountType,
    public readonly isReadOnly: boolean,
  ) {
    super();
  }
}
