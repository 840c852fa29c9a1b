// SPDX-License-Identifier: Apache-2.0

import {hasConnectionString, type Resource} from './resource.js';
import {ParameterResource} from './parameter-resource.js';
import {
  ContainerImageAnnotation,
  ContainerMountAnnotation,
  EndpointAnnotation,
  EnvironmentCallbackAnnotation,
  type EnvironmentValue,
} from './annotations.js';
import {ConnectionExpression} from './connection-expression.js';
import {ValueReferences} from './value-reference.js';

export type ManifestValue = string | number | boolean | ManifestValue[] | ManifestNode;

export interface ManifestNode {
  [key: string]: ManifestValue;
}

/**
 * Writes the deployment manifest of resources. Every deferred value is written in its placeholder form.
 */
export class ManifestPublisher {
  public writeManifest(resources: Iterable<Resource>): ManifestNode {
    const nodes: ManifestNode = {};
    for (const resource of resources) {
      const node: ManifestNode | undefined = this.writeResource(resource);
      if (node) {
        nodes[resource.name] = node;
      }
    }
    return {resources: nodes};
  }

  /**
   * @returns the manifest entry, or undefined for resources that have no manifest representation
   */
  public writeResource(resource: Resource): ManifestNode | undefined {
    if (resource instanceof ParameterResource) {
      return this.writeParameter(resource);
    }

    const image: ContainerImageAnnotation | undefined = resource.lastAnnotationOfType(ContainerImageAnnotation);
    if (image) {
      return this.writeContainer(resource, image);
    }

    if (hasConnectionString(resource)) {
      return {type: 'value.v0', connectionString: resource.connectionStringExpression.valueExpression};
    }

    return undefined;
  }

  public toJson(node: ManifestNode): string {
    return JSON.stringify(node, undefined, 2);
  }

  private writeParameter(parameter: ParameterResource): ManifestNode {
    const input: ManifestNode = {type: 'string'};
    if (parameter.secret) {
      input.secret = true;
    }
    return {
      type: 'parameter.v0',
      value: `{${parameter.name}.inputs.value}`,
      inputs: {value: input},
    };
  }

  private writeContainer(resource: Resource, image: ContainerImageAnnotation): ManifestNode {
    const node: ManifestNode = {type: 'container.v0'};

    if (hasConnectionString(resource)) {
      node.connectionString = resource.connectionStringExpression.valueExpression;
    }

    node.image = image.reference;

    const mounts: ContainerMountAnnotation[] = resource.annotationsOfType(ContainerMountAnnotation);
    const volumes: ManifestNode[] = mounts
      .filter((mount: ContainerMountAnnotation): boolean => mount.type === 'volume')
      .map((mount: ContainerMountAnnotation): ManifestNode => ({
        name: mount.source,
        target: mount.target,
        readOnly: mount.isReadOnly,
      }));
    const bindMounts: ManifestNode[] = mounts
      .filter((mount: ContainerMountAnnotation): boolean => mount.type === 'bind')
      .map((mount: ContainerMountAnnotation): ManifestNode => ({
        source: mount.source,
        target: mount.target,
        readOnly: mount.isReadOnly,
      }));
    if (volumes.length > 0) {
      node.volumes = volumes;
    }
    if (bindMounts.length > 0) {
      node.bindMounts = bindMounts;
    }

    const environment: ManifestNode = this.writeEnvironment(resource);
    if (Object.keys(environment).length > 0) {
      node.env = environment;
    }

    const endpoints: EndpointAnnotation[] = resource.annotationsOfType(EndpointAnnotation);
    if (endpoints.length > 0) {
      const bindings: ManifestNode = {};
      for (const endpoint of endpoints) {
        bindings[endpoint.name] = this.writeBinding(endpoint);
      }
      node.bindings = bindings;
    }

    return node;
  }

  private writeEnvironment(resource: Resource): ManifestNode {
    const variables: Map<string, EnvironmentValue> = new Map();
    for (const annotation of resource.annotationsOfType(EnvironmentCallbackAnnotation)) {
      annotation.callback({environmentVariables: variables, isPublishMode: true});
    }

    const environment: ManifestNode = {};
    for (const [name, value] of variables) {
      environment[name] = ManifestPublisher.render(value);
    }
    return environment;
  }

  private writeBinding(endpoint: EndpointAnnotation): ManifestNode {
    const binding: ManifestNode = {
      scheme: endpoint.scheme,
      protocol: endpoint.protocol,
      transport: endpoint.transport,
    };
    if (endpoint.port !== undefined) {
      binding.port = endpoint.port;
    }
    binding.targetPort = endpoint.targetPort;
    if (endpoint.isExternal) {
      binding.external = true;
    }
    return binding;
  }

  private static render(value: EnvironmentValue): string {
    if (typeof value === 'string') {
      return value;
    }
    if (value instanceof ConnectionExpression) {
      return value.valueExpression;
    }
    return ValueReferences.render(value);
  }
}
