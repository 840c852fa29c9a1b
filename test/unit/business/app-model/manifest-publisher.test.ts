// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {container} from 'tsyringe-neo';
import {DistributedApplicationBuilder} from '../../../../src/business/app-model/application-builder.js';
import {type ManifestNode, ManifestPublisher} from '../../../../src/business/app-model/manifest-publisher.js';
import {type ResourceBuilder} from '../../../../src/business/app-model/resource-builder.js';
import {type ParameterResource} from '../../../../src/business/app-model/parameter-resource.js';
import {ValueReferences} from '../../../../src/business/app-model/value-reference.js';
import {type EnvironmentCallbackContext} from '../../../../src/business/app-model/annotations.js';
import {LayeredConfig} from '../../../../src/data/configuration/impl/layered-config.js';
import {TestContainerResource} from '../../../test-utility.js';

describe('ManifestPublisher', (): void => {
  let builder: DistributedApplicationBuilder;
  let publisher: ManifestPublisher;

  beforeEach((): void => {
    builder = new DistributedApplicationBuilder({
      configuration: new LayeredConfig(),
      services: container.createChildContainer(),
      isPublishMode: true,
    });
    publisher = new ManifestPublisher();
  });

  it('should write parameters as inputs', (): void => {
    const password: ResourceBuilder<ParameterResource> = builder.addParameter('password', undefined, true);
    const user: ResourceBuilder<ParameterResource> = builder.addParameter('user', 'admin');

    expect(publisher.writeResource(password.resource)).to.deep.equal({
      type: 'parameter.v0',
      value: '{password.inputs.value}',
      inputs: {value: {type: 'string', secret: true}},
    });
    expect(publisher.writeResource(user.resource)).to.deep.equal({
      type: 'parameter.v0',
      value: '{user.inputs.value}',
      inputs: {value: {type: 'string'}},
    });
  });

  it('should write containers with image, mounts, environment and bindings', (): void => {
    const password: ResourceBuilder<ParameterResource> = builder.addParameter('password', undefined, true);
    const web: ResourceBuilder<TestContainerResource> = builder
      .addResource(new TestContainerResource('web'))
      .withImage('nginx', '1.27')
      .withImageRegistry('docker.io')
      .withEndpoint({name: 'http', targetPort: 80, port: 8080, scheme: 'http', isExternal: true})
      .withVolume('web-data', '/data')
      .withBindMount('./conf', '/etc/nginx', true)
      .withEnvironment((context: EnvironmentCallbackContext): void => {
        context.environmentVariables.set('MODE', context.isPublishMode ? 'publish' : 'run');
        context.environmentVariables.set('PASSWORD', ValueReferences.parameter(password.resource));
      });

    const node: ManifestNode | undefined = publisher.writeResource(web.resource);

    expect(node).to.deep.equal({
      type: 'container.v0',
      image: 'docker.io/nginx:1.27',
      volumes: [{name: 'web-data', target: '/data', readOnly: false}],
      bindMounts: [{source: './conf', target: '/etc/nginx', readOnly: true}],
      env: {MODE: 'publish', PASSWORD: '{password.value}'},
      bindings: {http: {scheme: 'http', protocol: 'tcp', transport: 'http', port: 8080, targetPort: 80, external: true}},
    });
    expect(node ? Object.keys(node) : []).to.deep.equal(['type', 'image', 'volumes', 'bindMounts', 'env', 'bindings']);
  });

  it('should skip resources without a manifest form', (): void => {
    const plain: TestContainerResource = new TestContainerResource('plain');
    builder.addResource(plain);

    expect(publisher.writeResource(plain)).to.be.undefined;
    expect(publisher.writeManifest(builder.resources)).to.deep.equal({resources: {}});
  });

  it('should serialise with two space indentation', (): void => {
    expect(publisher.toJson({type: 'value.v0', connectionString: 'Host=x'})).to.equal(
      '{\n  "type": "value.v0",\n  "connectionString": "Host=x"\n}',
    );
  });
});
