// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import {
  ClickHouseBuilderExtensions,
  type ClickHouseDatabaseResource,
  type ClickHouseServerResource,
  type DistributedApplication,
  DistributedApplicationBuilder,
  ManifestPublisher,
  type ResourceBuilder,
} from '../../src/index.js';

const builder: DistributedApplicationBuilder = DistributedApplicationBuilder.create({applicationName: 'ClickHouseEndToEnd'});

const clickhouse: ResourceBuilder<ClickHouseServerResource> = ClickHouseBuilderExtensions.withDataVolume(
  ClickHouseBuilderExtensions.addClickHouse(builder, 'clickhouse'),
);
const database: ResourceBuilder<ClickHouseDatabaseResource> = ClickHouseBuilderExtensions.addDatabase(
  clickhouse,
  'clickhousedb',
);

if (process.argv.includes('--publish')) {
  const publisher: ManifestPublisher = new ManifestPublisher();
  console.log(publisher.toJson(publisher.writeManifest(builder.resources)));
} else {
  const application: DistributedApplication = builder.build();
  const controller: AbortController = new AbortController();
  process.once('SIGINT', (): void => controller.abort());

  await application.start(controller.signal);
  console.log(`${database.resource.name}: ${database.resource.connectionStringExpression.valueExpression}`);
  console.log(await application.getEnvironmentVariables(clickhouse.resource, controller.signal));
  await application.dispose();
}
