// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {createClient, type ClickHouseClient} from '@clickhouse/client';
import {container, type DependencyContainer} from 'tsyringe-neo';
import {ClickHouseClientRegistration} from '../../../../src/integration/clickhouse-client/clickhouse-client-registration.js';
import {type ClickHouseClientSettings} from '../../../../src/integration/clickhouse-client/clickhouse-client-settings.js';
import {type ClickHouseClientOptions} from '../../../../src/integration/clickhouse-client/clickhouse-client-options.js';
import {type HealthCheck} from '../../../../src/core/health/health-check.js';
import {InjectTokens} from '../../../../src/core/dependency-injection/inject-tokens.js';
import {type Config} from '../../../../src/data/configuration/api/config.js';
import {ConfigurationError} from '../../../../src/data/configuration/api/configuration-error.js';
import {LayeredConfig} from '../../../../src/data/configuration/impl/layered-config.js';
import {MemoryConfigSource} from '../../../../src/data/configuration/impl/memory-config-source.js';

describe('ClickHouseClientRegistration', (): void => {
  let services: DependencyContainer;
  let created: ClickHouseClientOptions[];
  let clients: ClickHouseClient[];

  function clientFactory(options: ClickHouseClientOptions): ClickHouseClient {
    created.push(options);
    const client: ClickHouseClient = createClient(options);
    clients.push(client);
    return client;
  }

  function configuration(values: Record<string, string>): Config {
    return new LayeredConfig(new MemoryConfigSource(values));
  }

  beforeEach((): void => {
    services = container.createChildContainer();
    created = [];
    clients = [];
  });

  afterEach(async (): Promise<void> => {
    for (const client of clients) {
      await client.close();
    }
  });

  it('should register a singleton client for the named connection string', (): void => {
    ClickHouseClientRegistration.addClickHouseClient(
      services,
      configuration({'ConnectionStrings:clickhouse': 'Host=localhost;Port=18123;Username=admin;Password=test-secret'}),
      'clickhouse',
      {clientFactory},
    );

    expect(created).to.be.empty;

    const first: ClickHouseClient = services.resolve<ClickHouseClient>(InjectTokens.ClickHouseClient);
    const second: ClickHouseClient = services.resolve<ClickHouseClient>(InjectTokens.ClickHouseClient);

    expect(first).to.equal(second);
    expect(created).to.deep.equal([
      {url: 'http://localhost:18123', username: 'admin', password: 'test-secret'},
    ]);
  });

  it('should read the connection string from the driver section', (): void => {
    const settings: ClickHouseClientSettings = ClickHouseClientRegistration.addClickHouseClient(
      services,
      configuration({'ClickHouse:Driver:ConnectionString': 'Host=clickhouse;Database=orders'}),
      'clickhouse',
      {clientFactory},
    );

    services.resolve<ClickHouseClient>(InjectTokens.ClickHouseClient);

    expect(settings.connectionString).to.equal('Host=clickhouse;Database=orders');
    expect(created).to.deep.equal([{url: 'http://clickhouse:8123', database: 'orders'}]);
  });

  it('should prefer the named connection string over the driver section', (): void => {
    const settings: ClickHouseClientSettings = ClickHouseClientRegistration.addClickHouseClient(
      services,
      configuration({
        'ClickHouse:Driver:ConnectionString': 'Host=fallback',
        'ConnectionStrings:clickhouse': 'Host=primary',
      }),
      'clickhouse',
      {clientFactory},
    );

    expect(settings.connectionString).to.equal('Host=primary');
  });

  it('should apply the configure callback last', (): void => {
    const settings: ClickHouseClientSettings = ClickHouseClientRegistration.addClickHouseClient(
      services,
      configuration({}),
      'clickhouse',
      {
        clientFactory,
        configure: (value: ClickHouseClientSettings): void => {
          value.connectionString = 'Host=configured';
          value.disableHealthChecks = true;
        },
      },
    );

    services.resolve<ClickHouseClient>(InjectTokens.ClickHouseClient);

    expect(settings.disableHealthChecks).to.be.true;
    expect(created).to.deep.equal([{url: 'http://configured:8123'}]);
    expect(services.isRegistered(InjectTokens.HealthCheck)).to.be.false;
  });

  it('should register a health check named after the client', (): void => {
    ClickHouseClientRegistration.addClickHouseClient(
      services,
      configuration({'ConnectionStrings:clickhouse': 'Host=localhost'}),
      'clickhouse',
      {clientFactory},
    );

    const checks: HealthCheck[] = services.resolveAll<HealthCheck>(InjectTokens.HealthCheck);

    expect(checks.map((check: HealthCheck): string => check.name)).to.deep.equal(['ClickHouse']);
  });

  it('should register a keyed client with its own section and health check', (): void => {
    const settings: ClickHouseClientSettings = ClickHouseClientRegistration.addKeyedClickHouseClient(
      services,
      configuration({
        'ClickHouse:Driver:DisableHealthChecks': 'true',
        'ClickHouse:Driver:analytics:DisableHealthChecks': 'false',
        'ConnectionStrings:analytics': 'Host=analytics-db',
      }),
      'analytics',
      {clientFactory},
    );

    const client: ClickHouseClient = services.resolve<ClickHouseClient>(
      ClickHouseClientRegistration.clientToken('analytics'),
    );
    const checks: HealthCheck[] = services.resolveAll<HealthCheck>(InjectTokens.HealthCheck);

    expect(settings.disableHealthChecks).to.be.false;
    expect(client).to.equal(clients[0]);
    expect(services.isRegistered(InjectTokens.ClickHouseClient)).to.be.false;
    expect(checks.map((check: HealthCheck): string => check.name)).to.deep.equal(['ClickHouse_analytics']);
  });

  it('should give each service key its own token', (): void => {
    expect(ClickHouseClientRegistration.clientToken()).to.equal(InjectTokens.ClickHouseClient);
    expect(ClickHouseClientRegistration.clientToken('analytics')).to.equal(Symbol.for('ClickHouseClient:analytics'));
  });

  it('should fail without a connection string', (): void => {
    expect((): void => {
      ClickHouseClientRegistration.addKeyedClickHouseClient(services, configuration({}), 'analytics');
    }).to.throw(
      ConfigurationError,
      "A ClickHouse client could not be configured. Ensure valid connection information was provided in 'ConnectionStrings:analytics' or either ConnectionString must be provided in the 'ClickHouse:Driver:analytics' configuration section.",
    );
  });

  it('should reject a flag that is not a boolean', (): void => {
    expect((): void => {
      ClickHouseClientRegistration.addClickHouseClient(
        services,
        configuration({'ConnectionStrings:clickhouse': 'Host=localhost', 'ClickHouse:Driver:DisableHealthChecks': 'maybe'}),
        'clickhouse',
      );
    }).to.throw(ConfigurationError, 'Value of \'ClickHouse:Driver:DisableHealthChecks\' is "maybe" but should be a boolean');
  });
});
