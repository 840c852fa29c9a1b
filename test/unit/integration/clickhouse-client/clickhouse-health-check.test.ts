// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import sinon from 'sinon';
import {ClickHouseHealthCheck, type PingableClient} from '../../../../src/integration/clickhouse-client/clickhouse-health-check.js';
import {type HealthCheckResult} from '../../../../src/core/health/health-check.js';

describe('ClickHouseHealthCheck', (): void => {
  it('should be healthy when the ping succeeds', async (): Promise<void> => {
    const client: PingableClient = {ping: sinon.stub().resolves({success: true})};

    const result: HealthCheckResult = await new ClickHouseHealthCheck('ClickHouse', client).check();

    expect(result).to.deep.equal({status: 'healthy'});
  });

  it('should report the ping error', async (): Promise<void> => {
    const error: Error = new Error('connect ECONNREFUSED 127.0.0.1:8123');
    const client: PingableClient = {ping: sinon.stub().resolves({success: false, error})};

    const result: HealthCheckResult = await new ClickHouseHealthCheck('ClickHouse', client).check();

    expect(result).to.deep.equal({status: 'unhealthy', description: 'connect ECONNREFUSED 127.0.0.1:8123', error});
  });

  it('should be unhealthy when the ping throws', async (): Promise<void> => {
    const error: Error = new Error('socket hang up');
    const client: PingableClient = {ping: sinon.stub().rejects(error)};

    const result: HealthCheckResult = await new ClickHouseHealthCheck('ClickHouse', client).check();

    expect(result.status).to.equal('unhealthy');
    expect(result.description).to.equal('socket hang up');
    expect(result.error).to.equal(error);
  });
});
