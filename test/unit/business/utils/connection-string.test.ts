// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {ConnectionString} from '../../../../src/business/utils/connection-string.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('ConnectionString', (): void => {
  it('should parse keys case-insensitively', (): void => {
    const parsed: ConnectionString = ConnectionString.parse('Host=localhost;Port=8123;Username=default');

    expect(parsed.get('host')).to.equal('localhost');
    expect(parsed.get('PORT')).to.equal('8123');
    expect(parsed.has('username')).to.be.true;
    expect(parsed.has('Password')).to.be.false;
    expect(parsed.get('Password')).to.be.undefined;
  });

  it('should keep the original key casing and order', (): void => {
    const parsed: ConnectionString = ConnectionString.parse('Host=localhost;Port=8123;Database=orders');

    expect(parsed.keys).to.deep.equal(['Host', 'Port', 'Database']);
    expect(parsed.toString()).to.equal('Host=localhost;Port=8123;Database=orders');
  });

  it('should skip empty segments and trim keys and values', (): void => {
    const parsed: ConnectionString = ConnectionString.parse(' Host = db.local ;; Port=9000;');

    expect(parsed.keys).to.deep.equal(['Host', 'Port']);
    expect(parsed.get('Host')).to.equal('db.local');
  });

  it('should split at the first equals sign only', (): void => {
    const parsed: ConnectionString = ConnectionString.parse('Password=a=b=c');

    expect(parsed.get('Password')).to.equal('a=b=c');
  });

  it('should keep an empty value', (): void => {
    const parsed: ConnectionString = ConnectionString.parse('Host=localhost;Password=');

    expect(parsed.has('Password')).to.be.true;
    expect(parsed.get('Password')).to.equal('');
  });

  it('should reject a segment without a key', (): void => {
    expect((): ConnectionString => ConnectionString.parse('Host=localhost;=8123')).to.throw(
      IllegalArgumentError,
      "Invalid connection string segment: '=8123'",
    );
    expect((): ConnectionString => ConnectionString.parse('localhost')).to.throw(IllegalArgumentError);
  });
});
