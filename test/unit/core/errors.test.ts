// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {HostingError} from '../../../src/core/errors/hosting-error.js';
import {DuplicateResourceError} from '../../../src/core/errors/duplicate-resource-error.js';
import {OperationCancelledError} from '../../../src/core/errors/operation-cancelled-error.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';

class StatusError extends Error {
  public readonly statusCode: number = 503;
}

describe('Errors', (): void => {
  describe('HostingError', (): void => {
    it('should carry the message, name and metadata', (): void => {
      const error: HostingError = new HostingError('failed', undefined, {resource: 'clickhouse'});

      expect(error.message).to.equal('failed');
      expect(error.name).to.equal('HostingError');
      expect(error.meta).to.deep.equal({resource: 'clickhouse'});
      expect(error.cause).to.be.undefined;
    });

    it('should keep the cause and append its stack', (): void => {
      const cause: Error = new Error('root cause');
      const error: HostingError = new HostingError('failed', cause);

      expect(error.cause).to.equal(cause);
      expect(error.stack).to.include('Caused by: Error: root cause');
    });

    it('should copy the status code of the cause', (): void => {
      const error: HostingError = new HostingError('failed', new StatusError('unavailable'));

      expect(error.statusCode).to.equal(503);
    });

    it('should name subclasses after themselves', (): void => {
      const error: IllegalArgumentError = new IllegalArgumentError('bad', 'name');

      expect(error).to.be.instanceOf(HostingError);
      expect(error.name).to.equal('IllegalArgumentError');
      expect(error.meta).to.deep.equal({parameterName: 'name'});
    });
  });

  describe('DuplicateResourceError', (): void => {
    it('should describe both resources', (): void => {
      const error: DuplicateResourceError = new DuplicateResourceError(
        'db',
        'ClickHouseDatabaseResource',
        'ClickHouseDatabaseResource',
      );

      expect(error.resourceName).to.equal('db');
      expect(error.message).to.equal(
        "Cannot add resource of type 'ClickHouseDatabaseResource' with name 'db' because resource of type " +
          "'ClickHouseDatabaseResource' with that name already exists. Resource names are case-insensitive.",
      );
    });
  });

  describe('OperationCancelledError', (): void => {
    it('should not throw for a signal that is not aborted', (): void => {
      expect((): void => OperationCancelledError.throwIfAborted(new AbortController().signal)).to.not.throw();
      expect((): void => OperationCancelledError.throwIfAborted(undefined)).to.not.throw();
    });

    it('should throw with the abort reason as the cause', (): void => {
      const controller: AbortController = new AbortController();
      const reason: Error = new Error('shutting down');
      controller.abort(reason);

      try {
        OperationCancelledError.throwIfAborted(controller.signal);
        expect.fail('expected an error');
      } catch (error) {
        expect(error).to.be.instanceOf(OperationCancelledError);
        if (error instanceof OperationCancelledError) {
          expect(error.message).to.equal('The operation was cancelled');
          expect(error.cause).to.equal(reason);
        }
      }
    });
  });
});
