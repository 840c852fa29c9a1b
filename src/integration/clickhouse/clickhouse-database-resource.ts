// SPDX-License-Identifier: Apache-2.0

import {
  type ConnectionProperty,
  Resource,
  type ResourceWithConnectionString,
  type ResourceWithParent,
} from '../../business/app-model/resource.js';
import {ConnectionExpression} from '../../business/app-model/connection-expression.js';
import {StringEx} from '../../business/utils/string-ex.js';
import {MissingArgumentError} from '../../core/errors/missing-argument-error.js';
import {type ClickHouseServerResource} from './clickhouse-server-resource.js';

/**
 * A database on a ClickHouse server. Its connection string is the server's with a `Database` suffix.
 */
export class ClickHouseDatabaseResource
  extends Resource
  implements ResourceWithParent<ClickHouseServerResource>, ResourceWithConnectionString
{
  public readonly databaseName: string;
  public readonly parent: ClickHouseServerResource;

  public constructor(name: string, databaseName: string, parent: ClickHouseServerResource | undefined) {
    super(name);
    this.databaseName = StringEx.requireNonEmpty(databaseName, 'databaseName');
    if (!parent) {
      throw new MissingArgumentError('parent must not be null', 'parent');
    }
    this.parent = parent;
  }

  public get connectionStringExpression(): ConnectionExpression {
    return this.parent.buildConnectionString(this.databaseName);
  }

  public getConnectionProperties(): ConnectionProperty[] {
    return this.parent.combineProperties([
      {key: 'DatabaseName', value: ConnectionExpression.literal(this.databaseName)},
    ]);
  }
}
