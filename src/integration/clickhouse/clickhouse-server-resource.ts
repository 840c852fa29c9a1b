// SPDX-License-Identifier: Apache-2.0

import {type ConnectionProperty, ContainerResource, type ResourceWithConnectionString} from '../../business/app-model/resource.js';
import {type ParameterResource} from '../../business/app-model/parameter-resource.js';
import {EndpointReference} from '../../business/app-model/endpoint-reference.js';
import {type EndpointPropertyValueReference, ValueReferences} from '../../business/app-model/value-reference.js';
import {ConnectionExpression} from '../../business/app-model/connection-expression.js';
import {ConnectionExpressionBuilder} from '../../business/app-model/connection-expression-builder.js';
import * as constants from '../../core/constants.js';

/**
 * A ClickHouse server running as a container, reachable through its HTTP interface.
 */
export class ClickHouseServerResource extends ContainerResource implements ResourceWithConnectionString {
  public static readonly PRIMARY_ENDPOINT_NAME: string = constants.CLICKHOUSE_PRIMARY_ENDPOINT_NAME;

  private readonly _databases: Map<string, {name: string; databaseName: string}> = new Map();
  private _primaryEndpoint?: EndpointReference;

  /**
   * @param name - the resource name
   * @param userNameParameter - the server user name, or undefined for the `default` user
   * @param passwordParameter - the server password, or undefined for no password
   */
  public constructor(
    name: string,
    public readonly userNameParameter?: ParameterResource,
    public readonly passwordParameter?: ParameterResource,
  ) {
    super(name);
  }

  public get primaryEndpoint(): EndpointReference {
    this._primaryEndpoint ??= new EndpointReference(this.name, ClickHouseServerResource.PRIMARY_ENDPOINT_NAME);
    return this._primaryEndpoint;
  }

  public get host(): EndpointPropertyValueReference {
    return this.primaryEndpoint.host;
  }

  public get port(): EndpointPropertyValueReference {
    return this.primaryEndpoint.port;
  }

  /**
   * The user name parameter when one was given, otherwise the literal `default`.
   */
  public get userNameReference(): ConnectionExpression {
    return this.userNameParameter
      ? ConnectionExpression.of(ValueReferences.parameter(this.userNameParameter))
      : ConnectionExpression.literal(constants.CLICKHOUSE_DEFAULT_USER_NAME);
  }

  public get connectionStringExpression(): ConnectionExpression {
    return this.buildConnectionString();
  }

  /**
   * Builds `Host=..;Port=..;Username=..[;Password=..][;Database=..]`.
   *
   * @internal used by the database resources of this server
   */
  public buildConnectionString(databaseName?: string): ConnectionExpression {
    const builder: ConnectionExpressionBuilder = new ConnectionExpressionBuilder()
      .appendLiteral('Host=')
      .appendExpression(this.host)
      .appendLiteral(';Port=')
      .appendExpression(this.port)
      .appendLiteral(';Username=')
      .appendExpression(this.userNameReference);

    if (this.passwordParameter) {
      builder.appendLiteral(';Password=').appendExpression(ValueReferences.parameter(this.passwordParameter));
    }

    if (databaseName !== undefined) {
      builder.appendLiteral(`;Database=${databaseName}`);
    }

    return builder.build();
  }

  /**
   * Resource name to database name, in registration order.
   */
  public get databases(): ReadonlyMap<string, string> {
    return new Map([...this._databases.values()].map((entry): [string, string] => [entry.name, entry.databaseName]));
  }

  /**
   * Records a database of this server. A name that is already registered, in any casing, keeps its first mapping.
   *
   * @internal called when a database resource is added
   */
  public addDatabase(name: string, databaseName: string): void {
    const key: string = name.toLowerCase();
    if (!this._databases.has(key)) {
      this._databases.set(key, {name, databaseName});
    }
  }

  public getConnectionProperties(): ConnectionProperty[] {
    const properties: ConnectionProperty[] = [
      {key: 'Host', value: ConnectionExpression.of(this.host)},
      {key: 'Port', value: ConnectionExpression.of(this.port)},
      {key: 'Username', value: this.userNameReference},
    ];

    if (this.passwordParameter) {
      properties.push({key: 'Password', value: ConnectionExpression.of(ValueReferences.parameter(this.passwordParameter))});
    }

    return properties;
  }

  /**
   * The connection properties of this server followed by the given ones.
   */
  public combineProperties(additional: readonly ConnectionProperty[]): ConnectionProperty[] {
    return [...this.getConnectionProperties(), ...additional];
  }
}
