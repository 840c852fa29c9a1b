// SPDX-License-Identifier: Apache-2.0

import {ConnectionExpression, type ExpressionSegment} from './connection-expression.js';
import {type ValueReference} from './value-reference.js';

export class ConnectionExpressionBuilder {
  private readonly segments: ExpressionSegment[] = [];

  /**
   * Appends the text verbatim; no escaping is applied.
   */
  public appendLiteral(text: string): this {
    if (text.length > 0) {
      this.segments.push(text);
    }
    return this;
  }

  /**
   * Appends a reference, or every segment of another expression.
   */
  public appendExpression(expression: ValueReference | ConnectionExpression): this {
    if (expression instanceof ConnectionExpression) {
      this.segments.push(...expression.parts);
    } else {
      this.segments.push(expression);
    }
    return this;
  }

  public build(): ConnectionExpression {
    return new ConnectionExpression(this.segments);
  }
}
