// SPDX-License-Identifier: Apache-2.0

import {type ValueReference, ValueReferences} from './value-reference.js';
import {type ResolutionContext} from './resolution-context.js';

export type ExpressionSegment = string | ValueReference;

/**
 * An ordered, frozen sequence of literal text and value references.
 *
 * `valueExpression` renders the references as placeholders and never fails. `getValue` resolves every reference
 * in order and concatenates the results.
 */
export class ConnectionExpression {
  private readonly segments: readonly ExpressionSegment[];

  public constructor(segments: readonly ExpressionSegment[]) {
    this.segments = Object.freeze([...segments]);
  }

  public static literal(text: string): ConnectionExpression {
    return new ConnectionExpression([text]);
  }

  public static of(reference: ValueReference): ConnectionExpression {
    return new ConnectionExpression([reference]);
  }

  public get parts(): readonly ExpressionSegment[] {
    return this.segments;
  }

  public get references(): ValueReference[] {
    return this.segments.filter((segment): segment is ValueReference => typeof segment !== 'string');
  }

  public get valueExpression(): string {
    return this.segments
      .map((segment: ExpressionSegment): string =>
        typeof segment === 'string' ? segment : ValueReferences.render(segment),
      )
      .join('');
  }

  /**
   * @returns the resolved text, or undefined when any reference resolves to no value
   * @throws UnresolvedReferenceError when a reference is not available yet
   */
  public async getValue(context: ResolutionContext): Promise<string | undefined> {
    let result: string = '';
    for (const segment of this.segments) {
      if (typeof segment === 'string') {
        result += segment;
        continue;
      }

      const value: string | undefined = await ValueReferences.resolve(segment, context);
      if (value === undefined) {
        return undefined;
      }
      result += value;
    }
    return result;
  }

  public toString(): string {
    return this.valueExpression;
  }
}
