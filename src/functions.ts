/**
 * Free-function builders for aggregates, math, temporal functions, casts and
 * literals.
 */

import { Expression, FeatureLike, Literal } from "./feature";
import { Kind, Native } from "./kind";

/** count(feature), or count(*) without an argument. */
export function count(feature?: FeatureLike): Expression {
  return new Expression("count", feature === undefined ? [] : [feature]);
}

export function avg(feature: FeatureLike): Expression {
  return new Expression("avg", [feature]);
}

export function min(feature: FeatureLike): Expression {
  return new Expression("min", [feature]);
}

export function max(feature: FeatureLike): Expression {
  return new Expression("max", [feature]);
}

export function sum(feature: FeatureLike): Expression {
  return new Expression("sum", [feature]);
}

export function abs(feature: FeatureLike): Expression {
  return new Expression("abs", [feature]);
}

export function ceil(feature: FeatureLike): Expression {
  return new Expression("ceil", [feature]);
}

export function floor(feature: FeatureLike): Expression {
  return new Expression("floor", [feature]);
}

/** Year of a Date or Timestamp feature. */
export function year(feature: FeatureLike): Expression {
  return new Expression("year", [feature]);
}

export function cast(feature: FeatureLike, kind: Kind): Expression {
  return new Expression("cast", [feature], kind);
}

export function literal(value: Native, kind?: Kind): Literal {
  return new Literal(value, kind);
}
