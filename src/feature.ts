/**
 * Feature algebra: column-level expressions.
 *
 * Every feature is an immutable value with a structural key. Operables (every
 * feature except an Aliased wrapper) expose builder methods so expressions read
 * left to right: `student.get("score").lt(2).and(...)`. Argument kinds are
 * validated eagerly; invalid combinations raise GrammarError at the call site.
 */

import { GrammarError } from "./errors";
import {
  formatNative,
  Kind,
  KindFamilies,
  Kinds,
  Native,
  nativeKey,
  reflect,
  widest,
} from "./kind";
import { fnv1a, NodeMap, NodeSet, Structural } from "./structural";
import type { Source, Table } from "./frame";

// ---------------------------------------------------------------------------
// OPERATOR REGISTRY
// ---------------------------------------------------------------------------

export type OperatorFamily =
  | "arithmetic"
  | "comparison"
  | "logical"
  | "nullity"
  | "aggregate"
  | "math"
  | "temporal"
  | "cast";

/** How an operator is rendered around its arguments. */
export type OperatorShape = "infix" | "prefix" | "postfix" | "function";

export interface OperatorSpec {
  readonly family: OperatorFamily;
  readonly shape: OperatorShape;
  readonly symbol: string;
  readonly minArity: number;
  readonly maxArity: number;
}

export const OPERATORS = {
  add: { family: "arithmetic", shape: "infix", symbol: "+", minArity: 2, maxArity: 2 },
  sub: { family: "arithmetic", shape: "infix", symbol: "-", minArity: 2, maxArity: 2 },
  mul: { family: "arithmetic", shape: "infix", symbol: "*", minArity: 2, maxArity: 2 },
  div: { family: "arithmetic", shape: "infix", symbol: "/", minArity: 2, maxArity: 2 },
  mod: { family: "arithmetic", shape: "infix", symbol: "%", minArity: 2, maxArity: 2 },
  eq: { family: "comparison", shape: "infix", symbol: "==", minArity: 2, maxArity: 2 },
  ne: { family: "comparison", shape: "infix", symbol: "!=", minArity: 2, maxArity: 2 },
  lt: { family: "comparison", shape: "infix", symbol: "<", minArity: 2, maxArity: 2 },
  le: { family: "comparison", shape: "infix", symbol: "<=", minArity: 2, maxArity: 2 },
  gt: { family: "comparison", shape: "infix", symbol: ">", minArity: 2, maxArity: 2 },
  ge: { family: "comparison", shape: "infix", symbol: ">=", minArity: 2, maxArity: 2 },
  and: { family: "logical", shape: "infix", symbol: "AND", minArity: 2, maxArity: 2 },
  or: { family: "logical", shape: "infix", symbol: "OR", minArity: 2, maxArity: 2 },
  not: { family: "logical", shape: "prefix", symbol: "NOT", minArity: 1, maxArity: 1 },
  isNull: { family: "nullity", shape: "postfix", symbol: "IS NULL", minArity: 1, maxArity: 1 },
  notNull: { family: "nullity", shape: "postfix", symbol: "IS NOT NULL", minArity: 1, maxArity: 1 },
  count: { family: "aggregate", shape: "function", symbol: "count", minArity: 0, maxArity: 1 },
  avg: { family: "aggregate", shape: "function", symbol: "avg", minArity: 1, maxArity: 1 },
  min: { family: "aggregate", shape: "function", symbol: "min", minArity: 1, maxArity: 1 },
  max: { family: "aggregate", shape: "function", symbol: "max", minArity: 1, maxArity: 1 },
  sum: { family: "aggregate", shape: "function", symbol: "sum", minArity: 1, maxArity: 1 },
  abs: { family: "math", shape: "function", symbol: "abs", minArity: 1, maxArity: 1 },
  ceil: { family: "math", shape: "function", symbol: "ceil", minArity: 1, maxArity: 1 },
  floor: { family: "math", shape: "function", symbol: "floor", minArity: 1, maxArity: 1 },
  year: { family: "temporal", shape: "function", symbol: "year", minArity: 1, maxArity: 1 },
  cast: { family: "cast", shape: "function", symbol: "cast", minArity: 1, maxArity: 1 },
} as const satisfies Record<string, OperatorSpec>;

export type OperatorName = keyof typeof OPERATORS;

export function operatorSpec(operator: OperatorName): OperatorSpec {
  return OPERATORS[operator];
}

// ---------------------------------------------------------------------------
// FEATURE BASE
// ---------------------------------------------------------------------------

export type FeatureType = "Aliased" | "Literal" | "Element" | "Expression" | "Window";

export interface FeatureVisitor {
  visitAliased(feature: Aliased): void;
  visitLiteral(feature: Literal): void;
  visitElement(feature: Element): void;
  visitExpression(feature: Expression): void;
  visitWindow(feature: Window): void;
}

/** Anything accepted where a feature is expected; natives become literals. */
export type FeatureLike = Feature | Native;

abstract class BaseFeature implements Structural {
  abstract readonly type: FeatureType;
  abstract readonly key: string;
  abstract readonly kind: Kind;
  /** Explicit name of the feature, if any (alias or field name) */
  abstract readonly name: string | undefined;

  /** The underlying operable: itself, or the wrapped operable of an alias. */
  abstract get operable(): Operable;

  /** Immediate sub-features. */
  abstract get children(): readonly Feature[];

  abstract accept(visitor: FeatureVisitor): void;

  abstract toString(): string;

  get hash(): number {
    return fnv1a(this.key);
  }

  equals(other: Feature): boolean {
    return this.key === other.key;
  }
}

export function isFeature(value: unknown): value is Feature {
  return value instanceof BaseFeature;
}

/**
 * Coerce a feature-like value into an operable: aliases are unwrapped and
 * native values become literals.
 */
export function toOperable(value: FeatureLike): Operable {
  if (isFeature(value)) return value.operable;
  return new Literal(value);
}

export function toFeature(value: FeatureLike): Feature {
  if (isFeature(value)) return value;
  return new Literal(value);
}

abstract class BaseOperable extends BaseFeature {
  private factorCache: Factors | undefined;

  /**
   * Per-table decomposition of this predicate. Empty for non-boolean kinds.
   */
  get factors(): Factors {
    if (this.factorCache === undefined) {
      this.factorCache = computeFactors(this.operable);
    }
    return this.factorCache;
  }

  alias(name: string): Aliased {
    return new Aliased(this.operable, name);
  }

  eq(other: FeatureLike): Expression {
    return new Expression("eq", [this.operable, other]);
  }

  ne(other: FeatureLike): Expression {
    return new Expression("ne", [this.operable, other]);
  }

  lt(other: FeatureLike): Expression {
    return new Expression("lt", [this.operable, other]);
  }

  le(other: FeatureLike): Expression {
    return new Expression("le", [this.operable, other]);
  }

  gt(other: FeatureLike): Expression {
    return new Expression("gt", [this.operable, other]);
  }

  ge(other: FeatureLike): Expression {
    return new Expression("ge", [this.operable, other]);
  }

  and(other: FeatureLike): Expression {
    return new Expression("and", [this.operable, other]);
  }

  or(other: FeatureLike): Expression {
    return new Expression("or", [this.operable, other]);
  }

  not(): Expression {
    return new Expression("not", [this.operable]);
  }

  add(other: FeatureLike): Expression {
    return new Expression("add", [this.operable, other]);
  }

  sub(other: FeatureLike): Expression {
    return new Expression("sub", [this.operable, other]);
  }

  mul(other: FeatureLike): Expression {
    return new Expression("mul", [this.operable, other]);
  }

  div(other: FeatureLike): Expression {
    return new Expression("div", [this.operable, other]);
  }

  mod(other: FeatureLike): Expression {
    return new Expression("mod", [this.operable, other]);
  }

  isNull(): Expression {
    return new Expression("isNull", [this.operable]);
  }

  notNull(): Expression {
    return new Expression("notNull", [this.operable]);
  }

  cast(kind: Kind): Expression {
    return new Expression("cast", [this.operable], kind);
  }

  asc(): Ordering {
    return new Ordering(this.operable, "ascending");
  }

  desc(): Ordering {
    return new Ordering(this.operable, "descending");
  }
}

// ---------------------------------------------------------------------------
// FEATURE VARIANTS
// ---------------------------------------------------------------------------

/** A named wrapper around an operable. Only valid at the top of a selection. */
export class Aliased extends BaseFeature {
  readonly type = "Aliased";
  readonly key: string;
  readonly kind: Kind;
  private readonly wrapped: Operable;

  constructor(operable: FeatureLike, readonly name: string) {
    super();
    this.wrapped = toOperable(operable);
    this.kind = this.wrapped.kind;
    this.key = `Aliased(${this.wrapped.key} AS ${JSON.stringify(name)})`;
  }

  get operable(): Operable {
    return this.wrapped;
  }

  get children(): readonly Feature[] {
    return [this.wrapped];
  }

  accept(visitor: FeatureVisitor): void {
    visitor.visitAliased(this);
  }

  toString(): string {
    return `${this.wrapped} AS ${this.name}`;
  }
}

export class Literal extends BaseOperable {
  readonly type = "Literal";
  readonly key: string;
  readonly kind: Kind;
  readonly value: Native;
  readonly name = undefined;

  /**
   * @param kind - explicit kind; the value is cast to it. Reflected when omitted.
   */
  constructor(value: Native, kind?: Kind) {
    super();
    this.kind = kind ?? reflect(value);
    this.value = this.kind.cast(value);
    this.key = `Literal(${this.kind.key}:${nativeKey(this.value)})`;
  }

  get operable(): Operable {
    return this;
  }

  get children(): readonly Feature[] {
    return [];
  }

  accept(visitor: FeatureVisitor): void {
    visitor.visitLiteral(this);
  }

  toString(): string {
    return formatNative(this.value);
  }
}

/**
 * A named field of a source. Bound to a table it is a Column; bound to a
 * reference, join or query it stays a plain Element.
 */
export class Element extends BaseOperable {
  readonly type = "Element";
  readonly key: string;
  readonly kind: Kind;
  readonly name: string;

  constructor(readonly origin: Source, name: string) {
    super();
    const resolved = origin.schema.get(name);
    this.name = resolved.name;
    this.kind = resolved.kind;
    this.key = `Element(${origin.key}.${JSON.stringify(this.name)})`;
  }

  get operable(): Operable {
    return this;
  }

  get children(): readonly Feature[] {
    return [];
  }

  accept(visitor: FeatureVisitor): void {
    visitor.visitElement(this);
  }

  toString(): string {
    return `${this.origin.label}.${this.name}`;
  }
}

export class Column extends Element {
  constructor(readonly table: Table, name: string) {
    super(table, name);
  }
}

export function isColumn(feature: Feature): feature is Column {
  return feature instanceof Column;
}

/**
 * An operator applied to operable arguments. The result kind follows the
 * operator family: arithmetic widens, comparisons and logicals are Boolean,
 * count/ceil/floor/year are Integer and cast takes its target kind.
 */
export class Expression extends BaseOperable {
  readonly type = "Expression";
  readonly key: string;
  readonly kind: Kind;
  readonly name = undefined;
  readonly args: readonly Operable[];

  constructor(
    readonly operator: OperatorName,
    args: readonly FeatureLike[],
    readonly target?: Kind
  ) {
    super();
    const spec = OPERATORS[operator];
    this.args = args.map(toOperable);
    if (this.args.length < spec.minArity || this.args.length > spec.maxArity) {
      throw new GrammarError(
        `Invalid number of arguments for ${operator}: ${this.args.length}`,
        operator
      );
    }
    const suffix = target === undefined ? "" : `:${target.key}`;
    this.key = `${operator}(${this.args.map((arg) => arg.key).join(",")})${suffix}`;
    this.kind = inferKind(operator, this.args, target, () => this.toString());
  }

  get spec(): OperatorSpec {
    return OPERATORS[this.operator];
  }

  get operable(): Operable {
    return this;
  }

  get children(): readonly Feature[] {
    return this.args;
  }

  /**
   * Turn an aggregate into a window function.
   */
  over(
    partition: readonly FeatureLike[] = [],
    ordering: readonly OrderingSpec[] = [],
    frame?: WindowFrame
  ): Window {
    return new Window(this, partition, ordering, frame);
  }

  accept(visitor: FeatureVisitor): void {
    visitor.visitExpression(this);
  }

  toString(): string {
    const spec = this.spec;
    const nested = (arg: Operable): string =>
      arg.type === "Expression" && arg.spec.shape !== "function" ? `(${arg})` : arg.toString();
    switch (spec.shape) {
      case "infix":
        return `${nested(this.args[0])} ${spec.symbol} ${nested(this.args[1])}`;
      case "prefix":
        return `${spec.symbol} ${nested(this.args[0])}`;
      case "postfix":
        return `${nested(this.args[0])} ${spec.symbol}`;
      case "function": {
        if (this.operator === "cast" && this.target) {
          return `cast(${this.args[0]}, ${this.target})`;
        }
        const args = this.args.length ? this.args.join(", ") : "*";
        return `${spec.symbol}(${args})`;
      }
    }
  }
}

function inferKind(
  operator: OperatorName,
  args: readonly Operable[],
  target: Kind | undefined,
  repr: () => string
): Kind {
  const spec = OPERATORS[operator];
  switch (spec.family) {
    case "arithmetic":
      return widest(args.map((arg) => KindFamilies.numeric.ensure(arg.kind)));
    case "comparison": {
      const kinds = args.map((arg) => arg.kind);
      const numeric = kinds.every((kind) => KindFamilies.numeric.match(kind));
      if (numeric || kinds.every((kind) => kind.equals(kinds[0]))) return Kinds.boolean;
      throw new GrammarError(
        `Incompatible operand kinds (${kinds.join(", ")}) in ${repr()}`,
        repr()
      );
    }
    case "logical":
      for (const arg of args) Kinds.boolean.ensure(arg.kind);
      return Kinds.boolean;
    case "nullity":
      return Kinds.boolean;
    case "aggregate":
      if (operator === "count") return Kinds.integer;
      return widest(args.map((arg) => KindFamilies.numeric.ensure(arg.kind)));
    case "math": {
      const kinds = args.map((arg) => KindFamilies.numeric.ensure(arg.kind));
      return operator === "abs" ? widest(kinds) : Kinds.integer;
    }
    case "temporal":
      for (const arg of args) KindFamilies.temporal.ensure(arg.kind);
      return Kinds.integer;
    case "cast":
      if (target === undefined) {
        throw new GrammarError(`Missing target kind in ${repr()}`, repr());
      }
      return target;
  }
}

// ---------------------------------------------------------------------------
// ORDERING
// ---------------------------------------------------------------------------

export type Direction = "ascending" | "descending";

const DIRECTION_TOKENS: Readonly<Record<string, Direction>> = {
  asc: "ascending",
  ascending: "ascending",
  desc: "descending",
  descending: "descending",
};

/**
 * Parse a direction token case-insensitively (asc, ascending, desc, descending).
 */
export function parseDirection(token: string): Direction {
  const direction = DIRECTION_TOKENS[token.toLowerCase()];
  if (direction === undefined) {
    throw new GrammarError(`Invalid direction: ${token}`, token);
  }
  return direction;
}

export type OrderingSpec = Feature | Ordering | string | readonly [Feature, string];

function isOrderingPair(spec: unknown): spec is readonly [Feature, string] {
  return (
    Array.isArray(spec) &&
    spec.length === 2 &&
    isFeature(spec[0]) &&
    typeof spec[1] === "string"
  );
}

export class Ordering implements Structural {
  readonly key: string;

  constructor(readonly feature: Operable, readonly direction: Direction = "ascending") {
    this.key = `${feature.key} ${direction}`;
  }

  /**
   * Normalize a flat mix of bare features, features followed by a direction
   * token, (feature, direction) pairs and orderings.
   *
   * @example
   * ```typescript
   * Ordering.make([score, "desc", [level, "asc"], name]);
   * ```
   */
  static make(specs: readonly OrderingSpec[]): Ordering[] {
    const result: Ordering[] = [];
    for (let i = 0; i < specs.length; i++) {
      const spec = specs[i];
      if (spec instanceof Ordering) {
        result.push(spec);
      } else if (isFeature(spec)) {
        const next = specs[i + 1];
        if (typeof next === "string") {
          result.push(new Ordering(spec.operable, parseDirection(next)));
          i++;
        } else {
          result.push(new Ordering(spec.operable));
        }
      } else if (isOrderingPair(spec)) {
        result.push(new Ordering(spec[0].operable, parseDirection(spec[1])));
      } else {
        throw new GrammarError("Expecting pair of feature and direction", String(spec));
      }
    }
    return result;
  }

  get hash(): number {
    return fnv1a(this.key);
  }

  equals(other: Ordering): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return `${this.feature} ${this.direction}`;
  }
}

// ---------------------------------------------------------------------------
// WINDOW
// ---------------------------------------------------------------------------

export type FrameMode = "rows" | "groups" | "range";

/**
 * A frame boundary: "unbounded" (preceding as start, following as end),
 * "current" row, or a signed offset (negative precedes the current row).
 */
export type FrameBound = "unbounded" | "current" | number;

export interface WindowFrame {
  readonly mode: FrameMode;
  readonly start: FrameBound;
  readonly end: FrameBound;
}

function boundOffset(bound: FrameBound, unbounded: number): number {
  if (bound === "unbounded") return unbounded;
  if (bound === "current") return 0;
  return bound;
}

export function frameKey(frame: WindowFrame): string {
  return `${frame.mode}:${frame.start}:${frame.end}`;
}

/**
 * An aggregate evaluated over a partition of rows instead of a group.
 */
export class Window extends BaseOperable {
  readonly type = "Window";
  readonly key: string;
  readonly kind: Kind;
  readonly name = undefined;
  readonly partition: readonly Operable[];
  readonly ordering: readonly Ordering[];

  constructor(
    readonly fn: Expression,
    partition: readonly FeatureLike[] = [],
    ordering: readonly OrderingSpec[] = [],
    readonly frame?: WindowFrame
  ) {
    super();
    if (fn.spec.family !== "aggregate") {
      throw new GrammarError(`${fn} is not a window function`, fn.toString());
    }
    this.partition = partition.map(toOperable);
    this.ordering = Ordering.make(ordering);
    if (frame) {
      const start = boundOffset(frame.start, -Infinity);
      const end = boundOffset(frame.end, Infinity);
      if (start > end) {
        throw new GrammarError(`Invalid window frame ${frameKey(frame)}`, frameKey(frame));
      }
    }
    this.kind = fn.kind;
    this.key = [
      `Window(${fn.key}`,
      this.partition.map((p) => p.key).join(","),
      this.ordering.map((o) => o.key).join(","),
      `${frame ? frameKey(frame) : ""})`,
    ].join("|");
  }

  get operable(): Operable {
    return this;
  }

  get children(): readonly Feature[] {
    return [this.fn, ...this.partition, ...this.ordering.map((o) => o.feature)];
  }

  accept(visitor: FeatureVisitor): void {
    visitor.visitWindow(this);
  }

  toString(): string {
    const parts: string[] = [];
    if (this.partition.length) parts.push(`partition(${this.partition.join(", ")})`);
    if (this.ordering.length) parts.push(`orderby(${this.ordering.join(", ")})`);
    if (this.frame) parts.push(`frame(${frameKey(this.frame)})`);
    return `${this.fn}.over(${parts.join(", ")})`;
  }
}

export type Operable = Literal | Element | Expression | Window;
export type Feature = Aliased | Operable;

// ---------------------------------------------------------------------------
// DISSECTION & VALIDATION
// ---------------------------------------------------------------------------

/**
 * All sub-features of the given features, including the features themselves.
 */
export function dissect(features: Iterable<Feature>): NodeSet<Feature> {
  const result = new NodeSet<Feature>();
  const stack = [...features];
  while (stack.length) {
    const feature = stack.pop();
    if (feature === undefined || result.has(feature)) continue;
    result.add(feature);
    stack.push(...feature.children);
  }
  return result;
}

export function elementsOf(features: Iterable<Feature>): NodeSet<Element> {
  const result = new NodeSet<Element>();
  for (const feature of dissect(features)) {
    if (feature.type === "Element") result.add(feature);
  }
  return result;
}

export function columnsOf(features: Iterable<Feature>): Column[] {
  return elementsOf(features).toArray().filter(isColumn);
}

function isAggregate(feature: Feature): boolean {
  return feature.type === "Expression" && feature.spec.family === "aggregate";
}

/** Aggregates and windows. */
export function isCumulative(feature: Feature): boolean {
  return feature.type === "Window" || isAggregate(feature);
}

export function containsCumulative(feature: Feature): boolean {
  return dissect([feature]).toArray().some(isCumulative);
}

export function containsWindow(feature: Feature): boolean {
  return dissect([feature]).toArray().some((f) => f.type === "Window");
}

/**
 * Whether the feature contains an aggregate outside of any window.
 */
export function containsAggregate(feature: Feature): boolean {
  if (isAggregate(feature)) return true;
  if (feature.type === "Window") return false;
  return feature.children.some(containsAggregate);
}

export function ensurePredicate(feature: Feature): Operable {
  if (!Kinds.boolean.match(feature.kind)) {
    throw new GrammarError(`${feature} is not a predicate`, feature.toString());
  }
  return feature.operable;
}

export function ensureNotCumulative(feature: Feature): void {
  if (containsCumulative(feature)) {
    throw new GrammarError(`${feature} contains an aggregate or window`, feature.toString());
  }
}

export function ensureNoWindow(feature: Feature): void {
  if (containsWindow(feature)) {
    throw new GrammarError(`${feature} contains a window`, feature.toString());
  }
}

export function ensureSubset(
  features: Iterable<Feature>,
  superset: NodeSet<Element>,
  owner: string
): void {
  for (const feature of features) {
    for (const element of elementsOf([feature])) {
      if (!superset.has(element)) {
        throw new GrammarError(
          `${feature} not a subset of ${owner} features`,
          feature.toString()
        );
      }
    }
  }
}

// ---------------------------------------------------------------------------
// PREDICATE FACTORS
// ---------------------------------------------------------------------------

/**
 * Read-only mapping from a table to the sub-predicate that exclusively
 * constrains it.
 */
export class Factors {
  static readonly EMPTY = new Factors(new NodeMap<Table, Operable>());

  private constructor(private readonly byTable: NodeMap<Table, Operable>) {}

  static of(table: Table, predicate: Operable): Factors {
    return new Factors(new NodeMap<Table, Operable>([[table, predicate]]));
  }

  get size(): number {
    return this.byTable.size;
  }

  get tables(): Table[] {
    return [...this.byTable.keys()];
  }

  get(table: Table): Operable | undefined {
    return this.byTable.get(table);
  }

  entries(): Array<[Table, Operable]> {
    return [...this.byTable.entries()];
  }

  /** Per-table union; tables on both sides are merged conjunctively. */
  and(other: Factors): Factors {
    return this.merge(other, "and");
  }

  /** Per-table union; tables on both sides are merged disjunctively. */
  or(other: Factors): Factors {
    return this.merge(other, "or");
  }

  equals(other: Factors): boolean {
    if (this.size !== other.size) return false;
    return this.entries().every(([table, predicate]) => {
      const counterpart = other.get(table);
      return counterpart !== undefined && counterpart.equals(predicate);
    });
  }

  toString(): string {
    return `{${this.entries().map(([t, p]) => `${t}: ${p}`).join(", ")}}`;
  }

  private merge(other: Factors, operator: "and" | "or"): Factors {
    const result = new NodeMap<Table, Operable>(this.byTable);
    for (const [table, predicate] of other.byTable) {
      const existing = result.get(table);
      result.set(table, existing === undefined ? predicate : combine(existing, predicate, operator));
    }
    return new Factors(result);
  }
}

function combine(left: Operable, right: Operable, operator: "and" | "or"): Operable {
  return left.equals(right) ? left : new Expression(operator, [left, right]);
}

function tablesOf(feature: Feature): NodeSet<Table> {
  return new NodeSet<Table>(columnsOf([feature]).map((column) => column.table));
}

function computeFactors(predicate: Operable): Factors {
  if (!Kinds.boolean.match(predicate.kind)) return Factors.EMPTY;
  const tables = tablesOf(predicate).toArray();
  const primitive = tables.length === 1 ? Factors.of(tables[0], predicate) : Factors.EMPTY;
  if (predicate.type !== "Expression") return primitive;
  switch (predicate.operator) {
    case "and":
      return predicate.args[0].factors.and(predicate.args[1].factors);
    case "or":
      return tables.length === 1
        ? primitive
        : predicate.args[0].factors.or(predicate.args[1].factors);
    default:
      return primitive;
  }
}

/**
 * Disjunction of the given predicates ordered by their repr, or undefined when
 * there are none.
 */
export function disjunction(predicates: Iterable<Operable>): Operable | undefined {
  const sorted = [...predicates].sort((a, b) => {
    const left = a.toString();
    const right = b.toString();
    return left < right ? -1 : left > right ? 1 : 0;
  });
  if (sorted.length === 0) return undefined;
  return sorted.reduce((acc, predicate) => new Expression("or", [acc, predicate]));
}
