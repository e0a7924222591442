/**
 * Frame algebra: the relational structure of a query.
 *
 * Sources are immutable, structurally keyed nodes. Every DSL method returns a
 * new node and validates eagerly, so an invalid query never reaches a parser.
 */

import { GrammarError } from "./errors";
import {
  Column,
  containsAggregate,
  Element,
  elementsOf,
  ensureNoWindow,
  ensureNotCumulative,
  ensurePredicate,
  ensureSubset,
  Feature,
  FeatureLike,
  Operable,
  Ordering,
  OrderingSpec,
  toFeature,
  toOperable,
} from "./feature";
import { namedField, Schema, SchemaField } from "./schema";
import { fnv1a, NodeSet, Structural } from "./structural";

// ---------------------------------------------------------------------------
// TYPES
// ---------------------------------------------------------------------------

export type SourceType = "Table" | "Reference" | "Join" | "Set" | "Query";

export type JoinKind = "inner" | "left" | "right" | "full" | "cross";

export type SetKind = "union" | "intersection" | "difference";

/** Row limit: `count` rows after skipping `offset`. */
export interface Rows {
  readonly count: number;
  readonly offset: number;
}

export interface SourceVisitor {
  visitTable(source: Table): void;
  visitReference(source: Reference): void;
  visitJoin(source: Join): void;
  visitSet(source: SetOperation): void;
  visitQuery(source: Query): void;
}

/**
 * Build a schema out of a list of features. Aliases and elements keep their
 * names; anonymous expressions and repeated names are named by position
 * (`_0`, `_1`, ...).
 */
function schemaOf(name: string, features: readonly Feature[]): Schema {
  const taken = new Set<string>();
  const entries = features.map((feature, i): [string, SchemaField] => {
    let label = feature.name ?? `_${i}`;
    if (taken.has(label)) label = `_${i}`;
    while (taken.has(label)) label = `_${label}`;
    taken.add(label);
    return [label, namedField(feature.kind, label)];
  });
  return new Schema(name, entries);
}

// ---------------------------------------------------------------------------
// SOURCE BASE
// ---------------------------------------------------------------------------

abstract class BaseSource implements Structural {
  abstract readonly type: SourceType;
  abstract readonly key: string;
  abstract get schema(): Schema;
  abstract get features(): readonly Feature[];
  abstract accept(visitor: SourceVisitor): void;
  abstract toString(): string;

  /** Short name used when rendering features bound to this source. */
  get label(): string {
    return this.toString();
  }

  /** The underlying instance; references resolve to what they wrap. */
  get instance(): Source {
    return this.self;
  }

  /** This source as a query statement. */
  get statement(): Query {
    return new Query(this.self);
  }

  protected abstract get self(): Source;

  get hash(): number {
    return fnv1a(this.key);
  }

  equals(other: Source): boolean {
    return this.key === other.key;
  }

  /**
   * Feature for the field declared under the given attribute key or name.
   */
  get(name: string): Element {
    return new Element(this.self, name);
  }

  reference(name?: string): Reference {
    return new Reference(this.self, name);
  }

  select(...features: FeatureLike[]): Query {
    return this.statement.select(...features);
  }

  where(condition: FeatureLike): Query {
    return this.statement.where(condition);
  }

  having(condition: FeatureLike): Query {
    return this.statement.having(condition);
  }

  groupby(...features: FeatureLike[]): Query {
    return this.statement.groupby(...features);
  }

  orderby(...specs: OrderingSpec[]): Query {
    return this.statement.orderby(...specs);
  }

  limit(count: number, offset = 0): Query {
    return this.statement.limit(count, offset);
  }

  join(other: Source, condition?: FeatureLike, kind?: JoinKind): Join {
    return new Join(this.self, other, condition, kind);
  }

  innerJoin(other: Source, condition: FeatureLike): Join {
    return new Join(this.self, other, condition, "inner");
  }

  leftJoin(other: Source, condition: FeatureLike): Join {
    return new Join(this.self, other, condition, "left");
  }

  rightJoin(other: Source, condition: FeatureLike): Join {
    return new Join(this.self, other, condition, "right");
  }

  fullJoin(other: Source, condition: FeatureLike): Join {
    return new Join(this.self, other, condition, "full");
  }

  crossJoin(other: Source): Join {
    return new Join(this.self, other, undefined, "cross");
  }

  union(other: Source): SetOperation {
    return new SetOperation(this.statement, other.statement, "union");
  }

  intersection(other: Source): SetOperation {
    return new SetOperation(this.statement, other.statement, "intersection");
  }

  difference(other: Source): SetOperation {
    return new SetOperation(this.statement, other.statement, "difference");
  }
}

// ---------------------------------------------------------------------------
// SOURCE VARIANTS
// ---------------------------------------------------------------------------

/** A schema-bound leaf source. Equal to any table with an equal schema. */
export class Table extends BaseSource {
  readonly type = "Table";
  readonly key: string;
  readonly features: readonly Column[];

  constructor(readonly schema: Schema) {
    super();
    this.key = `Table${schema.key}`;
    this.features = schema.fields.map((entry) => new Column(this, entry.name));
  }

  protected get self(): Source {
    return this;
  }

  get label(): string {
    return this.schema.name;
  }

  get(name: string): Column {
    return new Column(this, name);
  }

  accept(visitor: SourceVisitor): void {
    visitor.visitTable(this);
  }

  toString(): string {
    return this.schema.name;
  }
}

export function table(schema: Schema): Table {
  return new Table(schema);
}

const REFERENCE_ALPHABET = "abcdefghijklmnopqrstuvwxyz";

function randomName(length = 8): string {
  let result = "";
  for (let i = 0; i < length; i++) {
    result += REFERENCE_ALPHABET[Math.floor(Math.random() * REFERENCE_ALPHABET.length)];
  }
  return result;
}

/**
 * A named handle on another source. Its features are bound to the reference
 * itself, so two references to one table are distinct origins.
 */
export class Reference extends BaseSource {
  readonly type = "Reference";
  readonly key: string;
  readonly name: string;
  private readonly wrapped: Source;
  private featureCache: readonly Element[] | undefined;

  constructor(instance: Source, name?: string) {
    super();
    this.wrapped = instance.instance;
    this.name = name ?? randomName();
    this.key = `Reference(${this.wrapped.key} AS ${JSON.stringify(this.name)})`;
  }

  protected get self(): Source {
    return this;
  }

  get instance(): Source {
    return this.wrapped;
  }

  get schema(): Schema {
    return this.wrapped.schema;
  }

  get features(): readonly Element[] {
    if (this.featureCache === undefined) {
      this.featureCache = this.schema.fields.map((entry) => new Element(this, entry.name));
    }
    return this.featureCache;
  }

  get label(): string {
    return this.name;
  }

  accept(visitor: SourceVisitor): void {
    visitor.visitReference(this);
  }

  toString(): string {
    return `${this.name}=[${this.wrapped}]`;
  }
}

export class Join extends BaseSource {
  readonly type = "Join";
  readonly key: string;
  readonly kind: JoinKind;
  readonly condition: Operable | undefined;
  private schemaCache: Schema | undefined;

  /**
   * @param kind - defaults to inner with a condition, cross without one
   */
  constructor(
    readonly left: Source,
    readonly right: Source,
    condition?: FeatureLike,
    kind?: JoinKind
  ) {
    super();
    this.kind = kind ?? (condition === undefined ? "cross" : "inner");
    if ((this.kind === "cross") === (condition !== undefined)) {
      throw new GrammarError("Illegal use of condition and join type", this.kind);
    }
    if (condition !== undefined) {
      const predicate = ensurePredicate(toFeature(condition));
      ensureNotCumulative(predicate);
      ensureSubset(
        [predicate],
        elementsOf([...left.features, ...right.features]),
        `${left} and ${right}`
      );
      this.condition = predicate;
    }
    this.key = `Join(${left.key} ${this.kind} ${right.key} ON ${this.condition?.key ?? ""})`;
  }

  protected get self(): Source {
    return this;
  }

  get features(): readonly Feature[] {
    return [...this.left.features, ...this.right.features];
  }

  get schema(): Schema {
    if (this.schemaCache === undefined) {
      this.schemaCache = schemaOf(this.toString(), this.features);
    }
    return this.schemaCache;
  }

  accept(visitor: SourceVisitor): void {
    visitor.visitJoin(this);
  }

  toString(): string {
    const on = this.condition ? ` ON ${this.condition}` : "";
    return `${this.left} ${this.kind.toUpperCase()} JOIN ${this.right}${on}`;
  }
}

/**
 * Union, intersection or difference of two statements with equal schemas.
 */
export class SetOperation extends BaseSource {
  readonly type = "Set";
  readonly key: string;

  constructor(readonly left: Query, readonly right: Query, readonly kind: SetKind) {
    super();
    if (!left.schema.equals(right.schema)) {
      throw new GrammarError(`Incompatible sources: ${left} vs ${right}`, kind);
    }
    this.key = `Set(${left.key} ${kind} ${right.key})`;
  }

  protected get self(): Source {
    return this;
  }

  get schema(): Schema {
    return this.left.schema;
  }

  get features(): readonly Feature[] {
    return this.left.features;
  }

  accept(visitor: SourceVisitor): void {
    visitor.visitSet(this);
  }

  toString(): string {
    return `${this.left} ${this.kind} ${this.right}`;
  }
}

export interface QueryClauses {
  readonly selection?: readonly FeatureLike[];
  readonly prefilter?: FeatureLike;
  readonly grouping?: readonly FeatureLike[];
  readonly postfilter?: FeatureLike;
  readonly ordering?: readonly OrderingSpec[];
  readonly rows?: Rows;
}

/**
 * The generic statement: projection, filtering, grouping, ordering and row
 * limit over a source.
 */
export class Query extends BaseSource {
  readonly type = "Query";
  readonly key: string;
  readonly selection: readonly Feature[];
  readonly prefilter: Operable | undefined;
  readonly grouping: readonly Operable[];
  readonly postfilter: Operable | undefined;
  readonly ordering: readonly Ordering[];
  readonly rows: Rows | undefined;
  private schemaCache: Schema | undefined;

  constructor(readonly source: Source, clauses: QueryClauses = {}) {
    super();
    const superset = elementsOf(source.features);
    const owner = source.toString();

    this.selection = (clauses.selection ?? []).map(toFeature);
    ensureSubset(this.selection, superset, owner);

    if (clauses.prefilter !== undefined) {
      const prefilter = ensurePredicate(toFeature(clauses.prefilter));
      ensureNotCumulative(prefilter);
      ensureSubset([prefilter], superset, owner);
      this.prefilter = prefilter;
    }

    this.grouping = (clauses.grouping ?? []).map(toOperable);
    for (const key of this.grouping) ensureNotCumulative(key);
    ensureSubset(this.grouping, superset, owner);
    this.ensureAggregation();

    if (clauses.postfilter !== undefined) {
      const postfilter = ensurePredicate(toFeature(clauses.postfilter));
      ensureNoWindow(postfilter);
      ensureSubset([postfilter], superset, owner);
      this.postfilter = postfilter;
    }

    this.ordering = Ordering.make(clauses.ordering ?? []);
    ensureSubset(
      this.ordering.map((o) => o.feature),
      superset,
      owner
    );

    if (clauses.rows !== undefined) {
      const { count, offset } = clauses.rows;
      if (!Number.isInteger(count) || count < 0 || !Number.isInteger(offset) || offset < 0) {
        throw new GrammarError(`Invalid rows ${offset}:${count}`, owner);
      }
      this.rows = { count, offset };
    }

    this.key = [
      `Query(${source.key}`,
      `select:${this.selection.map((f) => f.key).join(",")}`,
      `where:${this.prefilter?.key ?? ""}`,
      `groupby:${this.grouping.map((f) => f.key).join(",")}`,
      `having:${this.postfilter?.key ?? ""}`,
      `orderby:${this.ordering.map((o) => o.key).join(",")}`,
      `rows:${this.rows ? `${this.rows.offset}:${this.rows.count}` : ""})`,
    ].join("|");
  }

  /**
   * With grouping, every selected feature that is not a grouping key must
   * contain an aggregate. Constant features are exempt.
   */
  private ensureAggregation(): void {
    if (this.grouping.length === 0) return;
    const grouped = new NodeSet<Operable>(this.grouping);
    const features = this.features.filter((f) => elementsOf([f]).size > 0);
    for (const feature of features) {
      if (!grouped.has(feature.operable) && !containsAggregate(feature)) {
        throw new GrammarError(
          `${feature} is neither grouped nor aggregated`,
          feature.toString()
        );
      }
    }
  }

  protected get self(): Source {
    return this;
  }

  get statement(): Query {
    return this;
  }

  get features(): readonly Feature[] {
    return this.selection.length ? this.selection : this.source.features;
  }

  get schema(): Schema {
    if (this.schemaCache === undefined) {
      this.schemaCache = schemaOf(this.toString(), this.features);
    }
    return this.schemaCache;
  }

  private with(clauses: QueryClauses): Query {
    return new Query(this.source, {
      selection: this.selection,
      prefilter: this.prefilter,
      grouping: this.grouping,
      postfilter: this.postfilter,
      ordering: this.ordering,
      rows: this.rows,
      ...clauses,
    });
  }

  select(...features: FeatureLike[]): Query {
    return this.with({ selection: features });
  }

  /** Add a prefilter, AND-combined with any existing one. */
  where(condition: FeatureLike): Query {
    const predicate = toOperable(condition);
    return this.with({
      prefilter: this.prefilter ? this.prefilter.and(predicate) : predicate,
    });
  }

  /** Add a postfilter, AND-combined with any existing one. */
  having(condition: FeatureLike): Query {
    const predicate = toOperable(condition);
    return this.with({
      postfilter: this.postfilter ? this.postfilter.and(predicate) : predicate,
    });
  }

  groupby(...features: FeatureLike[]): Query {
    return this.with({ grouping: features });
  }

  orderby(...specs: OrderingSpec[]): Query {
    return this.with({ ordering: specs });
  }

  limit(count: number, offset = 0): Query {
    return this.with({ rows: { count, offset } });
  }

  accept(visitor: SourceVisitor): void {
    visitor.visitQuery(this);
  }

  toString(): string {
    let repr = `${this.source}[${this.features.join(", ")}]`;
    if (this.prefilter) repr += `.where(${this.prefilter})`;
    if (this.grouping.length) repr += `.groupby(${this.grouping.join(", ")})`;
    if (this.postfilter) repr += `.having(${this.postfilter})`;
    if (this.ordering.length) repr += `.orderby(${this.ordering.join(", ")})`;
    if (this.rows) repr += `[${this.rows.offset}:${this.rows.count}]`;
    return repr;
  }
}

export type Source = Table | Reference | Join | SetOperation | Query;
