/**
 * Generic parser framework.
 *
 * A Visitor walks Frame and Feature trees post-order and hands already
 * compiled children to backend `generate*` hooks. Compiled results travel on a
 * per-scope symbol stack held by a Container; every scope must be fully
 * consumed before it is left, which catches symbol leaks as hard errors.
 *
 * Backends parametrize the visitor with their source symbol type S (e.g. SQL
 * text, a table-producing closure) and feature symbol type F.
 */

import { ContainerError, UnprovisionedError } from "./errors";
import {
  Aliased,
  Column,
  columnsOf,
  Direction,
  disjunction,
  Element,
  Expression,
  Feature,
  FeatureVisitor,
  Literal,
  Operable,
  OperatorName,
  Window,
  WindowFrame,
} from "./feature";
import {
  Join,
  JoinKind,
  Query,
  Reference,
  Rows,
  SetKind,
  SetOperation,
  Source,
  SourceVisitor,
  Table,
} from "./frame";
import { Kind, Native } from "./kind";
import { createNoopLogger, Logger } from "./logging";
import { NodeMap, NodeSet } from "./structural";

// ---------------------------------------------------------------------------
// SYMBOLS
// ---------------------------------------------------------------------------

export type SymbolEntry<S, F> =
  | { type: "source"; value: S }
  | { type: "feature"; value: F };

/** A compiled ordering term. */
export type OrderingSymbol<F> = readonly [F, Direction];

/**
 * Result of looking up an explicit backend symbol for a node.
 */
export type Provision<T> = { provisioned: true; symbol: T } | { provisioned: false };

export const UNPROVISIONED: Provision<never> = { provisioned: false };

export function provisioned<T>(symbol: T): Provision<T> {
  return { provisioned: true, symbol };
}

/**
 * Post-order accumulator of compiled child results.
 */
export class Symbols<S, F> {
  private readonly stack: SymbolEntry<S, F>[] = [];

  get size(): number {
    return this.stack.length;
  }

  /** A scope is dirty while it holds unconsumed symbols. */
  get dirty(): boolean {
    return this.stack.length > 0;
  }

  push(entry: SymbolEntry<S, F>): void {
    this.stack.push(entry);
  }

  pop(): SymbolEntry<S, F> {
    const entry = this.stack.pop();
    if (entry === undefined) {
      throw new ContainerError("Empty context");
    }
    return entry;
  }

  popSource(): S {
    const entry = this.pop();
    if (entry.type !== "source") {
      throw new ContainerError("Expecting a source symbol");
    }
    return entry.value;
  }

  popFeature(): F {
    const entry = this.pop();
    if (entry.type !== "feature") {
      throw new ContainerError("Expecting a feature symbol");
    }
    return entry.value;
  }
}

// ---------------------------------------------------------------------------
// TABLE BOOKKEEPING
// ---------------------------------------------------------------------------

/**
 * What a single table contributes to a scope: the columns referenced and the
 * predicate factors that apply to it.
 */
export class Segment {
  readonly fields = new NodeSet<Column>();
  readonly factors = new NodeSet<Operable>();

  /** Referenced columns ordered by name. */
  get columns(): Column[] {
    return this.fields.toArray().sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /** Disjunction of all factors, or undefined when the table is unfiltered. */
  get predicate(): Operable | undefined {
    return disjunction(this.factors);
  }
}

export class Tables {
  private readonly segments = new NodeMap<Table, Segment>();

  segment(table: Table): Segment {
    let segment = this.segments.get(table);
    if (segment === undefined) {
      segment = new Segment();
      this.segments.set(table, segment);
    }
    return segment;
  }

  /** Register every column the features reference. */
  select(...features: Feature[]): void {
    for (const column of columnsOf(features)) {
      this.segment(column.table).fields.add(column);
    }
  }

  /** Register a row filter: its columns plus its per-table factors. */
  filter(predicate: Operable): void {
    this.select(predicate);
    for (const [table, factor] of predicate.factors.entries()) {
      this.segment(table).factors.add(factor);
    }
  }
}

export class Context<S, F> {
  readonly symbols = new Symbols<S, F>();
  readonly tables = new Tables();
  /** Resolvable origin symbols of tables and references visited in this scope */
  readonly origins = new NodeMap<Source, S>();
}

/**
 * Stack of scopes. The bottom scope lives as long as the container.
 */
export class Container<S, F> {
  private readonly contexts: Context<S, F>[] = [new Context<S, F>()];

  get context(): Context<S, F> {
    return this.contexts[this.contexts.length - 1];
  }

  get depth(): number {
    return this.contexts.length;
  }

  enter(): void {
    this.contexts.push(new Context<S, F>());
  }

  exit(): void {
    if (this.contexts.length === 1) {
      throw new ContainerError("Unbalanced context exit");
    }
    if (this.context.symbols.dirty) {
      throw new ContainerError("Context not fetched");
    }
    this.contexts.pop();
  }

  /**
   * Run the body in a fresh nested scope. The scope is discarded without the
   * dirty check when the body throws.
   */
  scope<T>(body: () => T): T {
    this.enter();
    let result: T;
    try {
      result = body();
    } catch (error) {
      this.contexts.pop();
      throw error;
    }
    this.exit();
    return result;
  }

  /** Remove and return the single remaining symbol of the current scope. */
  fetch(): SymbolEntry<S, F> {
    const entry = this.context.symbols.pop();
    if (this.context.symbols.dirty) {
      throw new ContainerError("Premature fetch");
    }
    return entry;
  }
}

// ---------------------------------------------------------------------------
// VISITOR
// ---------------------------------------------------------------------------

export interface VisitorOptions<S, F> {
  /** Explicit symbols for whole sources */
  sources?: Iterable<readonly [Source, S]>;
  /** Explicit symbols for individual features */
  features?: Iterable<readonly [Feature, F]>;
  logger?: Logger;
}

export abstract class Visitor<S, F> implements SourceVisitor, FeatureVisitor {
  protected readonly container = new Container<S, F>();
  protected readonly sources: NodeMap<Source, S>;
  protected readonly features: NodeMap<Feature, F>;
  protected readonly logger: Logger;
  private readonly memo = new Map<string, F>();

  constructor(options: VisitorOptions<S, F> = {}) {
    this.sources = new NodeMap<Source, S>(options.sources);
    this.features = new NodeMap<Feature, F>(options.features);
    this.logger = options.logger ?? createNoopLogger();
  }

  protected get context(): Context<S, F> {
    return this.container.context;
  }

  // -- entry points ---------------------------------------------------------

  fetch(): SymbolEntry<S, F> {
    return this.container.fetch();
  }

  fetchSource(): S {
    const entry = this.fetch();
    if (entry.type !== "source") {
      throw new ContainerError("Expecting a source symbol");
    }
    return entry.value;
  }

  fetchFeature(): F {
    const entry = this.fetch();
    if (entry.type !== "feature") {
      throw new ContainerError("Expecting a feature symbol");
    }
    return entry.value;
  }

  /** Accept the source and fetch its compiled symbol. */
  compile(source: Source): S {
    const started = Date.now();
    source.accept(this);
    const result = this.fetchSource();
    this.logger.debug("Compiled source", {
      node: source.toString(),
      durationMs: Date.now() - started,
    });
    return result;
  }

  compileFeature(feature: Feature): F {
    feature.accept(this);
    return this.fetchFeature();
  }

  // -- resolution -----------------------------------------------------------

  protected resolveSource(source: Source): Provision<S> {
    const symbol = this.sources.get(source);
    return symbol === undefined ? UNPROVISIONED : provisioned(symbol);
  }

  protected resolveFeature(feature: Feature): Provision<F> {
    const symbol = this.features.get(feature);
    return symbol === undefined ? UNPROVISIONED : provisioned(symbol);
  }

  /**
   * Symbol addressing a table. Backends with a natural default for unmapped
   * tables override this.
   */
  protected resolveTable(table: Table): S {
    const provision = this.resolveSource(table);
    if (!provision.provisioned) {
      throw new UnprovisionedError(`Unknown mapping for ${table}`, table.toString());
    }
    return provision.symbol;
  }

  protected resolveOrigin(origin: Source): S {
    const known = this.context.origins.get(origin);
    if (known !== undefined) return known;
    if (origin.type === "Table") return this.resolveTable(origin);
    const provision = this.resolveSource(origin);
    if (!provision.provisioned) {
      throw new UnprovisionedError(`Unknown mapping for ${origin}`, origin.toString());
    }
    return provision.symbol;
  }

  // -- symbol helpers -------------------------------------------------------

  protected pushSource(value: S): void {
    this.context.symbols.push({ type: "source", value });
  }

  protected pushFeature(value: F): void {
    this.context.symbols.push({ type: "feature", value });
  }

  /** Compile a source within the current scope and consume its symbol. */
  generateSource(source: Source): S {
    source.accept(this);
    return this.context.symbols.popSource();
  }

  /** Compile a feature (memoized per visitor) and consume its symbol. */
  generateFeature(feature: Feature): F {
    const cached = this.memo.get(feature.key);
    if (cached !== undefined) return cached;
    feature.accept(this);
    const result = this.context.symbols.popFeature();
    this.memo.set(feature.key, result);
    return result;
  }

  // -- bypass ---------------------------------------------------------------

  /**
   * Run the default translation, then replace its pushed result with an
   * explicit source symbol when one is provisioned.
   */
  protected bypassSource(source: Source, translate: () => void): void {
    translate();
    const provision = this.resolveSource(source);
    if (!provision.provisioned) return;
    this.context.symbols.popSource();
    this.pushSource(provision.symbol);
    this.logger.debug(`Overriding result for ${source}`, { node: source.toString() });
  }

  protected bypassFeature(feature: Feature, translate: () => void): void {
    translate();
    const provision = this.resolveFeature(feature);
    if (!provision.provisioned) return;
    this.context.symbols.popFeature();
    this.pushFeature(provision.symbol);
    this.logger.debug(`Overriding result for ${feature}`, { node: feature.toString() });
  }

  // -- sources --------------------------------------------------------------

  visitTable(table: Table): void {
    const origin = this.resolveTable(table);
    this.context.origins.set(table, origin);
    const segment = this.context.tables.segment(table);
    const fields = segment.columns.map((column) => this.generateFeature(column));
    const factor = segment.predicate;
    const predicate = factor === undefined ? undefined : this.generateFeature(factor);
    this.pushSource(this.generateTable(origin, fields, predicate));
  }

  visitReference(reference: Reference): void {
    const instance = this.generateSource(reference.instance);
    const [origin, handle] = this.generateReference(instance, reference.name);
    this.context.origins.set(reference, handle);
    this.pushSource(origin);
  }

  visitJoin(join: Join): void {
    this.bypassSource(join, () => {
      if (join.condition) this.context.tables.filter(join.condition);
      const left = this.generateSource(join.left);
      const right = this.generateSource(join.right);
      const condition = join.condition ? this.generateFeature(join.condition) : undefined;
      this.pushSource(this.generateJoin(left, right, condition, join.kind));
    });
  }

  visitSet(set: SetOperation): void {
    this.bypassSource(set, () => {
      const left = this.generateSource(set.left);
      const right = this.generateSource(set.right);
      this.pushSource(this.generateSet(left, right, set.kind));
    });
  }

  visitQuery(query: Query): void {
    this.bypassSource(query, () => {
      const result = this.container.scope(() => {
        const tables = this.context.tables;
        tables.select(...query.features);
        if (query.prefilter) tables.filter(query.prefilter);
        if (query.postfilter) tables.select(query.postfilter);
        tables.select(...query.grouping);
        tables.select(...query.ordering.map((o) => o.feature));

        const source = this.generateSource(query.source);
        const features = query.features.map((f) => this.generateFeature(f));
        const where = query.prefilter ? this.generateFeature(query.prefilter) : undefined;
        const groupby = query.grouping.map((g) => this.generateFeature(g));
        const having = query.postfilter ? this.generateFeature(query.postfilter) : undefined;
        const orderby = query.ordering.map(
          (o): OrderingSymbol<F> => [this.generateFeature(o.feature), o.direction]
        );
        return this.generateQuery(source, features, where, groupby, having, orderby, query.rows);
      });
      this.pushSource(result);
    });
  }

  // -- features -------------------------------------------------------------

  visitAliased(feature: Aliased): void {
    this.pushFeature(this.generateAlias(this.generateFeature(feature.operable), feature.name));
  }

  visitLiteral(feature: Literal): void {
    this.pushFeature(this.generateLiteral(feature.value, feature.kind));
  }

  visitElement(element: Element): void {
    const provision = this.resolveFeature(element);
    if (provision.provisioned) {
      this.pushFeature(provision.symbol);
      return;
    }
    this.pushFeature(this.generateElement(this.resolveOrigin(element.origin), element));
  }

  visitExpression(expression: Expression): void {
    this.bypassFeature(expression, () => {
      const args = expression.args.map((arg) => this.generateFeature(arg));
      this.pushFeature(this.generateExpression(expression.operator, args, expression.kind));
    });
  }

  visitWindow(window: Window): void {
    this.bypassFeature(window, () => {
      const fn = this.generateFeature(window.fn);
      const partition = window.partition.map((p) => this.generateFeature(p));
      const ordering = window.ordering.map(
        (o): OrderingSymbol<F> => [this.generateFeature(o.feature), o.direction]
      );
      this.pushFeature(this.generateWindow(fn, partition, ordering, window.frame));
    });
  }

  // -- backend hooks --------------------------------------------------------

  /**
   * Table-level code given the referenced fields and the pushed-down row
   * predicate. Defaults to the bare origin.
   */
  protected generateTable(origin: S, fields: readonly F[], predicate: F | undefined): S {
    return origin;
  }

  /** Returns the referenced origin and the bare handle features resolve to. */
  protected abstract generateReference(instance: S, name: string): readonly [S, S];

  protected abstract generateJoin(
    left: S,
    right: S,
    condition: F | undefined,
    kind: JoinKind
  ): S;

  protected abstract generateSet(left: S, right: S, kind: SetKind): S;

  protected abstract generateQuery(
    source: S,
    features: readonly F[],
    where: F | undefined,
    groupby: readonly F[],
    having: F | undefined,
    orderby: readonly OrderingSymbol<F>[],
    rows: Rows | undefined
  ): S;

  protected abstract generateElement(origin: S, element: Element): F;

  protected abstract generateAlias(feature: F, name: string): F;

  protected abstract generateLiteral(value: Native, kind: Kind): F;

  protected abstract generateExpression(
    operator: OperatorName,
    args: readonly F[],
    kind: Kind
  ): F;

  protected abstract generateWindow(
    fn: F,
    partition: readonly F[],
    ordering: readonly OrderingSymbol<F>[],
    frame: WindowFrame | undefined
  ): F;
}
