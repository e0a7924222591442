/**
 * Closure backend: compiles queries into plain functions over in-memory
 * columnar data.
 *
 * Every source becomes a Tabulizer (catalog in, data set out) and every feature
 * a Columnizer (batch in, column of values out). Each closure captures its
 * already compiled children, so a compiled query is a single function that
 * replays filtering, grouping, ordering, projection and limiting without any
 * external engine.
 */

import { Columnar, ColumnRef, Value, valueKey } from "./columnar";
import { UnprovisionedError, UnsupportedError } from "./errors";
import { Direction, Element, OperatorName, WindowFrame } from "./feature";
import { JoinKind, Rows, SetKind, Source, Table } from "./frame";
import { Kind, Kinds, Native } from "./kind";
import { OrderingSymbol, Visitor, VisitorOptions } from "./parser";

// ---------------------------------------------------------------------------
// TYPES
// ---------------------------------------------------------------------------

/** Data sets addressed by table (schema) name. */
export type Catalog = ReadonlyMap<string, Columnar>;

export type Tabulizer = (catalog: Catalog) => Columnar;

/**
 * Rows a feature is evaluated on. With groups present, a column holds one value
 * per group instead of one per row.
 */
export interface Batch {
  readonly data: Columnar;
  readonly groups?: readonly (readonly number[])[];
}

export interface Columnizer {
  (batch: Batch): Value[];
  /** Whether the values aggregate their input rows */
  readonly aggregate: boolean;
  /** Output column name */
  readonly label?: string;
}

export interface ClosureParserOptions
  extends Omit<VisitorOptions<Tabulizer, Columnizer>, "sources"> {
  /** Explicit data (or data producers) for sources */
  sources?: Iterable<readonly [Source, Tabulizer | Columnar]>;
}

export function catalog(data: Readonly<Record<string, Columnar>>): Catalog {
  return new Map(Object.entries(data));
}

function columnizer(
  evaluate: (batch: Batch) => Value[],
  aggregate: boolean,
  label?: string
): Columnizer {
  return Object.assign(evaluate, { aggregate, label });
}

function scan(name: string): Tabulizer {
  return (data) => {
    const found = data.get(name);
    if (found === undefined) {
      throw new UnprovisionedError(`Unknown table ${name}`, name);
    }
    return found;
  };
}

function width(batch: Batch): number {
  return batch.groups ? batch.groups.length : batch.data.length;
}

function range(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}

// ---------------------------------------------------------------------------
// VALUE SEMANTICS
// ---------------------------------------------------------------------------

/**
 * Total order over values: nulls first, then by natural order of the type.
 */
export function compareValues(left: Value, right: Value): number {
  if (left === null || right === null) {
    return left === right ? 0 : left === null ? -1 : 1;
  }
  if (left instanceof Date && right instanceof Date) {
    return left.getTime() - right.getTime();
  }
  if (typeof left === "number" && typeof right === "number") return left - right;
  if (typeof left === "boolean" && typeof right === "boolean") {
    return Number(left) - Number(right);
  }
  const a = typeof left === "string" ? left : valueKey([left]);
  const b = typeof right === "string" ? right : valueKey([right]);
  return a < b ? -1 : a > b ? 1 : 0;
}

function numeric(value: Native, operator: OperatorName): number {
  if (typeof value !== "number") {
    throw new UnsupportedError(`Non-numeric operand for ${operator}`, operator);
  }
  return value;
}

function arithmetic(operator: OperatorName, left: number, right: number, kind: Kind): Value {
  switch (operator) {
    case "add":
      return left + right;
    case "sub":
      return left - right;
    case "mul":
      return left * right;
    case "div":
      if (right === 0) return null;
      return kind === Kinds.integer ? Math.trunc(left / right) : left / right;
    case "mod":
      return right === 0 ? null : left % right;
    default:
      throw new UnsupportedError(`Unsupported expression: ${operator}`, operator);
  }
}

function comparison(operator: OperatorName, order: number): boolean {
  switch (operator) {
    case "eq":
      return order === 0;
    case "ne":
      return order !== 0;
    case "lt":
      return order < 0;
    case "le":
      return order <= 0;
    case "gt":
      return order > 0;
    case "ge":
      return order >= 0;
    default:
      throw new UnsupportedError(`Unsupported expression: ${operator}`, operator);
  }
}

/** Row-wise application of a non-aggregate operator using three-valued logic. */
function apply(operator: OperatorName, args: readonly Value[], kind: Kind): Value {
  switch (operator) {
    case "and":
      if (args.some((v) => v === false)) return false;
      return args.some((v) => v === null) ? null : true;
    case "or":
      if (args.some((v) => v === true)) return true;
      return args.some((v) => v === null) ? null : false;
    case "isNull":
      return args[0] === null;
    case "notNull":
      return args[0] !== null;
  }
  if (args.some((v) => v === null)) return null;
  const present = args.filter((v): v is Native => v !== null);
  switch (operator) {
    case "not":
      return !present[0];
    case "add":
    case "sub":
    case "mul":
    case "div":
    case "mod":
      return arithmetic(operator, numeric(present[0], operator), numeric(present[1], operator), kind);
    case "eq":
    case "ne":
    case "lt":
    case "le":
    case "gt":
    case "ge":
      return comparison(operator, compareValues(present[0], present[1]));
    case "abs":
      return Math.abs(numeric(present[0], operator));
    case "ceil":
      return Math.ceil(numeric(present[0], operator));
    case "floor":
      return Math.floor(numeric(present[0], operator));
    case "year": {
      const value = present[0];
      if (!(value instanceof Date)) {
        throw new UnsupportedError(`Non-temporal operand for ${operator}`, operator);
      }
      return value.getUTCFullYear();
    }
    case "cast":
      return kind.cast(present[0]);
    default:
      throw new UnsupportedError(`Unsupported expression: ${operator}`, operator);
  }
}

function aggregate(operator: OperatorName, values: readonly Value[] | undefined, size: number): Value {
  if (operator === "count") {
    return values === undefined ? size : values.filter((v) => v !== null).length;
  }
  const present = (values ?? []).filter((v): v is Native => v !== null);
  if (present.length === 0) return null;
  switch (operator) {
    case "min":
      return present.reduce((best, v) => (compareValues(v, best) < 0 ? v : best));
    case "max":
      return present.reduce((best, v) => (compareValues(v, best) > 0 ? v : best));
    case "sum":
      return present.reduce<number>((acc, v) => acc + numeric(v, operator), 0);
    case "avg":
      return present.reduce<number>((acc, v) => acc + numeric(v, operator), 0) / present.length;
    default:
      throw new UnsupportedError(`Unsupported aggregate: ${operator}`, operator);
  }
}

/**
 * Stable ordering of positions by the given key columns.
 */
function sortPositions(
  positions: readonly number[],
  keys: readonly (readonly [readonly Value[], Direction])[]
): number[] {
  return [...positions].sort((a, b) => {
    for (const [values, direction] of keys) {
      const order = compareValues(values[a], values[b]);
      if (order !== 0) return direction === "ascending" ? order : -order;
    }
    return a - b;
  });
}

/** Row positions grouped by equal key tuples, in order of first appearance. */
function partitionRows(count: number, keys: readonly (readonly Value[])[]): number[][] {
  const groups = new Map<string, number[]>();
  for (let i = 0; i < count; i++) {
    const key = valueKey(keys.map((column) => column[i]));
    const group = groups.get(key);
    if (group) group.push(i);
    else groups.set(key, [i]);
  }
  return [...groups.values()];
}

// ---------------------------------------------------------------------------
// PARSER
// ---------------------------------------------------------------------------

export class ClosureParser extends Visitor<Tabulizer, Columnizer> {
  constructor(options: ClosureParserOptions = {}) {
    const sources = [...(options.sources ?? [])].map(
      ([source, data]): [Source, Tabulizer] => [
        source,
        data instanceof Columnar ? () => data : data,
      ]
    );
    super({ ...options, sources });
  }

  protected resolveTable(table: Table): Tabulizer {
    const provision = this.resolveSource(table);
    const load = provision.provisioned ? provision.symbol : scan(table.schema.name);
    const label = table.label;
    return (data) => load(data).qualify(label);
  }

  // -- sources --------------------------------------------------------------

  protected generateReference(instance: Tabulizer, name: string): readonly [Tabulizer, Tabulizer] {
    const origin: Tabulizer = (data) => instance(data).qualify(name);
    return [origin, origin];
  }

  protected generateJoin(
    left: Tabulizer,
    right: Tabulizer,
    condition: Columnizer | undefined,
    kind: JoinKind
  ): Tabulizer {
    return (data) => {
      const lhs = left(data);
      const rhs = right(data);
      const li: number[] = [];
      const ri: number[] = [];
      for (let i = 0; i < lhs.length; i++) {
        for (let j = 0; j < rhs.length; j++) {
          li.push(i);
          ri.push(j);
        }
      }
      const product = lhs.take(li).concat(rhs.take(ri));
      if (condition === undefined) return product;

      const mask = condition({ data: product });
      const leftOut: (number | null)[] = [];
      const rightOut: (number | null)[] = [];
      const leftSeen = new Set<number>();
      const rightSeen = new Set<number>();
      mask.forEach((matched, k) => {
        if (matched !== true) return;
        leftOut.push(li[k]);
        rightOut.push(ri[k]);
        leftSeen.add(li[k]);
        rightSeen.add(ri[k]);
      });
      if (kind === "left" || kind === "full") {
        for (let i = 0; i < lhs.length; i++) {
          if (leftSeen.has(i)) continue;
          leftOut.push(i);
          rightOut.push(null);
        }
      }
      if (kind === "right" || kind === "full") {
        for (let j = 0; j < rhs.length; j++) {
          if (rightSeen.has(j)) continue;
          leftOut.push(null);
          rightOut.push(j);
        }
      }
      return lhs.take(leftOut).concat(rhs.take(rightOut));
    };
  }

  protected generateSet(left: Tabulizer, right: Tabulizer, kind: SetKind): Tabulizer {
    return (data) => {
      const lhs = left(data);
      const rhs = right(data);
      const seen = new Set<string>();
      const other = new Set(rhs.rows().map(valueKey));
      const rows: Value[][] = [];
      const candidates = kind === "union" ? [...lhs.rows(), ...rhs.rows()] : lhs.rows();
      for (const row of candidates) {
        const key = valueKey(row);
        if (seen.has(key)) continue;
        if (kind === "intersection" && !other.has(key)) continue;
        if (kind === "difference" && other.has(key)) continue;
        seen.add(key);
        rows.push(row);
      }
      return Columnar.fromRows(lhs.refs, rows);
    };
  }

  protected generateQuery(
    source: Tabulizer,
    features: readonly Columnizer[],
    where: Columnizer | undefined,
    groupby: readonly Columnizer[],
    having: Columnizer | undefined,
    orderby: readonly OrderingSymbol<Columnizer>[],
    rows: Rows | undefined
  ): Tabulizer {
    const grouped =
      groupby.length > 0 ||
      having !== undefined ||
      features.some((f) => f.aggregate) ||
      orderby.some(([f]) => f.aggregate);
    const refs: ColumnRef[] = features.map((f, i) => ({ name: f.label ?? `_${i}` }));

    return (catalog) => {
      let data = source(catalog);
      if (where !== undefined) data = data.filter(where({ data }));

      let batch: Batch = { data };
      if (grouped) {
        let groups: readonly (readonly number[])[] = groupby.length
          ? partitionRows(data.length, groupby.map((g) => g({ data })))
          : [range(data.length)];
        if (having !== undefined) {
          const mask = having({ data, groups });
          groups = groups.filter((_, i) => mask[i] === true);
        }
        batch = { data, groups };
      }

      const keys = orderby.map(
        ([feature, direction]): readonly [Value[], Direction] => [feature(batch), direction]
      );
      let positions = sortPositions(range(width(batch)), keys);
      if (rows !== undefined) {
        positions = positions.slice(rows.offset, rows.offset + rows.count);
      }
      const columns = features.map((feature) => {
        const values = feature(batch);
        return positions.map((i) => values[i]);
      });
      return new Columnar(refs, columns, positions.length);
    };
  }

  // -- features -------------------------------------------------------------

  protected generateElement(origin: Tabulizer, element: Element): Columnizer {
    const qualifier = element.origin.label;
    return columnizer(
      (batch) => {
        const values = batch.data.column(element.name, qualifier);
        if (batch.groups === undefined) return [...values];
        return batch.groups.map((group) => (group.length ? values[group[0]] : null));
      },
      false,
      element.name
    );
  }

  protected generateAlias(feature: Columnizer, name: string): Columnizer {
    return columnizer((batch) => feature(batch), feature.aggregate, name);
  }

  protected generateLiteral(value: Native): Columnizer {
    return columnizer((batch) => new Array<Value>(width(batch)).fill(value), false);
  }

  protected generateExpression(
    operator: OperatorName,
    args: readonly Columnizer[],
    kind: Kind
  ): Columnizer {
    if (["count", "avg", "min", "max", "sum"].includes(operator)) {
      const [argument] = args;
      return columnizer((batch) => {
        const values = argument === undefined ? undefined : argument({ data: batch.data });
        const groups = batch.groups ?? [range(batch.data.length)];
        return groups.map((group) =>
          aggregate(
            operator,
            values && group.map((i) => values[i]),
            group.length
          )
        );
      }, true);
    }
    return columnizer(
      (batch) => {
        const columns = args.map((arg) => arg(batch));
        return range(width(batch)).map((i) =>
          apply(
            operator,
            columns.map((column) => column[i]),
            kind
          )
        );
      },
      args.some((arg) => arg.aggregate)
    );
  }

  protected generateWindow(
    fn: Columnizer,
    partition: readonly Columnizer[],
    ordering: readonly OrderingSymbol<Columnizer>[],
    frame: WindowFrame | undefined
  ): Columnizer {
    if (frame !== undefined && frame.mode !== "rows") {
      throw new UnsupportedError(`Unsupported window frame mode: ${frame.mode}`, frame.mode);
    }
    return columnizer((batch) => {
      if (batch.groups !== undefined) {
        throw new UnsupportedError("Window over grouped rows", "window");
      }
      const data = batch.data;
      const result = new Array<Value>(data.length).fill(null);
      const keys = ordering.map(
        ([feature, direction]): readonly [Value[], Direction] => [feature(batch), direction]
      );
      const partitions = partitionRows(
        data.length,
        partition.map((p) => p(batch))
      );
      for (const members of partitions) {
        const sorted = sortPositions(members, keys);
        sorted.forEach((row, position) => {
          const rows = frameRows(sorted, position, keys, frame);
          result[row] = fn({ data, groups: [rows] })[0];
        });
      }
      return result;
    }, false);
  }
}

/**
 * Row positions of the window frame around the given position. Without an
 * explicit frame the window spans the whole partition, or runs up to the last
 * peer of the current row when ordered.
 */
function frameRows(
  sorted: readonly number[],
  position: number,
  keys: readonly (readonly [readonly Value[], Direction])[],
  frame: WindowFrame | undefined
): number[] {
  if (frame === undefined) {
    if (keys.length === 0) return [...sorted];
    const peer = (other: number): boolean =>
      keys.every(([values]) => compareValues(values[sorted[position]], values[other]) === 0);
    let end = position;
    while (end + 1 < sorted.length && peer(sorted[end + 1])) end++;
    return sorted.slice(0, end + 1);
  }
  const offset = (bound: WindowFrame["start"], unbounded: number): number => {
    if (bound === "unbounded") return unbounded;
    if (bound === "current") return position;
    return position + bound;
  };
  const start = Math.max(0, offset(frame.start, 0));
  const end = Math.min(sorted.length - 1, offset(frame.end, sorted.length - 1));
  return sorted.slice(start, end + 1);
}
