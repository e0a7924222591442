/**
 * Typed SQL-expression backend built on drizzle-orm.
 *
 * Produces the same statement shape as the SQL text backend, but as drizzle
 * `SQL` objects: identifiers go through `sql.identifier` and literal values are
 * bound as parameters instead of being inlined.
 */

import { Param, SQL, sql } from "drizzle-orm";
import { SQLiteSyncDialect } from "drizzle-orm/sqlite-core";
import { UnsupportedError } from "./errors";
import { Direction, Element, FrameBound, OperatorName, OPERATORS, WindowFrame } from "./feature";
import { JoinKind, Rows, SetKind, Table } from "./frame";
import { isNativeArray, Kind, KindFamilies, Native } from "./kind";
import { OrderingSymbol, Visitor, VisitorOptions } from "./parser";

export type DrizzleParserOptions = VisitorOptions<SQL, SQL>;

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

const JOIN_KEYWORDS: Record<JoinKind, string> = {
  inner: "JOIN",
  left: "LEFT JOIN",
  right: "RIGHT JOIN",
  full: "FULL JOIN",
  cross: "CROSS JOIN",
};

const SET_KEYWORDS: Record<SetKind, string> = {
  union: "UNION",
  intersection: "INTERSECT",
  difference: "EXCEPT",
};

const ORDER_KEYWORDS: Record<Direction, string> = {
  ascending: "ASC",
  descending: "DESC",
};

const TYPE_NAMES: Readonly<Record<string, string>> = {
  Boolean: "BOOLEAN",
  Integer: "BIGINT",
  Float: "DOUBLE",
  Decimal: "DECIMAL",
  String: "VARCHAR",
  Date: "DATE",
  Timestamp: "TIMESTAMP",
};

const dialect = new SQLiteSyncDialect();

/**
 * Render a fragment to SQLite text with positional `?` parameters.
 */
export function toQuery(fragment: SQL): CompiledQuery {
  const { sql: text, params } = dialect.sqlToQuery(fragment);
  return { sql: text, params };
}

const separator = sql`, `;

export class DrizzleParser extends Visitor<SQL, SQL> {
  /** Fragments that need parentheses when nested as an operand */
  private readonly compound = new WeakSet<SQL>();
  private readonly queries = new WeakSet<SQL>();
  private readonly joins = new WeakSet<SQL>();

  constructor(options: DrizzleParserOptions = {}) {
    super(options);
  }

  private mark(fragment: SQL, kind: WeakSet<SQL>): SQL {
    kind.add(fragment);
    return fragment;
  }

  private operand(fragment: SQL): SQL {
    return this.compound.has(fragment) ? sql`(${fragment})` : fragment;
  }

  private subquery(fragment: SQL): SQL {
    return this.queries.has(fragment) ? sql`(${fragment})` : fragment;
  }

  private ordering(orderby: readonly OrderingSymbol<SQL>[]): SQL {
    return sql.join(
      orderby.map(([feature, direction]) => sql`${feature} ${sql.raw(ORDER_KEYWORDS[direction])}`),
      separator
    );
  }

  protected resolveTable(table: Table): SQL {
    const provision = this.resolveSource(table);
    return provision.provisioned ? provision.symbol : sql`${sql.identifier(table.schema.name)}`;
  }

  // -- sources --------------------------------------------------------------

  protected generateReference(instance: SQL, name: string): readonly [SQL, SQL] {
    const handle = sql`${sql.identifier(name)}`;
    const nested = this.queries.has(instance) || this.joins.has(instance);
    const wrapped = nested ? sql`(${instance})` : instance;
    return [sql`${wrapped} AS ${handle}`, handle];
  }

  protected generateJoin(left: SQL, right: SQL, condition: SQL | undefined, kind: JoinKind): SQL {
    const operand = this.joins.has(right) ? sql`(${right})` : this.subquery(right);
    const join = sql`${this.subquery(left)} ${sql.raw(JOIN_KEYWORDS[kind])} ${operand}`;
    return this.mark(condition === undefined ? join : sql`${join} ON ${condition}`, this.joins);
  }

  protected generateSet(left: SQL, right: SQL, kind: SetKind): SQL {
    return this.mark(sql`${left} ${sql.raw(SET_KEYWORDS[kind])} ${right}`, this.queries);
  }

  protected generateQuery(
    source: SQL,
    features: readonly SQL[],
    where: SQL | undefined,
    groupby: readonly SQL[],
    having: SQL | undefined,
    orderby: readonly OrderingSymbol<SQL>[],
    rows: Rows | undefined
  ): SQL {
    const clauses: SQL[] = [
      sql`SELECT ${sql.join([...features], separator)}`,
      sql`FROM ${this.subquery(source)}`,
    ];
    if (where !== undefined) clauses.push(sql`WHERE ${where}`);
    if (groupby.length) clauses.push(sql`GROUP BY ${sql.join([...groupby], separator)}`);
    if (having !== undefined) clauses.push(sql`HAVING ${having}`);
    if (orderby.length) clauses.push(sql`ORDER BY ${this.ordering(orderby)}`);
    if (rows !== undefined) {
      const limit = rows.offset ? `${rows.offset}, ${rows.count}` : `${rows.count}`;
      clauses.push(sql`LIMIT ${sql.raw(limit)}`);
    }
    return this.mark(sql.join(clauses, sql` `), this.queries);
  }

  // -- features -------------------------------------------------------------

  protected generateElement(origin: SQL, element: Element): SQL {
    return sql`${origin}.${sql.identifier(element.name)}`;
  }

  protected generateAlias(feature: SQL, name: string): SQL {
    return sql`${feature} AS ${sql.identifier(name)}`;
  }

  protected generateLiteral(value: Native, kind: Kind): SQL {
    if (KindFamilies.array.match(kind)) {
      if (!isNativeArray(value)) {
        throw new UnsupportedError(`Unsupported literal kind: ${kind}`, kind.toString());
      }
      const element = kind.element;
      return sql`ARRAY[${sql.join(
        value.map((item) => this.generateLiteral(item, element)),
        separator
      )}]`;
    }
    if (!KindFamilies.primitive.match(kind)) {
      throw new UnsupportedError(`Unsupported literal kind: ${kind}`, kind.toString());
    }
    return sql`${new Param(value)}`;
  }

  protected generateExpression(operator: OperatorName, args: readonly SQL[], kind: Kind): SQL {
    const spec = OPERATORS[operator];
    switch (operator) {
      case "eq":
        return this.mark(sql`${this.operand(args[0])} = ${this.operand(args[1])}`, this.compound);
      case "cast": {
        const type = TYPE_NAMES[kind.family];
        if (type === undefined) {
          throw new UnsupportedError(`Unsupported cast target: ${kind}`, kind.toString());
        }
        return sql`CAST(${args[0]} AS ${sql.raw(type)})`;
      }
      case "count":
        return args.length ? sql`count(${args[0]})` : sql`count(*)`;
    }
    const symbol = sql.raw(spec.symbol);
    switch (spec.shape) {
      case "infix":
        return this.mark(
          sql`${this.operand(args[0])} ${symbol} ${this.operand(args[1])}`,
          this.compound
        );
      case "prefix":
        return this.mark(sql`${symbol} ${this.operand(args[0])}`, this.compound);
      case "postfix":
        return this.mark(sql`${this.operand(args[0])} ${symbol}`, this.compound);
      case "function":
        return sql`${symbol}(${sql.join([...args], separator)})`;
    }
  }

  protected generateWindow(
    fn: SQL,
    partition: readonly SQL[],
    ordering: readonly OrderingSymbol<SQL>[],
    frame: WindowFrame | undefined
  ): SQL {
    const parts: SQL[] = [];
    if (partition.length) parts.push(sql`PARTITION BY ${sql.join([...partition], separator)}`);
    if (ordering.length) parts.push(sql`ORDER BY ${this.ordering(ordering)}`);
    if (frame !== undefined) {
      const start = bound(frame.start, "PRECEDING");
      const end = bound(frame.end, "FOLLOWING");
      parts.push(sql.raw(`${frame.mode.toUpperCase()} BETWEEN ${start} AND ${end}`));
    }
    return this.mark(sql`${fn} OVER (${sql.join(parts, sql` `)})`, this.compound);
  }
}

function bound(value: FrameBound, unbounded: "PRECEDING" | "FOLLOWING"): string {
  if (value === "unbounded") return `UNBOUNDED ${unbounded}`;
  if (value === "current" || value === 0) return "CURRENT ROW";
  return value < 0 ? `${-value} PRECEDING` : `${value} FOLLOWING`;
}
