/**
 * SQL text backend.
 *
 * Sources and features both compile to SQL fragments. Unmapped tables fall back
 * to their quoted schema name; literals are inlined with kind-specific
 * encodings.
 *
 * @example
 * ```typescript
 * const parser = new SqlParser({ sources: [[student, '"student"']] });
 * parser.compile(student.select(student.get("surname")).where(student.get("score").lt(2)));
 * // SELECT "student"."surname" FROM "student" WHERE "student"."score" < 2
 * ```
 */

import { z } from "zod";
import { parseOptions } from "./config";
import { UnsupportedError } from "./errors";
import {
  Direction,
  Element,
  FrameBound,
  OperatorName,
  OPERATORS,
  WindowFrame,
} from "./feature";
import { JoinKind, Rows, SetKind, Table } from "./frame";
import { isNativeArray, Kind, KindFamilies, Native } from "./kind";
import { OrderingSymbol, Visitor, VisitorOptions } from "./parser";

// ---------------------------------------------------------------------------
// OPTIONS
// ---------------------------------------------------------------------------

export const SqlDialectSchema = z
  .object({
    /** Identifier quote character */
    quote: z.string().length(1).default('"'),
    /** "plain" renders LEFT JOIN, "outer" renders LEFT OUTER JOIN */
    joins: z.enum(["plain", "outer"]).default("plain"),
    inequality: z.enum(["!=", "<>"]).default("!="),
  })
  .strict();

export type SqlDialect = z.output<typeof SqlDialectSchema>;

export interface SqlParserOptions extends VisitorOptions<string, string> {
  dialect?: z.input<typeof SqlDialectSchema>;
}

// ---------------------------------------------------------------------------
// LEXICAL HELPERS
// ---------------------------------------------------------------------------

/**
 * Split SQL text on whitespace that is outside quotes, parentheses and
 * brackets.
 */
export function topLevelTokens(text: string, quotes = `'"`): string[] {
  const tokens: string[] = [];
  let current = "";
  let depth = 0;
  let quote: string | undefined;
  for (const char of text) {
    if (quote !== undefined) {
      current += char;
      if (char === quote) quote = undefined;
      continue;
    }
    if (quotes.includes(char)) {
      quote = char;
    } else if (char === "(" || char === "[") {
      depth++;
    } else if (char === ")" || char === "]") {
      depth--;
    } else if (depth === 0 && /\s/.test(char)) {
      if (current) tokens.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  if (current) tokens.push(current);
  return tokens;
}

const TYPED_LITERAL = /^(DATE|TIMESTAMP)$/;
const QUERY = /^\s*SELECT\b/;

const JOIN_KEYWORDS: Record<JoinKind, { plain: string; outer: string }> = {
  inner: { plain: "JOIN", outer: "JOIN" },
  left: { plain: "LEFT JOIN", outer: "LEFT OUTER JOIN" },
  right: { plain: "RIGHT JOIN", outer: "RIGHT OUTER JOIN" },
  full: { plain: "FULL JOIN", outer: "FULL OUTER JOIN" },
  cross: { plain: "CROSS JOIN", outer: "CROSS JOIN" },
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

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

function formatDate(value: Date): string {
  return `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
}

function formatTimestamp(value: Date): string {
  const time = `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`;
  const millis = value.getUTCMilliseconds();
  const fraction = millis ? `.${pad(millis * 1000, 6)}` : "";
  return `${formatDate(value)} ${time}${fraction}`;
}

// ---------------------------------------------------------------------------
// PARSER
// ---------------------------------------------------------------------------

export class SqlParser extends Visitor<string, string> {
  readonly dialect: SqlDialect;

  constructor(options: SqlParserOptions = {}) {
    super(options);
    this.dialect = parseOptions(SqlDialectSchema, options.dialect ?? {}, "dialect");
  }

  quote(identifier: string): string {
    const q = this.dialect.quote;
    return `${q}${identifier.split(q).join(q + q)}${q}`;
  }

  /** Single word, parenthesized text or a typed literal. */
  isAtomic(text: string): boolean {
    const tokens = topLevelTokens(text, `'${this.dialect.quote}`);
    if (tokens.length === 1) return true;
    return tokens.length === 2 && TYPED_LITERAL.test(tokens[0]) && tokens[1].startsWith("'");
  }

  private operand(text: string): string {
    return this.isAtomic(text) ? text : `(${text})`;
  }

  private subquery(text: string): string {
    return QUERY.test(text) ? `(${text})` : text;
  }

  /** Join operand: atomic sources and `x AS y` references stay bare. */
  private joinOperand(text: string): string {
    if (QUERY.test(text)) return `(${text})`;
    const tokens = topLevelTokens(text, `'${this.dialect.quote}`);
    if (tokens.length === 1 || (tokens.length === 3 && tokens[1] === "AS")) return text;
    return `(${text})`;
  }

  protected resolveTable(table: Table): string {
    const provision = this.resolveSource(table);
    return provision.provisioned ? provision.symbol : this.quote(table.schema.name);
  }

  // -- sources --------------------------------------------------------------

  protected generateReference(instance: string, name: string): readonly [string, string] {
    const handle = this.quote(name);
    const wrapped = this.isAtomic(instance) ? instance : `(${instance})`;
    return [`${wrapped} AS ${handle}`, handle];
  }

  protected generateJoin(
    left: string,
    right: string,
    condition: string | undefined,
    kind: JoinKind
  ): string {
    const keyword = JOIN_KEYWORDS[kind][this.dialect.joins];
    const join = `${this.subquery(left)} ${keyword} ${this.joinOperand(right)}`;
    return condition === undefined ? join : `${join} ON ${condition}`;
  }

  protected generateSet(left: string, right: string, kind: SetKind): string {
    return `${left} ${SET_KEYWORDS[kind]} ${right}`;
  }

  protected generateQuery(
    source: string,
    features: readonly string[],
    where: string | undefined,
    groupby: readonly string[],
    having: string | undefined,
    orderby: readonly OrderingSymbol<string>[],
    rows: Rows | undefined
  ): string {
    const clauses = [`SELECT ${features.join(", ")}`, `FROM ${this.subquery(source)}`];
    if (where !== undefined) clauses.push(`WHERE ${where}`);
    if (groupby.length) clauses.push(`GROUP BY ${groupby.join(", ")}`);
    if (having !== undefined) clauses.push(`HAVING ${having}`);
    if (orderby.length) {
      clauses.push(`ORDER BY ${orderby.map(([f, d]) => `${f} ${ORDER_KEYWORDS[d]}`).join(", ")}`);
    }
    if (rows !== undefined) {
      clauses.push(rows.offset ? `LIMIT ${rows.offset}, ${rows.count}` : `LIMIT ${rows.count}`);
    }
    return clauses.join(" ");
  }

  // -- features -------------------------------------------------------------

  protected generateElement(origin: string, element: Element): string {
    return `${origin}.${this.quote(element.name)}`;
  }

  protected generateAlias(feature: string, name: string): string {
    return `${feature} AS ${this.quote(name)}`;
  }

  protected generateLiteral(value: Native, kind: Kind): string {
    switch (kind.family) {
      case "Boolean":
        return value === true ? "TRUE" : "FALSE";
      case "Integer":
      case "Float":
      case "Decimal":
        return String(value);
      case "String":
        return `'${String(value).split("'").join("''")}'`;
      case "Date":
        if (value instanceof Date) return `DATE '${formatDate(value)}'`;
        break;
      case "Timestamp":
        if (value instanceof Date) return `TIMESTAMP '${formatTimestamp(value)}'`;
        break;
      case "Array":
        if (KindFamilies.array.match(kind) && isNativeArray(value)) {
          const element = kind.element;
          return `ARRAY[${value.map((item) => this.generateLiteral(item, element)).join(", ")}]`;
        }
        break;
    }
    throw new UnsupportedError(`Unsupported literal kind: ${kind}`, kind.toString());
  }

  protected generateExpression(
    operator: OperatorName,
    args: readonly string[],
    kind: Kind
  ): string {
    const spec = OPERATORS[operator];
    switch (operator) {
      case "eq":
        return `${this.operand(args[0])} = ${this.operand(args[1])}`;
      case "ne":
        return `${this.operand(args[0])} ${this.dialect.inequality} ${this.operand(args[1])}`;
      case "cast": {
        const type = TYPE_NAMES[kind.family];
        if (type === undefined) {
          throw new UnsupportedError(`Unsupported cast target: ${kind}`, kind.toString());
        }
        return `CAST(${args[0]} AS ${type})`;
      }
      case "count":
        return `count(${args.length ? args[0] : "*"})`;
    }
    switch (spec.shape) {
      case "infix":
        return `${this.operand(args[0])} ${spec.symbol} ${this.operand(args[1])}`;
      case "prefix":
        return `${spec.symbol} ${this.operand(args[0])}`;
      case "postfix":
        return `${this.operand(args[0])} ${spec.symbol}`;
      case "function":
        return `${spec.symbol}(${args.join(", ")})`;
    }
  }

  protected generateWindow(
    fn: string,
    partition: readonly string[],
    ordering: readonly OrderingSymbol<string>[],
    frame: WindowFrame | undefined
  ): string {
    const parts: string[] = [];
    if (partition.length) parts.push(`PARTITION BY ${partition.join(", ")}`);
    if (ordering.length) {
      parts.push(`ORDER BY ${ordering.map(([f, d]) => `${f} ${ORDER_KEYWORDS[d]}`).join(", ")}`);
    }
    if (frame !== undefined) {
      const start = renderBound(frame.start, "PRECEDING");
      const end = renderBound(frame.end, "FOLLOWING");
      parts.push(`${frame.mode.toUpperCase()} BETWEEN ${start} AND ${end}`);
    }
    return `${fn} OVER (${parts.join(" ")})`;
  }
}

function renderBound(bound: FrameBound, unbounded: "PRECEDING" | "FOLLOWING"): string {
  if (bound === "unbounded") return `UNBOUNDED ${unbounded}`;
  if (bound === "current" || bound === 0) return "CURRENT ROW";
  return bound < 0 ? `${-bound} PRECEDING` : `${bound} FOLLOWING`;
}
