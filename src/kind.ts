/**
 * Kind system: the DSL's own value types.
 *
 * Primitive kinds are process-wide singletons ranked for arithmetic widening;
 * compound kinds (Array, Map, Struct) are equal and hashed by their parameters.
 * Casting is backed by zod schemas and reports failures as CastError.
 */

import { z } from "zod";
import { CastError, GrammarError } from "./errors";
import { fnv1a, Structural } from "./structural";

// ---------------------------------------------------------------------------
// NATIVE VALUES
// ---------------------------------------------------------------------------

export type Scalar = boolean | number | string | Date;

export type Native = Scalar | NativeArray | NativeMap | NativeStruct;

export interface NativeArray extends ReadonlyArray<Native> {}

export interface NativeMap extends ReadonlyMap<Native, Native> {}

export interface NativeStruct {
  readonly [name: string]: Native;
}

export function isNativeArray(value: Native): value is NativeArray {
  return Array.isArray(value);
}

export function isNativeMap(value: Native): value is NativeMap {
  return value instanceof Map;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Canonical, type-tagged encoding of a native value used in structural keys.
 */
export function nativeKey(value: Native): string {
  if (value instanceof Date) return `date:${value.toISOString()}`;
  if (isNativeArray(value)) return `[${value.map(nativeKey).join(",")}]`;
  if (isNativeMap(value)) {
    const pairs = [...value].map(([k, v]) => `${nativeKey(k)}=>${nativeKey(v)}`);
    return `map{${pairs.join(",")}}`;
  }
  if (typeof value === "object") {
    const pairs = Object.entries(value).map(
      ([k, v]) => `${JSON.stringify(k)}:${nativeKey(v)}`
    );
    return `{${pairs.join(",")}}`;
  }
  if (typeof value === "string") return JSON.stringify(value);
  return `${typeof value}:${String(value)}`;
}

/**
 * Human-readable rendering of a native value for reprs and messages.
 */
export function formatNative(value: Native): string {
  if (value instanceof Date) return value.toISOString();
  if (isNativeArray(value)) return `[${value.map(formatNative).join(", ")}]`;
  if (isNativeMap(value)) {
    const pairs = [...value].map(([k, v]) => `${formatNative(k)}: ${formatNative(v)}`);
    return `{${pairs.join(", ")}}`;
  }
  if (typeof value === "object") {
    const pairs = Object.entries(value).map(([k, v]) => `${k}: ${formatNative(v)}`);
    return `{${pairs.join(", ")}}`;
  }
  if (typeof value === "string") return `'${value}'`;
  return String(value);
}

function describe(value: unknown): string {
  if (typeof value === "string") return `'${value}'`;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object" && value !== null) {
    return Array.isArray(value) ? "array" : value.constructor.name;
  }
  return String(value);
}

// ---------------------------------------------------------------------------
// KIND CLASSES
// ---------------------------------------------------------------------------

export type PrimitiveName =
  | "Boolean"
  | "Integer"
  | "Float"
  | "Decimal"
  | "String"
  | "Date"
  | "Timestamp";

export type CompoundName = "Array" | "Map" | "Struct";

abstract class BaseKind implements Structural {
  abstract readonly key: string;
  /** Type tag; two kinds with the same family are instances of the same type */
  abstract readonly family: PrimitiveName | CompoundName;
  abstract cast(value: unknown): Native;
  abstract toString(): string;

  get hash(): number {
    return fnv1a(this.key);
  }

  equals(other: Kind): boolean {
    return this.key === other.key;
  }

  /** Exact-type test: same primitive singleton, or same compound type. */
  match(other: Kind): boolean {
    return this.family === other.family;
  }

  ensure(other: Kind): Kind {
    if (!this.match(other)) {
      throw new GrammarError(
        `${other} not an instance of a ${this.family}`,
        other.toString()
      );
    }
    return other;
  }
}

const toUtcMidnight = (value: Date): Date =>
  new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate()));

export class PrimitiveKind extends BaseKind {
  static readonly BOOLEAN = new PrimitiveKind(
    "Boolean",
    0,
    z.coerce.boolean(),
    (value) => typeof value === "boolean"
  );
  static readonly INTEGER = new PrimitiveKind(
    "Integer",
    1,
    z.coerce.number().finite().transform(Math.trunc),
    (value) => typeof value === "number" && Number.isInteger(value)
  );
  static readonly FLOAT = new PrimitiveKind(
    "Float",
    2,
    z.coerce.number(),
    (value) => typeof value === "number"
  );
  // Decimal and Date have no distinct native representation so they are never
  // inferred; they are only reached through explicit kinds.
  static readonly DECIMAL = new PrimitiveKind(
    "Decimal",
    1,
    z.coerce.number().finite(),
    () => false
  );
  static readonly STRING = new PrimitiveKind(
    "String",
    1,
    z.coerce.string(),
    (value) => typeof value === "string"
  );
  static readonly DATE = new PrimitiveKind(
    "Date",
    2,
    z.coerce.date().transform(toUtcMidnight),
    () => false
  );
  static readonly TIMESTAMP = new PrimitiveKind(
    "Timestamp",
    1,
    z.coerce.date(),
    (value) => value instanceof Date
  );

  readonly key: string;
  readonly family: PrimitiveName;

  private constructor(
    readonly name: PrimitiveName,
    readonly rank: number,
    private readonly schema: z.ZodType<Scalar, z.ZodTypeDef, unknown>,
    private readonly accepts: (value: unknown) => boolean
  ) {
    super();
    this.key = name;
    this.family = name;
  }

  get numeric(): boolean {
    return this.name === "Integer" || this.name === "Float" || this.name === "Decimal";
  }

  /** Whether a native value is naturally of this kind (used by reflect). */
  describes(value: unknown): boolean {
    return this.accepts(value);
  }

  cast(value: unknown): Scalar {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      throw new CastError(
        `Cannot cast ${describe(value)} to ${this.name}`,
        this.name,
        value
      );
    }
    return result.data;
  }

  toString(): string {
    return this.name;
  }
}

export class ArrayKind extends BaseKind {
  readonly family = "Array";
  readonly key: string;

  constructor(readonly element: Kind) {
    super();
    this.key = `Array<${element.key}>`;
  }

  cast(value: unknown): NativeArray {
    if (!Array.isArray(value)) {
      throw new CastError(`Cannot cast ${describe(value)} to ${this}`, this.key, value);
    }
    const items: unknown[] = value;
    return items.map((item) => this.element.cast(item));
  }

  toString(): string {
    return `Array(${this.element})`;
  }
}

export class MapKind extends BaseKind {
  readonly family = "Map";
  readonly key: string;

  constructor(readonly keyKind: Kind, readonly valueKind: Kind) {
    super();
    this.key = `Map<${keyKind.key},${valueKind.key}>`;
  }

  cast(value: unknown): NativeMap {
    const entries = mappingEntries(value);
    if (!entries) {
      throw new CastError(`Cannot cast ${describe(value)} to ${this}`, this.key, value);
    }
    return new Map<Native, Native>(
      entries.map(([k, v]) => [this.keyKind.cast(k), this.valueKind.cast(v)])
    );
  }

  toString(): string {
    return `Map(${this.keyKind}, ${this.valueKind})`;
  }
}

export interface StructElement {
  readonly name: string;
  readonly kind: Kind;
}

export class StructKind extends BaseKind {
  readonly family = "Struct";
  readonly key: string;

  constructor(readonly elements: readonly StructElement[]) {
    super();
    const names = new Set<string>();
    for (const element of elements) {
      if (names.has(element.name)) {
        throw new GrammarError(`Duplicate struct element ${element.name}`);
      }
      names.add(element.name);
    }
    this.key = `Struct<${elements.map((e) => `${e.name}:${e.kind.key}`).join(",")}>`;
  }

  cast(value: unknown): NativeStruct {
    const entries = mappingEntries(value);
    if (!entries) {
      throw new CastError(`Cannot cast ${describe(value)} to ${this}`, this.key, value);
    }
    const lookup = new Map<unknown, unknown>(entries);
    const result: Record<string, Native> = {};
    for (const element of this.elements) {
      if (!lookup.has(element.name)) {
        throw new CastError(
          `Missing struct element ${element.name} for ${this}`,
          this.key,
          value
        );
      }
      result[element.name] = element.kind.cast(lookup.get(element.name));
    }
    return result;
  }

  toString(): string {
    return `Struct(${this.elements.map((e) => `${e.name}: ${e.kind}`).join(", ")})`;
  }
}

export type Kind = PrimitiveKind | ArrayKind | MapKind | StructKind;

function mappingEntries(value: unknown): Array<[unknown, unknown]> | undefined {
  if (value instanceof Map) {
    const entries: Array<[unknown, unknown]> = [];
    value.forEach((v: unknown, k: unknown) => entries.push([k, v]));
    return entries;
  }
  if (isPlainObject(value)) return Object.entries(value);
  return undefined;
}

// ---------------------------------------------------------------------------
// KIND CONSTANTS & FAMILIES
// ---------------------------------------------------------------------------

export const Kinds = {
  boolean: PrimitiveKind.BOOLEAN,
  integer: PrimitiveKind.INTEGER,
  float: PrimitiveKind.FLOAT,
  decimal: PrimitiveKind.DECIMAL,
  string: PrimitiveKind.STRING,
  date: PrimitiveKind.DATE,
  timestamp: PrimitiveKind.TIMESTAMP,
  array: (element: Kind): ArrayKind => new ArrayKind(element),
  map: (key: Kind, value: Kind): MapKind => new MapKind(key, value),
  struct: (elements: Record<string, Kind>): StructKind =>
    new StructKind(Object.entries(elements).map(([name, kind]) => ({ name, kind }))),
} as const;

export const PRIMITIVES: readonly PrimitiveKind[] = [
  Kinds.boolean,
  Kinds.integer,
  Kinds.float,
  Kinds.decimal,
  Kinds.string,
  Kinds.date,
  Kinds.timestamp,
];

const PRIMITIVES_BY_RANK = [...PRIMITIVES].sort((a, b) => a.rank - b.rank);

/**
 * An abstract kind type (e.g. Numeric) that concrete kinds can be tested against.
 */
export interface KindFamily<K extends Kind = Kind> {
  readonly name: string;
  match(kind: Kind): kind is K;
  ensure(kind: Kind): K;
}

function family<K extends Kind>(
  name: string,
  test: (kind: Kind) => kind is K
): KindFamily<K> {
  return {
    name,
    match: test,
    ensure(kind: Kind): K {
      if (!test(kind)) {
        throw new GrammarError(`${kind} not an instance of a ${name}`, kind.toString());
      }
      return kind;
    },
  };
}

export const KindFamilies = {
  any: family("Any", (kind): kind is Kind => true),
  primitive: family("Primitive", (kind): kind is PrimitiveKind => kind instanceof PrimitiveKind),
  numeric: family(
    "Numeric",
    (kind): kind is PrimitiveKind => kind instanceof PrimitiveKind && kind.numeric
  ),
  temporal: family(
    "Temporal",
    (kind): kind is PrimitiveKind => kind === Kinds.date || kind === Kinds.timestamp
  ),
  compound: family(
    "Compound",
    (kind): kind is ArrayKind | MapKind | StructKind => !(kind instanceof PrimitiveKind)
  ),
  array: family("Array", (kind): kind is ArrayKind => kind instanceof ArrayKind),
  map: family("Map", (kind): kind is MapKind => kind instanceof MapKind),
  struct: family("Struct", (kind): kind is StructKind => kind instanceof StructKind),
} as const;

/**
 * Widest of the given primitive kinds by rank; the first one wins on ties.
 */
export function widest(kinds: readonly PrimitiveKind[]): PrimitiveKind {
  if (kinds.length === 0) throw new GrammarError("No kinds to widen");
  return kinds.reduce((best, kind) => (kind.rank > best.rank ? kind : best));
}

// ---------------------------------------------------------------------------
// REFLECTION
// ---------------------------------------------------------------------------

/**
 * Infer the kind of a native value.
 *
 * Scalars resolve to the first primitive (by ascending rank) describing them.
 * Sequences resolve to an Array of their first element's kind. Mappings with
 * uniform key and value kinds resolve to a Map, otherwise to a Struct when all
 * keys are strings.
 */
export function reflect(value: unknown): Kind {
  for (const primitive of PRIMITIVES_BY_RANK) {
    if (primitive.describes(value)) return primitive;
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    if (items.length === 0) {
      throw new GrammarError("Cannot reflect an empty sequence");
    }
    return new ArrayKind(reflect(items[0]));
  }

  const entries = mappingEntries(value);
  if (entries) {
    if (entries.length === 0) {
      throw new GrammarError("Cannot reflect an empty mapping");
    }
    const keyKinds = entries.map(([k]) => reflect(k));
    const valueKinds = entries.map(([, v]) => reflect(v));
    const uniform = (kinds: Kind[]): boolean => kinds.every((k) => k.equals(kinds[0]));
    if (uniform(keyKinds) && uniform(valueKinds)) {
      return new MapKind(keyKinds[0], valueKinds[0]);
    }
    if (keyKinds.every((k) => k === Kinds.string)) {
      return new StructKind(
        entries.map(([k], i) => ({ name: String(k), kind: valueKinds[i] }))
      );
    }
    throw new GrammarError(`Cannot reflect heterogeneous mapping ${describe(value)}`);
  }

  throw new GrammarError(`Cannot reflect value ${describe(value)}`);
}
