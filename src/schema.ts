/**
 * Schema and Field model.
 *
 * A schema is an ordered list of named fields addressed either by the attribute
 * key it was declared under or by the field's final name. Identity is purely
 * structural: the schema's own name plays no part in equality or hashing.
 */

import { GrammarError } from "./errors";
import { Kind } from "./kind";
import { fnv1a, Structural } from "./structural";

export class Field implements Structural {
  readonly key: string;

  constructor(readonly kind: Kind, readonly name?: string) {
    this.key = `${kind.key}:${name === undefined ? "" : JSON.stringify(name)}`;
  }

  get hash(): number {
    return fnv1a(this.key);
  }

  renamed(name: string): Field {
    return new Field(this.kind, name);
  }

  equals(other: Field): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.name === undefined ? `Field(${this.kind})` : `Field(${this.kind}, '${this.name}')`;
  }
}

export function field(kind: Kind, name?: string): Field {
  return new Field(kind, name);
}

/** A field declaration: either a full Field or just its kind. */
export type FieldSpec = Field | Kind;

/** A named field with a guaranteed final name. */
export interface SchemaField extends Field {
  readonly name: string;
}

function isNamed(candidate: Field): candidate is SchemaField {
  return candidate.name !== undefined;
}

export class Schema implements Structural {
  readonly key: string;
  readonly fields: readonly SchemaField[];
  /** Attribute keys, parallel to `fields` */
  readonly attributes: readonly string[];
  private readonly byAttribute: ReadonlyMap<string, SchemaField>;
  private readonly byName: ReadonlyMap<string, SchemaField>;

  /**
   * Prefer the `schema()` function, which validates inheritance and collisions.
   */
  constructor(
    readonly name: string,
    entries: ReadonlyArray<readonly [string, SchemaField]>
  ) {
    const byName = new Map<string, SchemaField>();
    for (const [, entry] of entries) {
      if (byName.has(entry.name)) {
        throw new GrammarError(
          `Colliding field name ${entry.name} in schema ${name}`,
          name
        );
      }
      byName.set(entry.name, entry);
    }
    this.byName = byName;
    this.byAttribute = new Map<string, SchemaField>(entries);
    this.fields = entries.map(([, entry]) => entry);
    this.attributes = entries.map(([attribute]) => attribute);
    this.key = `(${this.fields.map((entry) => entry.key).join(", ")})`;
  }

  get size(): number {
    return this.fields.length;
  }

  /** Xor of the field hashes; equal schemas hash equally. */
  get hash(): number {
    return this.fields.reduce((acc, entry) => (acc ^ entry.hash) >>> 0, 0);
  }

  equals(other: Schema): boolean {
    return (
      this.fields.length === other.fields.length &&
      this.fields.every((entry, i) => entry.equals(other.fields[i]))
    );
  }

  /**
   * Look up a field by attribute key first, then by its final name.
   */
  get(reference: string): SchemaField {
    const found = this.byAttribute.get(reference) ?? this.byName.get(reference);
    if (!found) {
      throw new GrammarError(`Unknown field ${reference} in schema ${this.name}`, this.name);
    }
    return found;
  }

  has(reference: string): boolean {
    return this.byAttribute.has(reference) || this.byName.has(reference);
  }

  entries(): Array<[string, SchemaField]> {
    return this.fields.map((entry, i): [string, SchemaField] => [this.attributes[i], entry]);
  }

  toString(): string {
    return this.name;
  }
}

export function namedField(kind: Kind, name: string): SchemaField {
  const created = new Field(kind, name);
  if (!isNamed(created)) {
    throw new GrammarError(`Unable to name field ${name}`);
  }
  return created;
}

function normalize(attribute: string, spec: FieldSpec): SchemaField {
  const declared = spec instanceof Field ? spec : new Field(spec);
  return isNamed(declared) ? declared : namedField(declared.kind, attribute);
}

/**
 * Define a schema.
 *
 * Base schema fields come first in base order. Redeclaring an inherited
 * attribute replaces it in place; new attributes are appended. Unnamed fields
 * take their attribute key as name.
 *
 * @example
 * ```typescript
 * const Person = schema("person", { surname: Kinds.string, dob: field(Kinds.date, "birthday") });
 * const Student = schema("student", { level: field(Kinds.integer, "class") }, [Person]);
 * ```
 */
export function schema(
  name: string,
  fields: Readonly<Record<string, FieldSpec>>,
  bases: readonly Schema[] = []
): Schema {
  const entries: Array<[string, SchemaField]> = [];
  const position = new Map<string, number>();

  for (const base of bases) {
    for (const [attribute, inherited] of base.entries()) {
      const existing = position.get(attribute);
      if (existing !== undefined) {
        if (!entries[existing][1].equals(inherited)) {
          throw new GrammarError(`Colliding base classes in schema ${name}`, name);
        }
        continue;
      }
      position.set(attribute, entries.length);
      entries.push([attribute, inherited]);
    }
  }

  for (const [attribute, spec] of Object.entries(fields)) {
    const declared = normalize(attribute, spec);
    const existing = position.get(attribute);
    if (existing !== undefined) {
      entries[existing] = [attribute, declared];
    } else {
      position.set(attribute, entries.length);
      entries.push([attribute, declared]);
    }
  }

  return new Schema(name, entries);
}
