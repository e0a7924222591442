/**
 * In-memory column store used by the closure backend.
 *
 * Columns are addressed by name and an optional qualifier (the label of the
 * table or reference they came from), so joined data keeps same-named fields
 * of different origins apart.
 */

import { GrammarError, UnprovisionedError } from "./errors";
import { Native, nativeKey } from "./kind";

export type Value = Native | null;

export interface ColumnRef {
  readonly name: string;
  readonly qualifier?: string;
}

/** Canonical encoding of a tuple of values for grouping and set semantics. */
export function valueKey(values: readonly Value[]): string {
  return values.map((value) => (value === null ? "null" : nativeKey(value))).join("|");
}

function describeRef(ref: ColumnRef): string {
  return ref.qualifier === undefined ? ref.name : `${ref.qualifier}.${ref.name}`;
}

export class Columnar {
  readonly length: number;

  constructor(
    readonly refs: readonly ColumnRef[],
    readonly columns: readonly (readonly Value[])[],
    length?: number
  ) {
    if (refs.length !== columns.length) {
      throw new GrammarError(`Expecting ${refs.length} columns, got ${columns.length}`);
    }
    this.length = length ?? (columns.length ? columns[0].length : 0);
    for (const [i, column] of columns.entries()) {
      if (column.length !== this.length) {
        throw new GrammarError(
          `Column ${describeRef(refs[i])} has ${column.length} values, expecting ${this.length}`
        );
      }
    }
  }

  /**
   * @example
   * ```typescript
   * Columnar.fromRecord({ name: ["a", "b"], score: [1, 2] });
   * ```
   */
  static fromRecord(data: Readonly<Record<string, readonly Value[]>>): Columnar {
    const entries = Object.entries(data);
    return new Columnar(
      entries.map(([name]) => ({ name })),
      entries.map(([, values]) => values)
    );
  }

  static fromRows(refs: readonly ColumnRef[], rows: readonly (readonly Value[])[]): Columnar {
    const columns = refs.map((_, i) => rows.map((row) => row[i]));
    return new Columnar(refs, columns, rows.length);
  }

  get names(): string[] {
    return this.refs.map((ref) => ref.name);
  }

  /**
   * Index of a column: an exact qualified match first, then an unqualified
   * column of that name. -1 when absent.
   */
  find(name: string, qualifier?: string): number {
    const exact = this.refs.findIndex(
      (ref) => ref.name === name && ref.qualifier === qualifier
    );
    if (exact >= 0 || qualifier === undefined) return exact;
    return this.refs.findIndex((ref) => ref.name === name && ref.qualifier === undefined);
  }

  column(name: string, qualifier?: string): readonly Value[] {
    const index = this.find(name, qualifier);
    if (index < 0) {
      const label = describeRef({ name, qualifier });
      throw new UnprovisionedError(`Unknown column ${label}`, label);
    }
    return this.columns[index];
  }

  /** Same data with every column attributed to the given qualifier. */
  qualify(qualifier: string): Columnar {
    return new Columnar(
      this.refs.map((ref) => ({ name: ref.name, qualifier })),
      this.columns,
      this.length
    );
  }

  /** Rows at the given positions; null positions produce all-null rows. */
  take(indices: readonly (number | null)[]): Columnar {
    return new Columnar(
      this.refs,
      this.columns.map((column) => indices.map((i) => (i === null ? null : column[i]))),
      indices.length
    );
  }

  /** Rows whose mask value is exactly true. */
  filter(mask: readonly Value[]): Columnar {
    const indices: number[] = [];
    mask.forEach((value, i) => {
      if (value === true) indices.push(i);
    });
    return this.take(indices);
  }

  /** Side by side combination of two equally long data sets. */
  concat(other: Columnar): Columnar {
    if (other.length !== this.length) {
      throw new GrammarError(`Cannot combine ${this.length} rows with ${other.length} rows`);
    }
    return new Columnar(
      [...this.refs, ...other.refs],
      [...this.columns, ...other.columns],
      this.length
    );
  }

  row(index: number): Value[] {
    return this.columns.map((column) => column[index]);
  }

  rows(): Value[][] {
    const result: Value[][] = [];
    for (let i = 0; i < this.length; i++) result.push(this.row(i));
    return result;
  }

  /** Rows as objects keyed by column name; the first column of a name wins. */
  records(): Record<string, Value>[] {
    return this.rows().map((row) => {
      const record: Record<string, Value> = {};
      this.refs.forEach((ref, i) => {
        if (!(ref.name in record)) record[ref.name] = row[i];
      });
      return record;
    });
  }
}
