import type { FieldValue } from 'shortstack-rpc';

import { InvalidArgumentError } from '../errors.js';

export type RowEntry = readonly [name: string, value: FieldValue];

/**
 * One assembled row: column name to value, in the order the columns were
 * requested.
 *
 * @example
 * ```ts
 * const [row] = await client.decodeSegment(key, [age, name]);
 * row.get('age');   // 31n
 * row.names();      // ['age', 'name']
 * row.toObject();   // { age: 31n, name: 'Ada' }
 * ```
 */
export class Row implements Iterable<RowEntry> {
  private readonly entries: readonly RowEntry[];
  private readonly index: ReadonlyMap<string, number>;

  constructor(entries: Iterable<RowEntry>) {
    const list = [...entries];
    const index = new Map<string, number>();
    list.forEach(([name], i) => {
      if (index.has(name)) {
        throw new InvalidArgumentError(`Row repeats column ${name}`);
      }
      index.set(name, i);
    });
    this.entries = list;
    this.index = index;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Value of the named column, or undefined if the row has no such column */
  get(name: string): FieldValue | undefined {
    const i = this.index.get(name);
    return i === undefined ? undefined : this.entries[i][1];
  }

  has(name: string): boolean {
    return this.index.has(name);
  }

  names(): string[] {
    return this.entries.map(([name]) => name);
  }

  values(): FieldValue[] {
    return this.entries.map(([, value]) => value);
  }

  [Symbol.iterator](): Iterator<RowEntry> {
    return this.entries[Symbol.iterator]();
  }

  toObject(): Record<string, FieldValue> {
    return Object.fromEntries(this.entries);
  }
}
