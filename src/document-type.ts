/**
 * Document types: the static description of a kind of document.
 *
 * `defineDocument` registers the declared fields once: each field gets its
 * name and its declaration index (ordinal), and the type keeps the fields
 * in that order. Header lines are always written in this order.
 *
 * @example
 * ```ts
 * const Post = defineDocument({
 *   title: new TextField({ initialValue: 'Untitled', required: true }),
 *   slug: new TextField(),
 *   tags: new TagField(),
 * }).setDefault('slug', (post) => post.get('title')?.toLowerCase() ?? null);
 *
 * const post = Post.create({ tags: ['draft'] });
 * post.write('Hello!\n');
 * post.save('hello.txt');
 *
 * const again = Post.open('hello.txt');
 * again.get('slug'); // 'untitled'
 * ```
 */

import { readFileSync } from 'node:fs';
import { parseText } from './codec.js';
import { Document } from './document.js';
import { DefinitionError } from './errors.js';
import type { Field } from './field.js';
import type { Defaulter, FieldInfo, FieldMap, Values } from './types.js';

/** Field names double as header names; the leading letter also keeps object key order stable. */
const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export class DocumentType<V extends object> {
  /** Attached fields, sorted by ordinal. */
  readonly fields: readonly FieldInfo[];
  /** Field names, in the same order as `fields`. */
  readonly fieldNames: readonly (keyof V & string)[];

  private readonly declared: FieldMap<V>;
  private readonly defaulters: { [K in keyof V]?: Defaulter<V, V[K]> } = Object.create(null);

  constructor(declared: FieldMap<V>) {
    const names: (keyof V & string)[] = [];
    for (const name of Object.keys(declared)) {
      if (!FIELD_NAME.test(name) || !hasOwn(declared, name)) {
        throw new DefinitionError(`invalid field name: '${name}'`);
      }
      declared[name].attach(name, names.length);
      names.push(name);
    }
    names.sort((a, b) => declared[a].ordinal - declared[b].ordinal);

    this.declared = declared;
    this.fieldNames = Object.freeze(names);
    this.fields = Object.freeze(names.map((name) => declared[name]));
  }

  /** Whether `name` is one of this type's fields. */
  has(name: string): name is keyof V & string {
    return hasOwn(this.declared, name);
  }

  /** The field declared under `name`. */
  field<K extends keyof V & string>(name: K): Field<V[K]> {
    return this.declared[name];
  }

  /**
   * Register the function that computes a field's value while it is unset.
   * Returns the type for chaining.
   */
  setDefault<K extends keyof V & string>(name: K, defaulter: Defaulter<V, V[K]>): this {
    if (!this.has(name)) {
      throw new DefinitionError(`no such field: ${String(name)}`);
    }
    this.defaulters[name] = defaulter;
    return this;
  }

  /** Default value of an unset field for `document`, or `null` without a defaulter. */
  computeDefault<K extends keyof V & string>(name: K, document: Document<V>): V[K] | null {
    const defaulter = this.defaulters[name];
    return defaulter === undefined ? null : defaulter(document);
  }

  /**
   * Create a document from positional values (in field order) and keyword
   * values.
   *
   * @throws {InvalidDocument} Listing every argument that cannot be bound.
   * @throws {ConversionError} If a value does not convert to its field's type.
   */
  construct(positional: readonly unknown[] = [], named: Readonly<Record<string, unknown>> = {}): Document<V> {
    return new Document(this, positional, named);
  }

  /** Create a document from typed keyword values. */
  create(values: Values<V> = {}): Document<V> {
    return new Document(this, [], values);
  }

  /**
   * Load a document from a file. Headers become keyword arguments; the body
   * is read from the file on first access.
   *
   * @throws {FormatError} If the header section is malformed.
   * @throws {InvalidDocument} If a header names no field.
   */
  open(path: string): Document<V> {
    const { headers } = parseText(readFileSync(path, 'utf-8'));
    const named = Object.fromEntries(headers.map(({ name, value }) => [name, value]));
    return new Document(this, [], named, path);
  }
}

/** Document instances of a document type. */
export type DocumentOf<T> = T extends DocumentType<infer V> ? Document<V> : never;

/** Register a document type from its field declarations, in order. */
export function defineDocument<V extends object>(fields: FieldMap<V>): DocumentType<V> {
  return new DocumentType(fields);
}

function hasOwn<T extends object>(target: T, key: string): key is keyof T & string {
  return Object.prototype.hasOwnProperty.call(target, key);
}
