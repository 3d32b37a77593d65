/**
 * Document: field values plus free-form body text, persisted as a header+body
 * text file.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { renderText, splitText } from './codec.js';
import type { DocumentType } from './document-type.js';
import { ConstructionError, InvalidDocument, PathError } from './errors.js';
import type { ValidationError } from './errors.js';
import type { FieldSlot, Header, Values } from './types.js';

export class Document<V extends object> {
  readonly type: DocumentType<V>;
  /** File this document was last opened from or saved to. */
  path: string | null;

  /**
   * Explicitly set values; a missing entry means "compute the default".
   * Prototype-free, so field names like `constructor` never hit inherited
   * members.
   */
  private readonly values: Values<V> = Object.create(null);
  /** `null` until the body of an opened document has been read. */
  private body: string | null;

  /**
   * Bind positional values (in field order) and keyword values to fields.
   * Fields given neither get their initial value. Prefer
   * `DocumentType.construct`, `create` or `open`.
   *
   * @throws {InvalidDocument} Listing every argument that cannot be bound.
   * @throws {ConversionError} If a value does not convert to its field's type.
   */
  constructor(
    type: DocumentType<V>,
    positional: readonly unknown[] = [],
    named: Readonly<Record<string, unknown>> = {},
    origin: string | null = null,
  ) {
    this.type = type;
    this.path = origin;
    this.body = origin === null ? '' : null;

    const names = type.fieldNames;
    const problems: ConstructionError[] = [];
    if (positional.length > names.length) {
      problems.push(
        new ConstructionError(
          `too many positional arguments, at most ${names.length} (${positional.length} given)`,
        ),
      );
    }
    for (const key of Object.keys(named)) {
      if (!type.has(key)) {
        problems.push(new ConstructionError(`no such field: ${key}`));
      }
    }
    for (const name of names.slice(0, positional.length)) {
      if (Object.hasOwn(named, name)) {
        problems.push(
          new ConstructionError(`value supplied both positionally and by keyword for field: ${name}`),
        );
      }
    }
    if (problems.length > 0) {
      throw new InvalidDocument(problems);
    }

    names.forEach((name, index) => {
      if (index < positional.length) {
        this.bind(name, positional[index]);
      } else if (Object.hasOwn(named, name)) {
        this.bind(name, named[name]);
      } else {
        this.bind(name, this.type.field(name).initialValue);
      }
    });
  }

  /**
   * Current value of a field: the explicitly set value, else the computed
   * default (recomputed on every read), else `null`.
   */
  get<K extends keyof V & string>(name: K): V[K] | null {
    const stored = this.values[name];
    if (stored !== undefined && stored !== null) {
      return stored;
    }
    return this.type.computeDefault(name, this);
  }

  /** Store a value as is. `null` unsets the field. */
  set<K extends keyof V & string>(name: K, value: V[K] | null): void {
    if (value === null) {
      delete this.values[name];
    } else {
      this.values[name] = value;
    }
  }

  /** Whether the field holds an explicitly set value (not just a default). */
  isSet<K extends keyof V & string>(name: K): boolean {
    const stored = this.values[name];
    return stored !== undefined && stored !== null;
  }

  /**
   * Run every validator of every field.
   *
   * @throws {InvalidDocument} With one ValidationError per failed check, in
   *   field order, then validator order.
   */
  validate(): void {
    const errors = this.type.fieldNames.flatMap((name) => this.check(name));
    if (errors.length > 0) {
      throw new InvalidDocument(errors);
    }
  }

  /** Body text. An opened document reads it from its file on first access. */
  read(): string {
    if (this.body === null) {
      this.body = this.path === null ? '' : splitText(readFileSync(this.path, 'utf-8')).body;
    }
    return this.body;
  }

  /** Replace the body text. */
  write(text: string): void {
    this.body = text;
  }

  /**
   * Write the document to `path`, or to the path it was opened from or last
   * saved to. Only explicitly set fields are written, in field order.
   *
   * If the write fails, values assigned by pre-save hooks are rolled back.
   *
   * @throws {PathError} If no path is given and the document has none.
   */
  save(path?: string): void {
    const target = path ?? this.path;
    if (target === null) {
      throw new PathError();
    }
    const names = this.type.fieldNames;
    const restores = names.map((name) => this.keep(name));
    try {
      for (const name of names) {
        this.type.field(name).preSave?.(this.slot(name));
      }
      const headers = names.flatMap((name) => this.header(name));
      writeFileSync(target, renderText(headers, this.read()), 'utf-8');
    } catch (err) {
      for (const restore of restores) restore();
      throw err;
    }
    this.path = target;
  }

  private bind<K extends keyof V & string>(name: K, value: unknown): void {
    if (value === null || value === undefined) return;
    this.values[name] = this.type.field(name).coerce(value);
  }

  /** Capture the stored value of a field; the returned function puts it back. */
  private keep<K extends keyof V & string>(name: K): () => void {
    const stored = this.values[name];
    return () => {
      if (stored === undefined || stored === null) {
        delete this.values[name];
      } else {
        this.values[name] = stored;
      }
    };
  }

  private check<K extends keyof V & string>(name: K): ValidationError[] {
    return this.type.field(name).validate(this.get(name));
  }

  private header<K extends keyof V & string>(name: K): Header[] {
    const stored = this.values[name];
    if (stored === undefined || stored === null) return [];
    return [{ name, value: this.type.field(name).format(stored) }];
  }

  private slot<K extends keyof V & string>(name: K): FieldSlot<V[K]> {
    return {
      isSet: this.isSet(name),
      get: () => this.get(name),
      set: (value) => this.set(name, value),
    };
  }
}
