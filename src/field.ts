/**
 * Field: one typed property of a document type.
 *
 * A field is declared once, attached to exactly one document type (which
 * gives it its name and ordinal), and shared by every document of that type.
 * Values live on the documents, never on the field.
 */

import { DefinitionError, ValidationError } from './errors.js';
import type { FieldInfo, FieldOptions, FieldSlot, Validator } from './types.js';
import { required } from './validators.js';

export abstract class Field<T> implements FieldInfo {
  readonly initialValue: T | null;
  readonly required: boolean;

  private readonly validators: Validator<T>[];
  private boundName: string | null = null;
  private boundOrdinal = -1;

  constructor(options: FieldOptions<T> = {}) {
    this.initialValue = options.initialValue ?? null;
    this.required = options.required ?? false;
    this.validators = [...(options.validators ?? [])];
  }

  /** Name under which the field is attached to its document type. */
  get name(): string {
    if (this.boundName === null) {
      throw new DefinitionError('field is not attached to a document type');
    }
    return this.boundName;
  }

  /** Declaration index within the owning document type. */
  get ordinal(): number {
    return this.boundOrdinal;
  }

  /**
   * Bind the field to a document type. Called by `defineDocument`; a field
   * can be attached only once.
   */
  attach(name: string, ordinal: number): void {
    if (this.boundName !== null) {
      throw new DefinitionError(`field '${name}' is already attached as '${this.boundName}'`);
    }
    this.boundName = name;
    this.boundOrdinal = ordinal;
  }

  /** Append a validator. Returns the field for chaining. */
  addValidator(validator: Validator<T>): this {
    this.validators.push(validator);
    return this;
  }

  /**
   * Run every validator against `value` and collect all failures. The
   * required check, when enabled, runs first.
   */
  validate(value: T | null): ValidationError[] {
    const checks: Validator<T>[] = this.required ? [required, ...this.validators] : this.validators;
    const errors: ValidationError[] = [];
    for (const check of checks) {
      const reason = check(value);
      if (reason !== undefined) {
        errors.push(new ValidationError(this.name, reason));
      }
    }
    return errors;
  }

  /**
   * Convert a string encoding, or an already native value, to `T`.
   * Native values come back equal; mutable ones (lists, dates) as copies,
   * so documents never share them with each other or with `initialValue`.
   *
   * @throws {ConversionError} If the value cannot be converted.
   */
  abstract coerce(value: unknown): T;

  /** Canonical string encoding of a native value. */
  format(value: T): string {
    return String(value);
  }

  /** Called for every field by `Document.save()` before headers are written. */
  preSave?(slot: FieldSlot<T>): void;
}
