/**
 * Types shared by fields, document types and documents.
 */

import type { Document } from './document.js';
import type { Field } from './field.js';

/**
 * Checks one field value. Returns a failure message, or `undefined` when the
 * value is acceptable.
 */
export type Validator<T> = (value: T | null) => string | undefined;

/**
 * Computes the value of an unset field from the other fields of the same
 * document. Called on every read, so it always sees current values.
 */
export type Defaulter<V extends object, T> = (document: Document<V>) => T | null;

/** Options accepted by every field kind. */
export interface FieldOptions<T> {
  /** Stored at construction when no argument is supplied for the field. */
  initialValue?: T | null;
  /** Fail validation when the field has no value. */
  required?: boolean;
  /** Validators run in order after the required check. */
  validators?: readonly Validator<T>[];
}

/** Untyped view of an attached field. */
export interface FieldInfo {
  readonly name: string;
  readonly ordinal: number;
  readonly required: boolean;
  readonly initialValue: unknown;
}

/** Field declarations of a document type, one per value of `V`. */
export type FieldMap<V extends object> = { [K in keyof V]: Field<V[K]> };

/** Keyword arguments of a document type; `null` leaves a field unset. */
export type Values<V extends object> = { [K in keyof V]?: V[K] | null };

/** Access to one field of one document, handed to `Field.preSave`. */
export interface FieldSlot<T> {
  /** Whether the field holds an explicitly set value. */
  readonly isSet: boolean;
  get(): T | null;
  set(value: T | null): void;
}

/** A logical `name: value` header line. */
export interface Header {
  name: string;
  value: string;
}

/** A header parsed from a file, with its 1-based starting line. */
export interface ParsedHeader extends Header {
  line: number;
}

/** A file split into its unfolded headers and its body. */
export interface ParsedText {
  headers: ParsedHeader[];
  body: string;
}

/** Overrides for header folding. */
export interface FoldOptions {
  /** Maximum line width in characters (default 72). */
  width?: number;
  /** Prefix of continuation lines (default four spaces). */
  indent?: string;
}
