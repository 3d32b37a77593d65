/**
 * Field kinds: conversion rules for the value types a header can hold.
 */

import { randomUUID } from 'node:crypto';
import { ConversionError } from './errors.js';
import { Field } from './field.js';
import type { FieldOptions, FieldSlot } from './types.js';
import { isTag } from './validators.js';

const INTEGER = /^[+-]?\d+$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;
const UUID = /^[0-9a-f]{8}-(?:[0-9a-f]{4}-){3}[0-9a-f]{12}$/;

const TRUE_WORDS = new Set(['true', 't', 'yes', 'y', '1']);
const FALSE_WORDS = new Set(['false', 'f', 'no', 'n', '0']);

export class TextField extends Field<string> {
  coerce(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
      return String(value);
    }
    throw new ConversionError(`${show(value)} cannot be converted to text`, value);
  }
}

export class IntField extends Field<number> {
  coerce(value: unknown): number {
    if (typeof value === 'number' && Number.isSafeInteger(value)) return value;
    if (typeof value === 'string' && INTEGER.test(value.trim())) {
      const parsed = Number(value.trim());
      if (Number.isSafeInteger(parsed)) return parsed;
    }
    throw new ConversionError(`${show(value)} cannot be converted to integer`, value);
  }
}

export class BoolField extends Field<boolean> {
  coerce(value: unknown): boolean {
    if (typeof value === 'boolean') return value;
    if (value === 1 || value === 0) return value === 1;
    if (typeof value === 'string') {
      const word = value.trim().toLowerCase();
      if (TRUE_WORDS.has(word)) return true;
      if (FALSE_WORDS.has(word)) return false;
    }
    throw new ConversionError(`${show(value)} cannot be converted to boolean`, value);
  }
}

export interface DateTimeFieldOptions extends FieldOptions<Date> {
  /**
   * Stamp the current time on save: `'create'` only while the field is
   * unset, `'save'` on every save.
   */
  autoNow?: 'create' | 'save';
  /** Clock used for stamping (default `new Date()`). */
  now?: () => Date;
}

/** Local date and time, encoded as `YYYY-MM-DD HH:MM:SS`. */
export class DateTimeField extends Field<Date> {
  readonly autoNow: 'create' | 'save' | undefined;
  private readonly now: () => Date;

  constructor(options: DateTimeFieldOptions = {}) {
    super(options);
    this.autoNow = options.autoNow;
    this.now = options.now ?? (() => new Date());
  }

  coerce(value: unknown): Date {
    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) {
        throw new ConversionError('invalid date', value);
      }
      return new Date(value.getTime());
    }
    if (typeof value === 'string') {
      const parsed = parseDateTime(value.trim());
      if (parsed !== null) return parsed;
    }
    throw new ConversionError(`${show(value)} cannot be converted to date and time`, value);
  }

  format(value: Date): string {
    const date = [value.getFullYear(), value.getMonth() + 1, value.getDate()];
    const time = [value.getHours(), value.getMinutes(), value.getSeconds()];
    return `${date.map((n, i) => pad(n, i === 0 ? 4 : 2)).join('-')} ${time.map((n) => pad(n, 2)).join(':')}`;
  }

  preSave(slot: FieldSlot<Date>): void {
    if (this.autoNow === 'save' || (this.autoNow === 'create' && !slot.isSet)) {
      const stamp = this.now();
      stamp.setMilliseconds(0);
      slot.set(stamp);
    }
  }
}

/** Flat list of tags, encoded as `one, two, three`. */
export class TagField extends Field<string[]> {
  coerce(value: unknown): string[] {
    const tags = typeof value === 'string' ? splitTags(value) : value;
    if (!Array.isArray(tags) || !tags.every((tag): tag is string => typeof tag === 'string')) {
      throw new ConversionError(`${show(value)} cannot be converted to tags`, value);
    }
    const invalid = tags.find((tag) => !isTag(tag));
    if (invalid !== undefined) {
      throw new ConversionError(`${show(invalid)} is not a valid tag`, value);
    }
    return [...tags];
  }

  format(value: string[]): string {
    return value.join(', ');
  }
}

export interface UuidFieldOptions extends FieldOptions<string> {
  /** Assign a fresh identifier on save while the field is unset. */
  auto?: boolean;
  /** Identifier source (default `crypto.randomUUID`). */
  generate?: () => string;
}

export class UuidField extends Field<string> {
  readonly auto: boolean;
  private readonly generate: () => string;

  constructor(options: UuidFieldOptions = {}) {
    super(options);
    this.auto = options.auto ?? false;
    this.generate = options.generate ?? randomUUID;
  }

  coerce(value: unknown): string {
    if (typeof value === 'string') {
      const id = value.trim().toLowerCase();
      if (UUID.test(id)) return id;
    }
    throw new ConversionError(`${show(value)} is not a uuid`, value);
  }

  preSave(slot: FieldSlot<string>): void {
    if (this.auto && !slot.isSet) {
      slot.set(this.generate());
    }
  }
}

function parseDateTime(text: string): Date | null {
  const match = DATE_TIME.exec(text);
  if (match === null) return null;
  const [year, month, day, hours, minutes, seconds] = match.slice(1).map((part) => Number(part ?? 0));
  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  date.setHours(hours, minutes, seconds, 0);
  // Date rolls out-of-range parts over; reject anything that did.
  const fits =
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day &&
    date.getHours() === hours &&
    date.getMinutes() === minutes &&
    date.getSeconds() === seconds;
  return fits ? date : null;
}

function splitTags(text: string): string[] {
  return text.split(',').map((tag) => tag.trim()).filter((tag) => tag !== '');
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function show(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : String(value);
}
