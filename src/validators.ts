/**
 * Validators: reusable checks for field values.
 *
 * A validator returns a failure message, or `undefined` when the value is
 * acceptable. Apart from `required`, every validator here accepts `null` so
 * it can be attached to optional fields.
 *
 * @example
 * ```ts
 * const slug = new TextField().addValidator(maxLength(40)).addValidator(matches(/^[a-z-]+$/));
 * ```
 */

import type { Validator } from './types.js';

const UUID_PATTERN = /^[0-9a-f]{8}-(?:[0-9a-f]{4}-){3}[0-9a-f]{12}$/;
const TAG_PATTERN = /^[A-Za-z0-9-]+$/;

/** Fails when there is no value at all. */
export const required: Validator<unknown> = (value) =>
  value === null || value === undefined ? 'no value for required field' : undefined;

/** Lower-case, hyphenated UUID. */
export const uuid: Validator<string> = (value) =>
  value !== null && !UUID_PATTERN.test(value) ? 'not in uuid format' : undefined;

/** Every tag consists solely of alphanumeric or dash characters. */
export const tagSequence: Validator<readonly string[]> = (value) => {
  if (value === null) return undefined;
  for (const tag of value) {
    if (!isTag(tag)) return 'alphanumeric or dash characters only';
  }
  return undefined;
};

/** At most `limit` characters (strings) or items (arrays). */
export function maxLength(limit: number): Validator<{ readonly length: number }> {
  return (value) =>
    value !== null && value.length > limit ? `longer than ${limit}` : undefined;
}

/** The string matches `pattern` (anchor it to match the whole value). */
export function matches(pattern: RegExp, message = `does not match ${pattern}`): Validator<string> {
  return (value) => {
    if (value === null) return undefined;
    pattern.lastIndex = 0;
    return pattern.test(value) ? undefined : message;
  };
}

/** Tag syntax shared with TagField conversion. */
export function isTag(tag: string): boolean {
  return TAG_PATTERN.test(tag);
}
