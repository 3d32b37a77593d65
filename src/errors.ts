/**
 * Errors: everything the document model throws.
 *
 * Argument binding and validation report every problem they find at once,
 * wrapped in a single InvalidDocument. Conversion, path, format and
 * definition errors are thrown where they happen.
 */

/** Base class of every error raised by this package. */
export class DocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DocumentError';
  }
}

/** A constructor argument could not be bound to a field. */
export class ConstructionError extends DocumentError {
  constructor(message: string) {
    super(message);
    this.name = 'ConstructionError';
  }
}

/** A validator rejected the value of a field. */
export class ValidationError extends DocumentError {
  /** Name of the offending field. */
  readonly field: string;
  /** Message returned by the validator. */
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`${field}: ${reason}`);
    this.name = 'ValidationError';
    this.field = field;
    this.reason = reason;
  }
}

/** A value cannot be converted to the native type of a field. */
export class ConversionError extends DocumentError {
  readonly value: unknown;

  constructor(message: string, value: unknown) {
    super(message);
    this.name = 'ConversionError';
    this.value = value;
  }
}

/** `save()` was called on a document that has never had a path. */
export class PathError extends DocumentError {
  constructor(message = 'no path') {
    super(message);
    this.name = 'PathError';
  }
}

/** The header section of a file is malformed. */
export class FormatError extends DocumentError {
  /** 1-based line number of the offending line. */
  readonly line: number;

  constructor(message: string, line: number) {
    super(`line ${line}: ${message}`);
    this.name = 'FormatError';
    this.line = line;
  }
}

/** A document type declaration is invalid. */
export class DefinitionError extends DocumentError {
  constructor(message: string) {
    super(message);
    this.name = 'DefinitionError';
  }
}

/**
 * Aggregate of independent problems found in one pass over a document.
 *
 * @example
 * ```ts
 * try {
 *   post.validate();
 * } catch (err) {
 *   if (err instanceof InvalidDocument) {
 *     for (const problem of err.errors) console.error(problem.message);
 *   }
 * }
 * ```
 */
export class InvalidDocument extends DocumentError {
  readonly errors: readonly DocumentError[];

  constructor(errors: readonly DocumentError[]) {
    super(summarize(errors));
    this.name = 'InvalidDocument';
    this.errors = errors;
  }
}

function summarize(errors: readonly DocumentError[]): string {
  const noun = errors.length === 1 ? 'problem' : 'problems';
  return `invalid document (${errors.length} ${noun}): ${errors.map((e) => e.message).join('; ')}`;
}
