import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Umbrella for every strict-decode violation. Match this to catch any of the decode kinds.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  static name = 'DecodeError';
}

/**
 * Body is not well-formed JSON, or ended before the value was complete.
 */
export class MalformedJSONError extends DecodeError {
  /** MalformedJSONError error-name */
  static name = 'MalformedJSONError';
  /** Byte offset of the first character that breaks the grammar, when known */
  #offset: number | null;

  /** Creates a new instance of a MalformedJSONError, optionally with the failing offset */
  constructor(offset?: number, opts?: ErrorOptions) {
    super(
      offset === undefined
        ? 'error badly-formed JSON in the body'
        : `error badly-formed JSON in the body at byte ${offset}`,
      opts,
    );
    this.#offset = offset ?? null;
  }

  /** Byte offset of the first character that breaks the grammar */
  get offset(): number | null {
    return this.#offset;
  }
}

/**
 * A JSON value does not have the type the schema expects.
 */
export class WrongJSONTypeError extends DecodeError {
  /** WrongJSONTypeError error-name */
  static name = 'WrongJSONTypeError';
  /** Dotted path of the offending field, null for the top-level value */
  #field: string | null;

  /** Creates a new instance of a WrongJSONTypeError for the given field path */
  constructor(field?: string, opts?: ErrorOptions) {
    super(
      field
        ? `error incorrect JSON type in the body for field "${field}"`
        : 'error incorrect JSON type in the body',
      opts,
    );
    this.#field = field || null;
  }

  /** Dotted path of the offending field */
  get field(): string | null {
    return this.#field;
  }
}

/** The body held nothing but whitespace. */
export class EmptyBodyError extends DecodeError {
  /** EmptyBodyError error-name */
  static name = 'EmptyBodyError';

  /** Creates a new instance of an EmptyBodyError */
  constructor(opts?: ErrorOptions) {
    super('error body must not be empty', opts);
  }
}

/**
 * The body carried a key the schema does not declare.
 */
export class UnknownKeyError extends DecodeError {
  /** UnknownKeyError error-name */
  static name = 'UnknownKeyError';
  /** Dotted path of the undeclared key */
  #key: string;

  /** Creates a new instance of an UnknownKeyError for the given key path */
  constructor(key: string, opts?: ErrorOptions) {
    super(`error unknown key in the body "${key}"`, opts);
    this.#key = key;
  }

  /** Dotted path of the undeclared key */
  get key(): string {
    return this.#key;
  }
}

/**
 * The body is larger than the configured limit.
 */
export class BodyTooLargeError extends DecodeError {
  /** BodyTooLargeError error-name */
  static name = 'BodyTooLargeError';
  /** Configured limit in bytes */
  #limit: number;

  /** Creates a new instance of a BodyTooLargeError with the limit that was exceeded */
  constructor(limit: number, opts?: ErrorOptions) {
    super(`error body size limit exceeded, max size is ${limit} bytes`, opts);
    this.#limit = limit;
  }

  /** Configured limit in bytes */
  get limit(): number {
    return this.#limit;
  }
}

/** Something other than whitespace followed the first JSON value. */
export class MultipleJSONValuesError extends DecodeError {
  /** MultipleJSONValuesError error-name */
  static name = 'MultipleJSONValuesError';

  /** Creates a new instance of a MultipleJSONValuesError */
  constructor(opts?: ErrorOptions) {
    super('error body must contain a single JSON value', opts);
  }
}

/**
 * Type guard for {@link DecodeError} and every subclass of it.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}

/**
 * Extract the outermost {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): null | DecodeError {
  return unwrapErrorType(DecodeError, error);
}
