import { EmptyItemError, WrongCastTypeError } from '../error/itemError.js';
import type { SafeWrap } from '../utils/wrap.js';

/**
 * The single settled item of a {@link Single}: a value, an error, or nothing at all.
 */
export type Item<T> = { kind: 'value'; value: T } | { kind: 'error'; error: Error } | { kind: 'empty' };

/** Item carrying a value. */
export function valueItem<T>(value: T): Item<T> {
  return { kind: 'value', value };
}

/** Item carrying an error. */
export function errorItem(error: Error): Item<never> {
  return { kind: 'error', error };
}

/** Item carrying neither. */
export function emptyItem(): Item<never> {
  return { kind: 'empty' };
}

/**
 * Turns a settled item into an error-first tuple. Never coerces:
 *
 * - a value accepted by `guard` (or any value, without one) → the value
 * - an error item → its error
 * - an empty item, or a `null`/`undefined` value → {@link EmptyItemError}
 * - a value that is itself an `Error` → that error
 * - a value `guard` rejects → {@link WrongCastTypeError}
 *
 * @example
 * const [err, envelope] = extract(await single.observe(), isEnvelope);
 */
export function extract<T>(item: Item<T>): SafeWrap<Error, T>;
export function extract<T>(item: Item<unknown>, guard: (value: unknown) => value is T): SafeWrap<Error, T>;
export function extract<T>(item: Item<T>, guard?: (value: unknown) => value is T): SafeWrap<Error, T> {
  if (item.kind === 'error') {
    return [item.error, null];
  }

  if (item.kind === 'empty') {
    return [new EmptyItemError('error empty item'), null];
  }

  const { value } = item;
  if (value === null || value === undefined) {
    return [new EmptyItemError('error empty item'), null];
  }

  if (guard && guard(value)) {
    return [null, value];
  }

  if (value instanceof Error) {
    return [value, null];
  }

  if (guard) {
    return [new WrongCastTypeError('error wrong cast type'), null];
  }

  return [null, value];
}
