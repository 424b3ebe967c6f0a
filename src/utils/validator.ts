import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Checks that a value is a Standard Schema, i.e. carries a `~standard` contract with a `validate` function.
 */
export function isStandardSchema(value: unknown): value is StandardSchemaV1 {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null || !('~standard' in value)) {
    return false;
  }

  const contract = value['~standard'];
  return typeof contract === 'object' && contract !== null && 'validate' in contract && typeof contract.validate === 'function';
}

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)` which may be sync or async.
 * - If the validation throws (sync or async), the failure is wrapped in a `ValidationError`
 *   with no issues and the original error as `cause`.
 * - If the validation result contains `issues`, a `ValidationError` with message
 *   `"error validating data"` and the collected issues is returned as `[ValidationError, null]`.
 * - On successful validation without issues, returns `[null, result.value]`.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  let [err, result] = safeWrap<ValidationResult | Promise<ValidationResult>>(() => schema['~standard'].validate(input));

  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    const pending = result;
    const [errAsync, resultAsync] = await safeWrapAsync(() => pending);
    if (errAsync) {
      return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
    }

    result = resultAsync;
  }

  if (!result) {
    return [new ValidationError('error validating data empty resulting validation', []), null];
  }

  if (typeof result !== 'object') {
    return [new ValidationError('error validation result of wrong type', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
