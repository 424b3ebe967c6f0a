import { describe, expect, it } from 'vitest';
import { getValidationError, isValidationError, ValidationError } from './validationError.js';

describe('ValidationError', () => {
  it('appends the issues to the message', () => {
    const err = new ValidationError('error validating data', [{ message: 'Required', path: ['email'] }]);

    expect(err.message).toBe('error validating data; issues: [{"message":"Required","path":["email"]}]');
    expect(err.issues).toEqual([{ message: 'Required', path: ['email'] }]);
  });

  it('is found behind a wrapper', () => {
    const err = new ValidationError('error validating data', []);
    const wrapped = new Error('error decoding body', { cause: err });

    expect(isValidationError(wrapped)).toBe(true);
    expect(getValidationError(wrapped)).toBe(err);
    expect(getValidationError(new Error('boom'))).toBeNull();
  });
});
