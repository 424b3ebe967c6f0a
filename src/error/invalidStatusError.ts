import { safeWrapAsync } from '../utils/wrap.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response whose status failed the status validator.
 *
 * The response body is left unread until {@link InvalidStatusError.readBody} asks for it,
 * so callers that only check the kind never pay for reading it.
 */
export class InvalidStatusError extends Error {
  /** InvalidStatusError error-name */
  static name = 'InvalidStatusError';

  /** Response causing the InvalidStatusError */
  #response: Response;
  /** Set once the body has been handed out */
  #consumed = false;

  /** Creates a new instance of an InvalidStatusError with defaulting message + response to wrap */
  constructor(response: Response, message = `error invalid HTTP status: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /** Response causing the InvalidStatusError */
  get response(): Response {
    return this.#response;
  }

  /** Status code of the failed response */
  get status(): number {
    return this.#response.status;
  }

  /**
   * Reads the captured body as text. Only the first call reads; every later call,
   * and any read that fails, yields an empty string.
   */
  async readBody(): Promise<string> {
    if (this.#consumed) {
      return '';
    }

    this.#consumed = true;
    if (this.#response.bodyUsed) {
      return '';
    }

    const [err, text] = await safeWrapAsync(() => this.#response.text());
    if (err) {
      return '';
    }

    return text;
  }
}

/**
 * Extract an {@link InvalidStatusError} from an unknown error value, following nested causes.
 */
export function getInvalidStatusError(error: unknown): null | InvalidStatusError {
  return unwrapErrorType(InvalidStatusError, error);
}

/**
 * Type guard for {@link InvalidStatusError}.
 */
export function isInvalidStatusError(error: unknown): error is InvalidStatusError {
  return isErrorType(InvalidStatusError, error);
}
