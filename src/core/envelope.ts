/**
 * Result of a completed typed call: the decoded body next to the raw response.
 *
 * `body` is `null` when the server replied with no content, or when the call was
 * made without a response schema.
 */
export class Envelope<T> {
  /** Decoded response body */
  #body: T | null;
  /** Raw response; its body has already been consumed or released */
  #response: Response;

  constructor(body: T | null, response: Response) {
    this.#body = body;
    this.#response = response;
  }

  /** Decoded response body, `null` for no-content replies */
  get body(): T | null {
    return this.#body;
  }

  /** Raw response, for header and status inspection */
  get response(): Response {
    return this.#response;
  }

  /** HTTP status code */
  get status(): number {
    return this.#response.status;
  }

  /** HTTP status text as sent by the server (may be empty) */
  get statusText(): string {
    return this.#response.statusText;
  }

  /** Response headers */
  get headers(): Headers {
    return this.#response.headers;
  }
}

/**
 * Type guard for {@link Envelope}.
 */
export function isEnvelope(value: unknown): value is Envelope<unknown> {
  return value instanceof Envelope;
}
