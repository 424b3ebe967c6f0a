/** HTTP methods the client issues. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Methods that carry a request body. */
export type BodyMethod = Extract<HttpMethod, 'POST' | 'PUT' | 'PATCH'>;

/** Methods that never carry a request body. */
export type BodylessMethod = Exclude<HttpMethod, BodyMethod>;

/**
 * A configured HTTP client, or a round-tripper in front of one.
 * Owns connection reuse, client-level timeout and redirect behaviour.
 */
export type HttpClient = (request: Request) => Promise<Response>;

/** Header options accepted throughout. A `null`/`undefined` value leaves the header out. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null | undefined>;

/** Predicate over a raw response; `true` means "treat this response as a failure". */
export type StatusValidator = (response: Response) => boolean;

/**
 * Request types that prefer a URL-encoded body over JSON.
 */
export interface FormEncodable {
  toURLSearchParams(): URLSearchParams;
}
