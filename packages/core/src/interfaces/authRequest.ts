/** Header record as produced by Node's `http` module and most Node frameworks. */
export type HeaderRecord = Record<string, string | string[] | undefined>;

/**
 * Anything the guard can read an `Authorization` header from: a fetch `Request`,
 * a `Headers` instance, or an object carrying either kind of headers.
 */
export type AuthRequest = Request | Headers | { headers: Headers | HeaderRecord };
