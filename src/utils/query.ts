/**
 * Query-component escaping used by the image api: everything except
 * `A-Z a-z 0-9 - _ . ~` is percent-encoded and spaces become `+`.
 */
export function queryEscape(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

/**
 * Encode parameters as `key=value` pairs sorted by key. Undefined values are
 * skipped.
 */
export function encodeQuery(params: Record<string, string | undefined>): string {
  return Object.keys(params)
    .sort()
    .flatMap((key) => {
      const value = params[key];
      return value === undefined ? [] : [`${queryEscape(key)}=${queryEscape(value)}`];
    })
    .join('&');
}
