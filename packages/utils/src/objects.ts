export function isPlainObject(o: unknown): o is Record<string, unknown> {
  return typeof o === "object" && o !== null && Object.getPrototypeOf(o) === Object.prototype;
}

/**
 * True for `{}`, `[]` and anything without own enumerable keys
 */
export function isEmptyObject(value: unknown): boolean {
  return typeof value === "object" && value !== null && Object.keys(value).length === 0;
}

/**
 * Creates an object with the same keys as `obj` and values generated by running `fn` on each value
 */
export function mapValues<T, R>(obj: Record<string, T>, fn: (value: T, key: string) => R): Record<string, R> {
  const output: Record<string, R> = {};
  for (const [key, value] of Object.entries(obj)) {
    output[key] = fn(value, key);
  }
  return output;
}
