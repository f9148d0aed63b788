export type FormatFn<T> = (value: T) => string;

export type ValueTypeOpts<T> = {
  /**
   * Display capability used by `ListItem.toString()`, defaults to `String(value)`
   */
  format?: FormatFn<T>;
};

/**
 * Type-erased identity of a type, what a `ListItem` exposes about its value
 */
export interface TypeInfo {
  readonly name: string;
}

/**
 * Runtime identity of a type that values can be stored under.
 *
 * Static types do not exist at run time, so every value enters a list together with a token.
 * Identity is the token itself: two tokens never match each other, even when they describe the
 * same JavaScript representation. `Types.i32` and `Types.f64` both hold a `number`, but a value
 * stored as `i32` can only be read back as `i32`.
 *
 * A token is a tag, not a validator: the compiler checks values against `T`, nothing checks
 * them against the token's name.
 */
export class ValueType<T> implements TypeInfo {
  private readonly formatFn: FormatFn<T>;

  constructor(
    readonly name: string,
    opts: ValueTypeOpts<T> = {}
  ) {
    this.formatFn = opts.format ?? String;
  }

  format(value: T): string {
    return this.formatFn(value);
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Create a new type token. Each call returns a distinct type, so define a token once and share it.
 * ```ts
 * type Point = {x: number; y: number};
 * const PointType = defineType<Point>("Point", {format: (p) => `(${p.x}, ${p.y})`});
 * ```
 */
export function defineType<T>(name: string, opts?: ValueTypeOpts<T>): ValueType<T> {
  return new ValueType<T>(name, opts);
}

/**
 * Built-in tokens for primitive values. Integer and float widths are distinct types sharing the
 * `number` (or `bigint`) representation, there is no widening or narrowing between them.
 *
 * Widths and `char` are names only. `insert(Types.u8, 300)` stores 300 and `get(i, Types.u8)`
 * returns it; range checks belong to the caller.
 */
export const Types = {
  i8: defineType<number>("i8"),
  i16: defineType<number>("i16"),
  i32: defineType<number>("i32"),
  u8: defineType<number>("u8"),
  u16: defineType<number>("u16"),
  u32: defineType<number>("u32"),
  f32: defineType<number>("f32"),
  f64: defineType<number>("f64"),
  i64: defineType<bigint>("i64"),
  u64: defineType<bigint>("u64"),
  bool: defineType<boolean>("bool"),
  char: defineType<string>("char"),
  string: defineType<string>("string"),
  unit: defineType<null>("unit", {format: () => "()"}),
};
