export type PolylistErrorMetaData = Record<string, string | number | null>;
export type PolylistErrorObject = PolylistErrorMetaData & {stack: string};

/**
 * Generic Polylist error with attached metadata
 */
export class PolylistError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string) {
    super(message || type.code);
    this.type = type;
  }

  getMetadata(): Record<string, string | number | null> {
    return this.type;
  }

  /**
   * Get the metadata and the stacktrace for the error.
   */
  toObject(): PolylistErrorObject {
    return {
      // Ignore message since it's just type.code
      ...this.getMetadata(),
      stack: this.stack || "",
    };
  }
}
