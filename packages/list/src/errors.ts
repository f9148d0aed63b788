import {PolylistError} from "@polylist/utils";

export enum ListErrorCode {
  /** Index is not an integer in `[0, length)` */
  INDEX_OUT_OF_RANGE = "LIST_ERROR_INDEX_OUT_OF_RANGE",
  /** A `MutRef` was used after another operation on its list */
  STALE_REFERENCE = "LIST_ERROR_STALE_REFERENCE",
  /** The list was modified while an iterator over it was being consumed */
  CONCURRENT_MODIFICATION = "LIST_ERROR_CONCURRENT_MODIFICATION",
}

export type ListErrorType =
  | {code: ListErrorCode.INDEX_OUT_OF_RANGE; index: number; length: number}
  | {code: ListErrorCode.STALE_REFERENCE; index: number}
  | {code: ListErrorCode.CONCURRENT_MODIFICATION};

export class ListError extends PolylistError<ListErrorType> {
  constructor(type: ListErrorType) {
    super(type);
  }
}
