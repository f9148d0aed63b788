export * from "./errors.js";
export {HeterogeneousList} from "./list.js";
export type {HeterogeneousListOpts, ListEntries} from "./list.js";
export {MutRef} from "./mutRef.js";
export type {ListItem} from "./slot.js";
export {ValueType, Types, defineType} from "./valueType.js";
export type {FormatFn, TypeInfo, ValueTypeOpts} from "./valueType.js";
