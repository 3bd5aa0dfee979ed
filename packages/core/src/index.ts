export type { DataValue, DataTable } from './value';
export { isTable, isArray, setEntry, toDataValue, cloneValue, valuesEqual, getPath } from './value';
export { parseToml, stringifyToml } from './toml';
export { mergeValues, mergeInto } from './merge';
export * from './errors';
