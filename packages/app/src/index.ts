export { ArrayElements, ObjectFields } from "./core/accessors.js"
export type { Accessors } from "./core/accessors.js"
export { fromJson, toJson } from "./core/convert.js"
export { formatAppError, formatLocation, formatParseError } from "./core/errors.js"
export type {
  AppError,
  ConfigError,
  FileError,
  JsonParseError,
  ParseFailureReason,
  ParseFileError,
  PathNotFound,
  SourceLocation
} from "./core/errors.js"
export type { Json, JsonObject } from "./core/json.js"
export { narrow, roundHalfEven } from "./core/numeric.js"
export type { IntegerWidth } from "./core/numeric.js"
export { DEFAULT_MAX_DEPTH, parse } from "./core/parse.js"
export type { ParseOptions } from "./core/parse.js"
export { resolvePath } from "./core/path.js"
export { formatNumber, quoteString, serialize } from "./core/serialize.js"
export type { SerializeOptions } from "./core/serialize.js"
export {
  appendItem,
  deleteItem,
  destroy,
  duplicate,
  equals,
  getElement,
  getItem,
  indexExists,
  initialCursor,
  isArray,
  isBoolean,
  isContainer,
  isNull,
  isNumber,
  isObject,
  isString,
  keyExists,
  keys,
  length,
  makeArray,
  makeBoolean,
  makeNull,
  makeNumber,
  makeObject,
  makeString,
  nextKey,
  ownerOf,
  setElement,
  setItem,
  size
} from "./core/value.js"
export type {
  ArrayValue,
  BooleanValue,
  ContainerValue,
  KeyStep,
  NullValue,
  NumberValue,
  ObjectCursor,
  ObjectValue,
  StringValue,
  Value,
  ValueTag
} from "./core/value.js"
export { DEFAULT_WRITE_OPTIONS, readDocument, writeDocument } from "./shell/document-file.js"
