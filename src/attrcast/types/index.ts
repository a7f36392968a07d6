// types/index.ts

export { BaseType, ValueType, type TypeObject } from "./value.js";
export {
  IntegerType,
  BigIntegerType,
  FloatType,
  DecimalType,
  isNumericString,
  type IntegerOptions,
  type DecimalOptions,
} from "./numeric.js";
export { BooleanType } from "./boolean.js";
export { StringType, type StringOptions } from "./string.js";
export { DateType, DateTimeType, type DateTimeOptions } from "./date.js";
export { JsonType } from "./json.js";
export { EnumType } from "./enum.js";
export { ArrayType, parsePgArray } from "./array.js";
