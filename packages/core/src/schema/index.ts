export * from "./types.js";
export { t } from "./fields.js";
export { defineKind, isKindOf } from "./defineKind.js";
export { KindRegistry } from "./KindRegistry.js";
export {
  checkFieldValue,
  copyFieldValue,
  describeFieldType,
  describeValue,
  isFieldValue,
  isPrimValue,
  parsePrim,
} from "./validate.js";
