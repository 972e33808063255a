export {
  type CollectionConversionError,
  type MemberConversionError,
  convertCollection,
  createCollection,
  requireAllConverted,
  hasCommonTimeUnit,
} from "./collection.js";
