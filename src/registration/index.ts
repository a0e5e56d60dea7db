export {
  rebuildTagRegistry,
  registerClass,
  registerSerializer,
  setTagGenerator,
  sharedSchemas,
  sharedSerializers,
  sharedTypeTags,
} from "./registration";
export { defineSchema } from "./define-schema";
