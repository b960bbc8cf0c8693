export {
  as_creation_order,
  as_tag,
  DEFAULT_START_TAG,
  type CreationOrder,
  type Tag,
  type Taggable,
} from "./tag";
export {
  TagRegistry,
  type EntityRef,
  type RegistryOptions,
} from "./tag_registry";
