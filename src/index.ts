export { Model } from "./model";
export type { KindRegistry, ModelOptions, TagRow, TagTable } from "./model";
export { TaggedEntity } from "./entity";
export {
  as_creation_order,
  as_tag,
  DEFAULT_START_TAG,
  TagRegistry,
} from "./tag";
export type {
  CreationOrder,
  EntityRef,
  RegistryOptions,
  Tag,
  Taggable,
} from "./tag";
export * from "./kinds";
export { AppError, is_tag_error, TAG_ERROR, TagError } from "./utils/error";
export {
  configure_logger,
  reset_logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
} from "./utils/logger";
