export {
  Model,
  type KindRegistry,
  type ModelOptions,
  type TagRow,
  type TagTable,
} from "./model";
