export { ENTITY_KIND, ENTITY_KINDS } from "./kind";
export {
  create_damping_registry,
  Damping,
  type DampingRegistry,
} from "./damping";
export {
  create_material_registry,
  Material,
  type MaterialRegistry,
} from "./material";
export {
  create_pattern_registry,
  Pattern,
  type PatternRegistry,
} from "./pattern";
export {
  create_section_registry,
  Section,
  type SectionRegistry,
} from "./section";
export {
  create_time_series_registry,
  TimeSeries,
  type TimeSeriesRegistry,
} from "./time_series";
export {
  create_transformation_registry,
  Transformation,
  type TransformationRegistry,
  type TransformationType,
} from "./transformation";
