/**
 * The six entity kinds of a model. Each kind owns an independent
 * numbering: a material and a section may both hold tag 1.
 */
export enum ENTITY_KIND {
  MATERIAL = "material",
  DAMPING = "damping",
  PATTERN = "pattern",
  SECTION = "section",
  TIME_SERIES = "time_series",
  TRANSFORMATION = "transformation",
}

export const ENTITY_KINDS: readonly ENTITY_KIND[] = Object.values(ENTITY_KIND);
