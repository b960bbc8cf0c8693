/***
 *
 * Model - One tag registry per entity kind, held explicitly
 *
 * A model owns six independent registries. Entities are constructed
 * against the registry of their kind:
 *
 *   const model = new Model();
 *   const steel = new Steel01(model.materials, "steel");
 *   const fiber = new FiberSection(model.sections, "column");
 *
 * Two models never share numbering, so a model can be rebuilt from
 * scratch in the same process by creating a new one or by `reset()`.
 *
 ***/

import type { Tag, CreationOrder } from "../tag/tag";
import type { TaggedEntity } from "../entity/entity";
import { ENTITY_KIND, ENTITY_KINDS } from "../kinds/kind";
import {
  create_damping_registry,
  type DampingRegistry,
} from "../kinds/damping";
import {
  create_material_registry,
  type MaterialRegistry,
} from "../kinds/material";
import {
  create_pattern_registry,
  type PatternRegistry,
} from "../kinds/pattern";
import {
  create_section_registry,
  type SectionRegistry,
} from "../kinds/section";
import {
  create_time_series_registry,
  type TimeSeriesRegistry,
} from "../kinds/time_series";
import {
  create_transformation_registry,
  type TransformationRegistry,
} from "../kinds/transformation";
import { log_output } from "utils/logger";

export interface ModelOptions {
  /** Initial start tag per kind; kinds left out start at 1. */
  start_tags?: Partial<Record<ENTITY_KIND, number>>;
}

export interface TagRow {
  tag: Tag;
  creation_order: CreationOrder;
}

export type TagTable = Record<ENTITY_KIND, TagRow[]>;

export type KindRegistry =
  | MaterialRegistry
  | DampingRegistry
  | PatternRegistry
  | SectionRegistry
  | TimeSeriesRegistry
  | TransformationRegistry;

export class Model {
  public readonly materials: MaterialRegistry;
  public readonly dampings: DampingRegistry;
  public readonly patterns: PatternRegistry;
  public readonly sections: SectionRegistry;
  public readonly time_series: TimeSeriesRegistry;
  public readonly transformations: TransformationRegistry;

  private readonly by_kind: Record<ENTITY_KIND, KindRegistry>;

  constructor(options: ModelOptions = {}) {
    const start = options.start_tags ?? {};

    this.materials = create_material_registry(start[ENTITY_KIND.MATERIAL]);
    this.dampings = create_damping_registry(start[ENTITY_KIND.DAMPING]);
    this.patterns = create_pattern_registry(start[ENTITY_KIND.PATTERN]);
    this.sections = create_section_registry(start[ENTITY_KIND.SECTION]);
    this.time_series = create_time_series_registry(
      start[ENTITY_KIND.TIME_SERIES],
    );
    this.transformations = create_transformation_registry(
      start[ENTITY_KIND.TRANSFORMATION],
    );

    this.by_kind = {
      [ENTITY_KIND.MATERIAL]: this.materials,
      [ENTITY_KIND.DAMPING]: this.dampings,
      [ENTITY_KIND.PATTERN]: this.patterns,
      [ENTITY_KIND.SECTION]: this.sections,
      [ENTITY_KIND.TIME_SERIES]: this.time_series,
      [ENTITY_KIND.TRANSFORMATION]: this.transformations,
    };
  }

  public registry(kind: ENTITY_KIND): KindRegistry {
    return this.by_kind[kind];
  }

  /** Total live entities across all kinds. */
  public get count(): number {
    let total = 0;
    for (const kind of ENTITY_KINDS) total += this.by_kind[kind].count;
    return total;
  }

  /** Reset every registry to its default empty state. */
  public reset(): void {
    for (const kind of ENTITY_KINDS) this.by_kind[kind].reset();
    log_output("model", "all registries reset");
  }

  /**
   * Current numbering of every kind, in tag order. This is what an
   * exporter walks when it writes the solver script.
   */
  public tag_table(): TagTable {
    const rows = (kind: ENTITY_KIND): TagRow[] => {
      const live: readonly TaggedEntity[] = this.by_kind[kind].entities();
      return live.map((entity) => ({
        tag: entity.tag,
        creation_order: entity.creation_order,
      }));
    };

    return {
      [ENTITY_KIND.MATERIAL]: rows(ENTITY_KIND.MATERIAL),
      [ENTITY_KIND.DAMPING]: rows(ENTITY_KIND.DAMPING),
      [ENTITY_KIND.PATTERN]: rows(ENTITY_KIND.PATTERN),
      [ENTITY_KIND.SECTION]: rows(ENTITY_KIND.SECTION),
      [ENTITY_KIND.TIME_SERIES]: rows(ENTITY_KIND.TIME_SERIES),
      [ENTITY_KIND.TRANSFORMATION]: rows(ENTITY_KIND.TRANSFORMATION),
    };
  }
}
