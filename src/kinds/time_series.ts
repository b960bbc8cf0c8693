import { TaggedEntity } from "../entity/entity";
import { TagRegistry } from "../tag/tag_registry";
import { ENTITY_KIND } from "./kind";

export type TimeSeriesRegistry = TagRegistry<TimeSeries>;

export const create_time_series_registry = (
  start_tag?: number,
): TimeSeriesRegistry =>
  new TagRegistry<TimeSeries>({ kind: ENTITY_KIND.TIME_SERIES, start_tag });

export abstract class TimeSeries extends TaggedEntity {
  public readonly kind = ENTITY_KIND.TIME_SERIES;

  constructor(
    protected readonly registry: TimeSeriesRegistry,
    /** e.g. "Constant", "Linear", "Path" */
    public readonly series_type: string,
  ) {
    super();
    registry.register(this);
  }

  public delete(): void {
    this.registry.remove_entity(this);
  }
}
