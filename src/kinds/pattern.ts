import { TaggedEntity } from "../entity/entity";
import { TagRegistry } from "../tag/tag_registry";
import { ENTITY_KIND } from "./kind";

export type PatternRegistry = TagRegistry<Pattern>;

export const create_pattern_registry = (start_tag?: number): PatternRegistry =>
  new TagRegistry<Pattern>({ kind: ENTITY_KIND.PATTERN, start_tag });

export abstract class Pattern extends TaggedEntity {
  public readonly kind = ENTITY_KIND.PATTERN;

  constructor(
    protected readonly registry: PatternRegistry,
    public readonly pattern_type: string,
  ) {
    super();
    registry.register(this);
  }

  public delete(): void {
    this.registry.remove_entity(this);
  }
}
