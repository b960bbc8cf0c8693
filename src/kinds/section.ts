import { TaggedEntity } from "../entity/entity";
import { TagRegistry } from "../tag/tag_registry";
import { ENTITY_KIND } from "./kind";

export type SectionRegistry = TagRegistry<Section>;

export const create_section_registry = (
  start_tag?: number,
): SectionRegistry =>
  new TagRegistry<Section>({
    kind: ENTITY_KIND.SECTION,
    start_tag,
    name_of: (section) => section.user_name,
  });

export abstract class Section extends TaggedEntity {
  public readonly kind = ENTITY_KIND.SECTION;

  constructor(
    protected readonly registry: SectionRegistry,
    public readonly section_type: string,
    public readonly section_name: string,
    public readonly user_name: string,
  ) {
    super();
    registry.register(this);
  }

  public delete(): void {
    this.registry.remove_entity(this);
  }
}
