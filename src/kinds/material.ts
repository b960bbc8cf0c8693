import { TaggedEntity } from "../entity/entity";
import { TagRegistry } from "../tag/tag_registry";
import { ENTITY_KIND } from "./kind";

export type MaterialRegistry = TagRegistry<Material>;

/** Materials are looked up by user name as well as by tag. */
export const create_material_registry = (
  start_tag?: number,
): MaterialRegistry =>
  new TagRegistry<Material>({
    kind: ENTITY_KIND.MATERIAL,
    start_tag,
    name_of: (material) => material.user_name,
  });

export abstract class Material extends TaggedEntity {
  public readonly kind = ENTITY_KIND.MATERIAL;

  constructor(
    protected readonly registry: MaterialRegistry,
    /** Solver command family, e.g. "uniaxialMaterial" or "nDMaterial". */
    public readonly material_type: string,
    public readonly material_name: string,
    public readonly user_name: string,
  ) {
    super();
    registry.register(this);
  }

  public delete(): void {
    this.registry.remove_entity(this);
  }
}
