import { TaggedEntity } from "../entity/entity";
import { TagRegistry } from "../tag/tag_registry";
import { ENTITY_KIND } from "./kind";

export type DampingRegistry = TagRegistry<Damping>;

export const create_damping_registry = (start_tag?: number): DampingRegistry =>
  new TagRegistry<Damping>({ kind: ENTITY_KIND.DAMPING, start_tag });

/**
 * Damping specifications (Rayleigh, frequency-dependent, ...) are shared
 * by regions of the mesh, which refer to them by tag at export time.
 */
export abstract class Damping extends TaggedEntity {
  public readonly kind = ENTITY_KIND.DAMPING;

  constructor(
    protected readonly registry: DampingRegistry,
    public readonly damping_type: string,
  ) {
    super();
    registry.register(this);
  }

  public delete(): void {
    this.registry.remove_entity(this);
  }
}
