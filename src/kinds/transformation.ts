import { TaggedEntity } from "../entity/entity";
import { TagRegistry } from "../tag/tag_registry";
import { ENTITY_KIND } from "./kind";

/** Geometric transformations the solver understands for beam-column elements. */
export type TransformationType = "Linear" | "PDelta" | "Corotational";

export type TransformationRegistry = TagRegistry<Transformation>;

export const create_transformation_registry = (
  start_tag?: number,
): TransformationRegistry =>
  new TagRegistry<Transformation>({
    kind: ENTITY_KIND.TRANSFORMATION,
    start_tag,
  });

export abstract class Transformation extends TaggedEntity {
  public readonly kind = ENTITY_KIND.TRANSFORMATION;

  constructor(
    protected readonly registry: TransformationRegistry,
    public readonly transformation_type: TransformationType,
  ) {
    super();
    registry.register(this);
  }

  public delete(): void {
    this.registry.remove_entity(this);
  }
}
