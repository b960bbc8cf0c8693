/***
 *
 * TaggedEntity - Base of every model entity that carries a solver tag
 *
 * An entity's identity is the object itself plus the creation order its
 * registry stamped on it. The tag is only where the entity currently
 * sits in its kind's numbering, and it changes whenever an entity ahead
 * of it is removed or the kind's start tag moves. Code that needs to
 * remember an entity keeps the object, never the number.
 *
 * Reading `tag` or `creation_order` of an entity that was removed or
 * reset away throws ENTITY_DETACHED rather than returning a number that
 * may already belong to someone else.
 *
 * Kind bases register in their constructor, so a subclass resolves and
 * checks its arguments before calling super(). A subclass constructor
 * that throws after super() leaves a live entity nobody holds.
 *
 ***/

import {
  create_tag_slot,
  slot_creation_order,
  slot_tag,
  TAG_SLOT,
  type CreationOrder,
  type Tag,
  type Taggable,
  type TagSlot,
} from "../tag/tag";
import { TAG_ERROR, TagError } from "utils/error";

export abstract class TaggedEntity implements Taggable {
  public readonly [TAG_SLOT]: TagSlot = create_tag_slot();

  /** Kind name shared with the entity's registry, e.g. "material". */
  public abstract readonly kind: string;

  public get is_live(): boolean {
    return this[TAG_SLOT].owner !== null;
  }

  public get tag(): Tag {
    return slot_tag(this.live_slot());
  }

  public get creation_order(): CreationOrder {
    return slot_creation_order(this.live_slot());
  }

  /** Remove this entity from its registry; later entities shift down. */
  public abstract delete(): void;

  private live_slot(): TagSlot {
    const slot = this[TAG_SLOT];
    if (slot.owner === null) {
      throw new TagError(
        TAG_ERROR.ENTITY_DETACHED,
        `${this.kind} is not registered; its tag is no longer valid`,
        { kind: this.kind },
      );
    }
    return slot;
  }
}
