/***
 *
 * Tag - Solver handle of a model entity
 *
 * The exported solver script names every material, section, load pattern
 * and so on by a small positive integer. Within one kind those integers
 * form an unbroken run:
 *
 *   start_tag, start_tag + 1, ..., start_tag + count - 1
 *
 * and the position of an entity in that run is fixed by the order in
 * which it was registered. When an entity leaves, everything behind it
 * slides forward one seat; when the run is moved to a new start, the
 * whole run moves with it. A tag is therefore a *seat number*, never an
 * identity: two reads of the same entity's tag can differ.
 *
 * What stays put is the creation order - a counter stamped once at
 * registration and never handed out again by that registry.
 *
 *   creation order:   0    1    3    4        (2 was removed)
 *   tag (start 10):  10   11   12   13
 *
 * The registry keeps both values inside a TagSlot that every taggable
 * object carries under the TAG_SLOT symbol. Only the registry writes the
 * slot; entities read from it.
 *
 ***/

import {
  type Brand,
  is_non_negative_integer,
  is_positive_integer,
  unsafe_cast,
  validate_and_cast,
  VALIDATION_ERROR,
} from "type_primitives";

export type Tag = Brand<number, "tag">;
export type CreationOrder = Brand<number, "creation_order">;

export const DEFAULT_START_TAG = unsafe_cast<Tag>(1);

/** Marks slot fields of an entity that is not live in any registry. */
export const UNASSIGNED = -1;

export const as_tag = (value: number): Tag =>
  validate_and_cast<Tag>(
    value,
    is_positive_integer,
    VALIDATION_ERROR.NOT_A_POSITIVE_INTEGER,
  );

export const as_creation_order = (value: number): CreationOrder =>
  validate_and_cast<CreationOrder>(
    value,
    is_non_negative_integer,
    VALIDATION_ERROR.NOT_A_NON_NEGATIVE_INTEGER,
  );

//=========================================================
// Slot
//=========================================================

export const TAG_SLOT = Symbol("tag_slot");

export interface TagSlot {
  tag: number;
  creation_order: number;
  /** The registry the entity is live in, or null while detached. */
  owner: object | null;
}

export interface Taggable {
  readonly [TAG_SLOT]: TagSlot;
}

export const create_tag_slot = (): TagSlot => ({
  tag: UNASSIGNED,
  creation_order: UNASSIGNED,
  owner: null,
});

/** Read a slot field that is known to hold an assigned tag. */
export const slot_tag = (slot: TagSlot): Tag => unsafe_cast<Tag>(slot.tag);

export const slot_creation_order = (slot: TagSlot): CreationOrder =>
  unsafe_cast<CreationOrder>(slot.creation_order);
