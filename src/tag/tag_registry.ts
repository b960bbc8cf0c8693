/***
 *
 * TagRegistry - Allocates, recycles and re-bases dense tags for one kind
 *
 * Where tag.ts describes the seat numbers, the registry is the usher.
 * It keeps the live entities of one kind in a single array ordered by
 * creation order, and the tag of every entity is simply its index in that
 * array shifted by start_tag:
 *
 *   live:  [ A(co=0), B(co=1), D(co=3) ]      start_tag = 10
 *   tags:      10        11       12
 *
 * Because the numbering is dense, looking up a tag is an index
 * computation (tag - start_tag) rather than a map lookup, and nothing
 * is ever keyed by tag: the array itself is the ordering.
 *
 * Internal state:
 *
 *   live[]               - Entities currently registered, ascending by
 *                          creation order. New arrivals are appended,
 *                          which keeps the order since the counter only
 *                          grows.
 *
 *   start               - Tag of live[0]. Defaults to 1.
 *
 *   next_creation_order - Stamped on the next registration, then bumped.
 *                         Removals never give a value back.
 *
 *   names               - Optional name -> entity index for kinds whose
 *                         entities carry a user-facing name (materials,
 *                         sections). Maintained only when the registry is
 *                         constructed with `name_of`.
 *
 * Every mutation either finishes with the invariant
 *
 *   live[i].tag === start + i      for all i
 *
 * restored, or throws before touching anything. In dev builds the
 * invariant is re-checked after every mutation.
 *
 ***/

import {
  as_creation_order,
  as_tag,
  DEFAULT_START_TAG,
  slot_tag,
  TAG_SLOT,
  UNASSIGNED,
  type CreationOrder,
  type Tag,
  type Taggable,
} from "./tag";
import { is_positive_integer } from "type_primitives";
import { TAG_ERROR, TagError } from "utils/error";
import { error_output, log_output, warn_output } from "utils/logger";

export interface RegistryOptions<T extends Taggable> {
  /** Kind name used in error messages and log lines, e.g. "material". */
  kind: string;
  /** Tag of the first entity. Must be a positive integer. */
  start_tag?: number;
  /** Enables the name index; duplicate names are rejected on register. */
  name_of?: (entity: T) => string;
}

/** Anything `resolve` accepts: a tag, a name, or the entity itself. */
export type EntityRef<T> = number | string | T;

export class TagRegistry<T extends Taggable> {
  public readonly kind: string;

  private live: T[] = [];
  private start: Tag;
  private next_creation_order = 0;

  private readonly name_of: ((entity: T) => string) | undefined;
  private readonly names = new Map<string, T>();

  constructor(options: RegistryOptions<T>) {
    this.kind = options.kind;
    this.name_of = options.name_of;
    this.start =
      options.start_tag === undefined
        ? DEFAULT_START_TAG
        : this.checked_start(options.start_tag);
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of live entities. */
  public get count(): number {
    return this.live.length;
  }

  /** Tag held by the earliest-created live entity. */
  public get start_tag(): Tag {
    return this.start;
  }

  /** Tag the next registered entity will receive. */
  public get next_tag(): Tag {
    return as_tag(this.start + this.live.length);
  }

  public has(tag: number): boolean {
    return this.index_of_tag(tag) !== -1;
  }

  public find(tag: number): T | undefined {
    const index = this.index_of_tag(tag);
    return index === -1 ? undefined : this.live[index];
  }

  public get(tag: number): T {
    const entity = this.find(tag);
    if (entity === undefined) {
      throw new TagError(
        TAG_ERROR.TAG_NOT_FOUND,
        `No ${this.kind} with tag ${tag}`,
        { kind: this.kind, tag },
      );
    }
    return entity;
  }

  public find_by_name(name: string): T | undefined {
    return this.names.get(name);
  }

  public get_by_name(name: string): T {
    const entity = this.names.get(name);
    if (entity === undefined) {
      throw new TagError(
        TAG_ERROR.NAME_NOT_FOUND,
        `No ${this.kind} named '${name}'`,
        { kind: this.kind, name },
      );
    }
    return entity;
  }

  /** Whether `entity` is currently live in this registry. */
  public contains(entity: T): boolean {
    return entity[TAG_SLOT].owner === this;
  }

  /**
   * Resolve a reference to a live entity of this kind.
   *
   * Numbers are read as tags, strings as names. An entity is accepted
   * as long as it is live here.
   */
  public resolve(ref: EntityRef<T>): T {
    if (typeof ref === "number") return this.get(ref);
    if (typeof ref === "string") return this.get_by_name(ref);
    if (!this.contains(ref)) {
      throw new TagError(
        TAG_ERROR.ENTITY_NOT_REGISTERED,
        `Entity is not a live ${this.kind}`,
        { kind: this.kind },
      );
    }
    return ref;
  }

  /** Live entities in creation order (which is also tag order). */
  public entities(): readonly T[] {
    return this.live.slice();
  }

  public tags(): Tag[] {
    return this.live.map((_, i) => as_tag(this.start + i));
  }

  public entries(): Array<[Tag, T]> {
    return this.live.map((entity, i) => [as_tag(this.start + i), entity]);
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Register a freshly constructed entity.
   *
   * Stamps the next creation order, appends the entity and writes its
   * tag, which is start_tag plus the number of entities ahead of it.
   * With a name index, a name already held by a live entity is refused
   * before anything changes.
   */
  public register(entity: T): Tag {
    const slot = entity[TAG_SLOT];
    if (slot.owner !== null) {
      throw new TagError(
        TAG_ERROR.ENTITY_ALREADY_REGISTERED,
        `Entity is already live with tag ${slot.tag}`,
        { kind: this.kind, tag: slot.tag },
      );
    }

    let name: string | undefined;
    if (this.name_of !== undefined) {
      name = this.name_of(entity);
      if (this.names.has(name)) {
        throw new TagError(
          TAG_ERROR.DUPLICATE_NAME,
          `${this.kind} name '${name}' already exists`,
          { kind: this.kind, name },
        );
      }
    }

    const next = this.start + this.live.length;
    if (!Number.isSafeInteger(next)) {
      throw new TagError(
        TAG_ERROR.TAG_OVERFLOW,
        `${this.kind} tags are exhausted: next tag ${next} is past ${Number.MAX_SAFE_INTEGER}`,
        { kind: this.kind, start_tag: this.start, count: this.live.length },
      );
    }

    const tag = as_tag(next);
    slot.creation_order = as_creation_order(this.next_creation_order++);
    slot.tag = tag;
    slot.owner = this;
    this.live.push(entity);
    if (name !== undefined) this.names.set(name, entity);

    if (__DEV__) this.check_density();
    return tag;
  }

  /**
   * Remove the entity holding `tag` and close the gap.
   *
   * Entities ahead of it keep their tags; every entity behind it moves
   * down by one. The removed entity is detached and returned.
   */
  public remove(tag: number): T {
    const index = this.index_of_tag(tag);
    if (index === -1) {
      throw new TagError(
        TAG_ERROR.TAG_NOT_FOUND,
        `Cannot remove ${this.kind}: no entity with tag ${tag}`,
        { kind: this.kind, tag },
      );
    }
    return this.remove_at(index);
  }

  /** Remove by identity rather than by the tag it currently holds. */
  public remove_entity(entity: T): T {
    if (!this.contains(entity)) {
      throw new TagError(
        TAG_ERROR.ENTITY_NOT_REGISTERED,
        `Cannot remove ${this.kind}: entity is not live in this registry`,
        { kind: this.kind },
      );
    }
    return this.remove_at(entity[TAG_SLOT].tag - this.start);
  }

  /**
   * Move the run so that it begins at `new_start`.
   *
   * Every live entity is renumbered, whether the new start lies above,
   * below or on the old one. Later registrations continue from
   * new_start + count. The last renumbered tag must stay a safe integer.
   */
  public set_start(new_start: number): void {
    const start = this.checked_start(new_start);
    const last = start + this.live.length - 1;
    if (this.live.length > 0 && !Number.isSafeInteger(last)) {
      warn_output(this.kind, `rejected start ${start}: last tag would be ${last}`);
      throw new TagError(
        TAG_ERROR.INVALID_START_TAG,
        `${this.kind} start tag ${start} leaves no room for ${this.live.length} entities`,
        { kind: this.kind, start_tag: start, count: this.live.length },
      );
    }
    this.start = start;
    this.retag_from(0);

    log_output(
      this.kind,
      `start set to ${start}, retagged ${this.live.length} entities`,
    );
    if (__DEV__) this.check_density();
  }

  /**
   * Detach every live entity and return to the default state:
   * start_tag 1, creation order counter 0.
   */
  public reset(): void {
    for (const entity of this.live) {
      this.detach(entity);
    }
    const detached = this.live.length;
    this.live = [];
    this.names.clear();
    this.start = DEFAULT_START_TAG;
    this.next_creation_order = 0;

    if (detached > 0) log_output(this.kind, `reset, detached ${detached}`);
  }

  public clear_all(): void {
    this.reset();
  }

  //=========================================================
  // Internal
  //=========================================================

  private index_of_tag(tag: number): number {
    const index = tag - this.start;
    return Number.isInteger(index) && index >= 0 && index < this.live.length
      ? index
      : -1;
  }

  private checked_start(value: number): Tag {
    if (!is_positive_integer(value)) {
      warn_output(this.kind, `rejected start ${value}`);
      throw new TagError(
        TAG_ERROR.INVALID_START_TAG,
        `${this.kind} start tag must be a positive integer, got ${value}`,
        { kind: this.kind, start_tag: value },
      );
    }
    return as_tag(value);
  }

  private remove_at(index: number): T {
    const [entity] = this.live.splice(index, 1);
    const removed_tag = slot_tag(entity[TAG_SLOT]);

    if (this.name_of !== undefined) {
      this.names.delete(this.name_of(entity));
    }
    this.detach(entity);
    const shifted = this.retag_from(index);

    log_output(
      this.kind,
      `removed tag ${removed_tag}, shifted ${shifted} entities down`,
    );
    if (__DEV__) this.check_density();
    return entity;
  }

  /** Rewrite tags from `index` onwards; returns how many changed. */
  private retag_from(index: number): number {
    let changed = 0;
    for (let i = index; i < this.live.length; i++) {
      const slot = this.live[i][TAG_SLOT];
      const tag = this.start + i;
      if (slot.tag !== tag) {
        slot.tag = tag;
        changed++;
      }
    }
    return changed;
  }

  private detach(entity: T): void {
    const slot = entity[TAG_SLOT];
    slot.tag = UNASSIGNED;
    slot.creation_order = UNASSIGNED;
    slot.owner = null;
  }

  /**
   * Verify the dense numbering and creation ordering. Dev builds only.
   */
  private check_density(): void {
    let previous: CreationOrder | undefined;
    for (let i = 0; i < this.live.length; i++) {
      const slot = this.live[i][TAG_SLOT];
      if (
        slot.owner !== this ||
        slot.tag !== this.start + i ||
        (previous !== undefined && slot.creation_order <= previous)
      ) {
        error_output(this.kind, `dense numbering broken at position ${i}`);
        throw new TagError(
          TAG_ERROR.DENSITY_VIOLATION,
          `${this.kind} registry lost its dense numbering at position ${i}`,
          { kind: this.kind, position: i, tag: slot.tag },
        );
      }
      previous = as_creation_order(slot.creation_order);
    }
  }
}
