/***
 *
 * Family - Immutable predicate over an entity's component bits
 *
 * A family is three masks built from component classes:
 *
 *   all     — every bit must be set
 *   one     — at least one bit must be set (ignored when empty)
 *   exclude — no bit may be set
 *
 * Each family has a FamilyIndex, handed out by the FamilyRegistry that
 * built it. The index is the bit position the Engine uses in every
 * entity's family_bits. A FamilyRegistry returns the same Family object
 * for the same three masks, so one predicate never has two indices.
 *
 ***/

import {
  type Brand,
  type BitSet,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import type { Entity } from "../entity/entity";

export type FamilyIndex = Brand<number, "family_index">;
export const as_family_index = (value: number) =>
  validate_and_cast<number, FamilyIndex>(
    value,
    is_non_negative_integer,
    "FamilyIndex must be a non-negative integer",
  );

export class Family {
  constructor(
    public readonly index: FamilyIndex,
    private readonly all_mask: BitSet,
    private readonly one_mask: BitSet,
    private readonly exclude_mask: BitSet,
  ) {}

  /** Component bits every member must have. */
  public get all(): number[] {
    return this.all_mask.to_array();
  }

  /** Component bits of which every member must have at least one. */
  public get one(): number[] {
    return this.one_mask.to_array();
  }

  /** Component bits no member may have. */
  public get exclude(): number[] {
    return this.exclude_mask.to_array();
  }

  public is_member(entity: Entity): boolean {
    return this.matches(entity.component_bits);
  }

  public matches(bits: BitSet): boolean {
    if (!bits.contains(this.all_mask)) return false;
    if (!this.one_mask.is_empty() && !bits.overlaps(this.one_mask)) {
      return false;
    }
    return !bits.overlaps(this.exclude_mask);
  }

  /** True if this family was built from exactly these masks. */
  public has_masks(all: BitSet, one: BitSet, exclude: BitSet): boolean {
    return (
      this.all_mask.equals(all) &&
      this.one_mask.equals(one) &&
      this.exclude_mask.equals(exclude)
    );
  }
}
