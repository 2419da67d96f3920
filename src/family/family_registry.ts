/***
 *
 * FamilyRegistry - Interns families and assigns their indices
 *
 * get() turns component classes into masks through the ComponentRegistry
 * and looks the masks up in a hash-bucketed table (collisions resolved
 * with BitSet.equals). A new combination gets the next FamilyIndex; a
 * known one returns the Family built the first time.
 *
 * Usage:
 *
 *   const movers = families.all(Position, Velocity);
 *   const targets = families.get({
 *     all: [Position],
 *     one: [Player, Npc],
 *     exclude: [Dead],
 *   });
 *
 ***/

import { BitSet } from "type_primitives";
import type { ComponentRegistry } from "../component/component_registry";
import type { ComponentType } from "../component/component";
import { as_family_index, Family } from "./family";
import { bucket_push } from "../utils/arrays";
import {
  FIRST_FAMILY_INDEX,
  HASH_GOLDEN_RATIO,
  HASH_SECONDARY_PRIME,
} from "../utils/constants";

export interface FamilyConfig {
  all?: readonly ComponentType[];
  one?: readonly ComponentType[];
  exclude?: readonly ComponentType[];
}

export class FamilyRegistry {
  // hash(all, one, exclude) → families sharing that hash
  private readonly buckets: Map<number, Family[]> = new Map();
  private readonly families: Family[] = [];

  constructor(public readonly components: ComponentRegistry) {}

  /** Number of distinct families built so far. */
  public get count(): number {
    return this.families.length;
  }

  public get(config: FamilyConfig): Family {
    const all = this.mask_for(config.all);
    const one = this.mask_for(config.one);
    const exclude = this.mask_for(config.exclude);

    const key =
      (all.hash() ^
        Math.imul(one.hash(), HASH_GOLDEN_RATIO) ^
        Math.imul(exclude.hash(), HASH_SECONDARY_PRIME)) |
      0;

    const bucket = this.buckets.get(key);
    if (bucket !== undefined) {
      for (let i = 0; i < bucket.length; i++) {
        if (bucket[i].has_masks(all, one, exclude)) return bucket[i];
      }
    }

    const family = new Family(
      as_family_index(FIRST_FAMILY_INDEX + this.families.length),
      all,
      one,
      exclude,
    );
    this.families.push(family);
    bucket_push(this.buckets, key, family);
    return family;
  }

  /** Shorthand for get({ all: types }). */
  public all(...types: ComponentType[]): Family {
    return this.get({ all: types });
  }

  /** True if `family` was built by this registry. */
  public owns(family: Family): boolean {
    return this.families[family.index - FIRST_FAMILY_INDEX] === family;
  }

  private mask_for(types: readonly ComponentType[] | undefined): BitSet {
    const mask = new BitSet();
    if (types === undefined) return mask;
    for (let i = 0; i < types.length; i++) {
      mask.set(this.components.bit_for(types[i]));
    }
    return mask;
  }
}
