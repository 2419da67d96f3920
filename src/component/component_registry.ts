/***
 *
 * ComponentRegistry - Allocates one stable bit per component class
 *
 * bit_for() hands out FIRST_COMPONENT_BIT for the first class it sees,
 * then the next integer for every new class. Bits are never reused or
 * reassigned, so a class keeps its bit for the lifetime of the registry.
 * Lookups are memoized in a Map keyed by the class itself.
 *
 * There is no global instance. An Engine owns one (or is handed one
 * through EngineOptions), and every Entity carries the registry it was
 * created against.
 *
 ***/

import { as_component_bit, type ComponentBit, type ComponentType } from "./component";
import { FIRST_COMPONENT_BIT } from "../utils/constants";

export class ComponentRegistry {
  private readonly bits: Map<Function, ComponentBit> = new Map();
  private next_bit = FIRST_COMPONENT_BIT;

  /** Number of component classes seen so far. */
  public get count(): number {
    return this.bits.size;
  }

  /** Bit for `type`, allocated on first sight. */
  public bit_for(type: ComponentType): ComponentBit {
    return this.lookup_or_allocate(type);
  }

  /** Bit for the class of `component`. */
  public bit_of(component: object): ComponentBit {
    return this.lookup_or_allocate(component.constructor);
  }

  /** True once `type` has been assigned a bit. Never allocates. */
  public has(type: ComponentType): boolean {
    return this.bits.has(type);
  }

  private lookup_or_allocate(key: Function): ComponentBit {
    const existing = this.bits.get(key);
    if (existing !== undefined) return existing;

    const bit = as_component_bit(this.next_bit++);
    this.bits.set(key, bit);
    return bit;
  }
}
