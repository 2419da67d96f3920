/***
 * Entity — An identity that owns components.
 *
 * Besides its components, every entity carries two BitSets:
 *
 *   component_bits — one bit per attached component class (ComponentBit)
 *   family_bits    — one bit per Family (FamilyIndex) the engine last
 *                    found this entity to match
 *
 * family_bits is a cache owned by the Engine: it lets component_added /
 * component_removed ask "already counted in this family?" in O(1). Only
 * the engine writes it.
 *
 * add()/remove() keep component_bits in step with the attached instances
 * and, while the entity is attached to an engine, announce the change
 * through engine.component_added / engine.component_removed. Code that
 * edits component_bits directly must make those calls itself.
 *
 * Usage:
 *
 *   const e = engine.create_entity();
 *   e.add(new Position(0, 0)).add(new Velocity(1, 0));
 *   engine.add_entity(e);
 *
 *   e.get(Position)?.x;
 *   e.remove(Velocity);
 *
 ***/

import {
  type Brand,
  BitSet,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import type { ComponentRegistry } from "../component/component_registry";
import type { ComponentType } from "../component/component";
import type { Engine } from "../engine";

export type EntityID = Brand<number, "entity_id">;
export const as_entity_id = (value: number) =>
  validate_and_cast<number, EntityID>(
    value,
    is_non_negative_integer,
    "EntityID must be a non-negative integer",
  );

export class Entity {
  public readonly component_bits: BitSet = new BitSet();
  public readonly family_bits: BitSet = new BitSet();

  private readonly attached: Map<Function, object> = new Map();
  private _engine: Engine | null = null;

  constructor(
    public readonly id: EntityID,
    public readonly registry: ComponentRegistry,
  ) {}

  /** The engine this entity is attached to, or null. */
  public get engine(): Engine | null {
    return this._engine;
  }

  /** Snapshot of attached component instances, in attach order. */
  public get components(): object[] {
    return [...this.attached.values()];
  }

  //=========================================================
  // Components
  //=========================================================

  /**
   * Attach a component, replacing any instance of the same class.
   * Announces the change to the owning engine, if any.
   */
  public add(component: object): this {
    const bit = this.registry.bit_of(component);
    this.attached.set(component.constructor, component);
    this.component_bits.set(bit);
    this._engine?.component_added(this, component);
    return this;
  }

  /**
   * Detach the component of class `type`. Returns the detached instance,
   * or undefined (and announces nothing) if none was attached.
   */
  public remove<T extends object>(type: ComponentType<T>): T | undefined {
    const component = this.attached.get(type);
    if (!(component instanceof type)) return undefined;

    this.attached.delete(type);
    this.component_bits.clear(this.registry.bit_for(type));
    this._engine?.component_removed(this, component);
    return component;
  }

  public get<T extends object>(type: ComponentType<T>): T | undefined {
    const component = this.attached.get(type);
    return component instanceof type ? component : undefined;
  }

  public has(type: ComponentType): boolean {
    return (
      this.registry.has(type) &&
      this.component_bits.has(this.registry.bit_for(type))
    );
  }

  //=========================================================
  // Engine lifecycle hooks
  //=========================================================

  /** Called by Engine.add_entity. */
  public added_to_engine(engine: Engine): void {
    this._engine = engine;
  }

  /** Called by Engine.remove_entity. */
  public removed_from_engine(engine: Engine): void {
    if (this._engine === engine) this._engine = null;
  }
}
