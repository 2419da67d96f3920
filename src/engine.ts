/***
 * Engine — Owns entities, systems and the family cache.
 *
 * Entities and systems are created by the application and handed to the
 * engine with add_entity / add_system. The engine never creates or
 * destroys them on its own (create_entity only builds an Entity bound to
 * the engine's component registry; it does not add it).
 *
 * Family cache:
 *   entities_for_family(F) scans every live entity once, the first time F
 *   is asked for, and keeps the resulting Set. From then on the set is
 *   maintained incrementally: component_added / component_removed look at
 *   each cached family (O(families), never O(entities)) and use the
 *   entity's family_bits to tell whether it is already counted. The same
 *   Set object is returned on every call, so holders see live updates.
 *
 *   After every public call, for every cached family F:
 *     cache(F) = { e ∈ live entities : F.is_member(e) }
 *     e.family_bits.has(F.index) = F.is_member(e)   for every live e
 *
 * Component changes are not observed: Entity.add / Entity.remove announce
 * them for attached entities, and code that edits component_bits directly
 * must call component_added / component_removed itself.
 *
 * Systems run in registration order. Registering a second instance of a
 * class replaces the first in place; the replaced instance gets no
 * removed_from_engine call, only its `engine` reset to null. Systems
 * added or removed during update() take effect from the next update().
 *
 * Usage:
 *
 *   const engine = new Engine();
 *   const movers = engine.families.all(Position, Velocity);
 *
 *   const e = engine.create_entity().add(new Position()).add(new Velocity());
 *   engine.add_entity(e);
 *   engine.add_system(new MovementSystem(engine.families));
 *
 *   engine.entities_for_family(movers); // Set { e }
 *
 *   // game loop
 *   engine.update(1 / 60);
 *
 ***/

import { ComponentRegistry } from "./component/component_registry";
import { Entity, as_entity_id } from "./entity/entity";
import type { Family } from "./family/family";
import { FamilyRegistry } from "./family/family_registry";
import type { System, SystemType } from "./system/system";
import { SystemRegistry } from "./system/system_registry";
import { is_non_negative_finite } from "type_primitives";
import { ECS_ERROR, ECSError } from "./utils/error";
import { FIRST_ENTITY_ID } from "./utils/constants";

export interface EngineOptions {
  /** Component registry to share. Defaults to families.components, then a fresh registry. */
  components?: ComponentRegistry;
  /** Family registry to share. Must be built over the same component registry. */
  families?: FamilyRegistry;
}

export class Engine {
  public readonly components: ComponentRegistry;
  public readonly families: FamilyRegistry;

  private readonly system_registry: SystemRegistry = new SystemRegistry();
  private readonly live: Set<Entity> = new Set();
  private readonly family_cache: Map<Family, Set<Entity>> = new Map();
  private next_entity_id = FIRST_ENTITY_ID;

  constructor(options?: EngineOptions) {
    this.components =
      options?.components ??
      options?.families?.components ??
      new ComponentRegistry();
    this.families = options?.families ?? new FamilyRegistry(this.components);

    if (__DEV__) {
      if (this.families.components !== this.components) {
        throw new ECSError(
          ECS_ERROR.REGISTRY_MISMATCH,
          "FamilyRegistry was built over a different ComponentRegistry",
        );
      }
    }
  }

  //=========================================================
  // Introspection
  //=========================================================

  /** Live entities. Read-only view of the engine's own set. */
  public get entities(): ReadonlySet<Entity> {
    return this.live;
  }

  public get entity_count(): number {
    return this.live.size;
  }

  /** Registered systems in registration order. */
  public get systems(): System[] {
    return this.system_registry.get_all();
  }

  public get system_count(): number {
    return this.system_registry.count;
  }

  public has_entity(entity: Entity): boolean {
    return this.live.has(entity);
  }

  //=========================================================
  // Entities
  //=========================================================

  /** Build an entity with the next EntityID. The entity is not added. */
  public create_entity(): Entity {
    return new Entity(as_entity_id(this.next_entity_id++), this.components);
  }

  /**
   * Add an entity (again adding a live entity only reruns the hook).
   * Its membership in every already-cached family is settled before
   * entity.added_to_engine runs.
   */
  public add_entity(entity: Entity): void {
    if (__DEV__) {
      if (entity.registry !== this.components) {
        throw new ECSError(
          ECS_ERROR.REGISTRY_MISMATCH,
          `Entity ${entity.id} was built over a different ComponentRegistry`,
          { entity_id: entity.id },
        );
      }
      if (entity.engine !== null && entity.engine !== this) {
        throw new ECSError(
          ECS_ERROR.ENTITY_OWNED_BY_OTHER_ENGINE,
          `Entity ${entity.id} is already attached to another engine`,
          { entity_id: entity.id },
        );
      }
    }

    this.live.add(entity);
    this.refresh_memberships(entity);
    entity.added_to_engine(this);
  }

  /**
   * Remove an entity, purging it from every cached family and clearing
   * its family bits, then call entity.removed_from_engine.
   */
  public remove_entity(entity: Entity): void {
    if (this.live.delete(entity)) {
      for (const [family, members] of this.family_cache) {
        if (entity.family_bits.has(family.index)) {
          members.delete(entity);
          entity.family_bits.clear(family.index);
        }
      }
    }
    entity.removed_from_engine(this);
  }

  //=========================================================
  // Systems
  //=========================================================

  /**
   * Register `system` under its class, replacing any system of the same
   * class, then call system.added_to_engine. If the hook throws, the
   * registry is put back as it was. A replaced system gets no hook, but
   * its `engine` is reset to null.
   */
  public add_system(system: System): void {
    const previous = this.system_registry.set(system);
    try {
      system.added_to_engine(this);
    } catch (error) {
      this.system_registry.restore(system, previous);
      if (previous !== system) system.release_engine(this);
      throw error;
    }
    if (previous !== undefined && previous !== system) {
      previous.release_engine(this);
    }
  }

  /**
   * Unregister the system of class `type` and call its
   * removed_from_engine. Returns undefined (no hook) if none is
   * registered.
   */
  public remove_system<T extends System>(type: SystemType<T>): T | undefined {
    const system = this.system_registry.remove(type);
    system?.removed_from_engine(this);
    return system;
  }

  public system_for<T extends System>(type: SystemType<T>): T | undefined {
    return this.system_registry.get(type);
  }

  /** Run every system once, in registration order. */
  public update(delta_time: number): void {
    if (__DEV__) {
      if (!is_non_negative_finite(delta_time)) {
        throw new ECSError(
          ECS_ERROR.INVALID_DELTA_TIME,
          `delta_time must be a finite non-negative number, got ${delta_time}`,
          { delta_time },
        );
      }
    }
    this.system_registry.update_all(delta_time);
  }

  //=========================================================
  // Families
  //=========================================================

  /**
   * Live entities matching `family`. The first call per family scans all
   * entities; every later call returns the same, incrementally kept Set.
   */
  public entities_for_family(family: Family): ReadonlySet<Entity> {
    const cached = this.family_cache.get(family);
    if (cached !== undefined) return cached;

    if (__DEV__) {
      if (!this.families.owns(family)) {
        throw new ECSError(
          ECS_ERROR.FAMILY_NOT_REGISTERED,
          `Family ${family.index} was not built by this engine's FamilyRegistry`,
          { family_index: family.index },
        );
      }
    }

    const members = new Set<Entity>();
    for (const entity of this.live) {
      if (family.is_member(entity)) {
        members.add(entity);
        entity.family_bits.set(family.index);
      } else {
        entity.family_bits.clear(family.index);
      }
    }
    this.family_cache.set(family, members);
    return members;
  }

  /** Number of families queried so far. */
  public get cached_family_count(): number {
    return this.family_cache.size;
  }

  //=========================================================
  // Component change notifications
  //=========================================================

  /**
   * Call after attaching `component` to `entity`. Entities that are not
   * live are ignored.
   */
  public component_added(entity: Entity, _component: object): void {
    if (!this.live.has(entity)) return;
    this.refresh_memberships(entity);
  }

  /**
   * Call after detaching `component` from `entity`. Entities that are
   * not live are ignored.
   */
  public component_removed(entity: Entity, _component: object): void {
    if (!this.live.has(entity)) return;
    this.refresh_memberships(entity);
  }

  //=========================================================
  // Internal
  //=========================================================

  /**
   * Bring `entity`'s membership in every cached family in line with the
   * predicates. A family whose result did not change is left untouched.
   *
   * Exclusion masks mean a gain can drop a membership and a loss can add
   * one, so both directions are checked on every notification.
   */
  private refresh_memberships(entity: Entity): void {
    const family_bits = entity.family_bits;
    for (const [family, members] of this.family_cache) {
      const counted = family_bits.has(family.index);
      const matches = family.is_member(entity);
      if (matches === counted) continue;

      if (matches) {
        members.add(entity);
        family_bits.set(family.index);
      } else {
        members.delete(entity);
        family_bits.clear(family.index);
      }
    }
  }
}
