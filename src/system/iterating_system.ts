/***
 * IteratingSystem — A system that visits every member of one family.
 *
 * On attach it takes the engine's live entity set for its family; each
 * update then calls process_entity once per member. Iteration runs over
 * a snapshot, so process_entity may add or remove components (moving
 * entities in or out of the family) without disturbing the loop.
 *
 * Usage:
 *
 *   class MovementSystem extends IteratingSystem {
 *     constructor(families: FamilyRegistry) {
 *       super(families.all(Position, Velocity));
 *     }
 *     protected process_entity(entity: Entity, dt: number): void {
 *       const pos = entity.get(Position);
 *       const vel = entity.get(Velocity);
 *       if (pos && vel) pos.x += vel.dx * dt;
 *     }
 *   }
 *
 ***/

import type { Engine } from "../engine";
import type { Entity } from "../entity/entity";
import type { Family } from "../family/family";
import { System } from "./system";

const NO_ENTITIES: ReadonlySet<Entity> = new Set();

export abstract class IteratingSystem extends System {
  private members: ReadonlySet<Entity> = NO_ENTITIES;

  constructor(public readonly family: Family) {
    super();
  }

  /** Current members of the family (empty while detached). */
  public get entities(): ReadonlySet<Entity> {
    return this.members;
  }

  public override added_to_engine(engine: Engine): void {
    super.added_to_engine(engine);
    this.members = engine.entities_for_family(this.family);
  }

  public override removed_from_engine(engine: Engine): void {
    super.removed_from_engine(engine);
    this.members = NO_ENTITIES;
  }

  public update(delta_time: number): void {
    for (const entity of [...this.members]) {
      this.process_entity(entity, delta_time);
    }
  }

  protected abstract process_entity(entity: Entity, delta_time: number): void;
}
