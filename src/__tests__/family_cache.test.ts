import { describe, expect, it, vi } from "vitest";
import { Engine } from "../engine";
import type { Entity } from "../entity/entity";
import type { Family } from "../family/family";
import type { ComponentType } from "../component/component";
import { ECS_ERROR, ECSError } from "../utils/error";

class Position {
  constructor(
    public x = 0,
    public y = 0,
  ) {}
}
class Velocity {
  constructor(
    public dx = 0,
    public dy = 0,
  ) {}
}
class Health {
  hp = 10;
}
class Dead {}

/** Every cached family equals the live predicate, and every live entity's family bits agree. */
function expect_consistent(engine: Engine, families: Family[]): void {
  for (const family of families) {
    const expected = [...engine.entities]
      .filter((e) => family.is_member(e))
      .map((e) => e.id)
      .sort((x, y) => x - y);
    const cached = [...engine.entities_for_family(family)]
      .map((e) => e.id)
      .sort((x, y) => x - y);
    expect(cached).toEqual(expected);
    for (const entity of engine.entities) {
      expect(entity.family_bits.has(family.index)).toBe(
        family.is_member(entity),
      );
    }
  }
}

describe("Engine family cache", () => {
  //=========================================================
  // Lazy build
  //=========================================================

  it("first query scans live entities and sets their family bits", () => {
    const engine = new Engine();
    const mover = engine.create_entity().add(new Position()).add(new Velocity());
    const still = engine.create_entity().add(new Position());
    engine.add_entity(mover);
    engine.add_entity(still);

    const movers = engine.families.all(Position, Velocity);
    const members = engine.entities_for_family(movers);

    expect([...members]).toEqual([mover]);
    expect(mover.family_bits.has(movers.index)).toBe(true);
    expect(still.family_bits.has(movers.index)).toBe(false);
    expect(engine.cached_family_count).toBe(1);
  });

  it("later queries return the same live set without rescanning", () => {
    const engine = new Engine();
    const movers = engine.families.all(Position, Velocity);
    const entity = engine.create_entity().add(new Position());
    engine.add_entity(entity);

    const first = engine.entities_for_family(movers);
    const scan = vi.spyOn(movers, "is_member");
    const second = engine.entities_for_family(movers);

    expect(second).toBe(first);
    expect(scan).not.toHaveBeenCalled();

    entity.add(new Velocity());
    expect(first.has(entity)).toBe(true);
  });

  it("rejects a family built by another engine's registry", () => {
    const engine = new Engine();
    const foreign = new Engine().families.all(Position);

    let caught: unknown;
    try {
      engine.entities_for_family(foreign);
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(ECSError);
    if (caught instanceof ECSError) {
      expect(caught.category).toBe(ECS_ERROR.FAMILY_NOT_REGISTERED);
    }
  });

  //=========================================================
  // Incremental maintenance
  //=========================================================

  it("Position/Velocity scenario: join on add, leave on remove", () => {
    const engine = new Engine();
    expect(engine.components.bit_for(Position) as number).toBe(1);
    expect(engine.components.bit_for(Velocity) as number).toBe(2);

    const e = engine.create_entity().add(new Position());
    engine.add_entity(e);
    const family = engine.families.all(Position, Velocity);

    expect(engine.entities_for_family(family).size).toBe(0);

    const vel = new Velocity();
    e.component_bits.set(engine.components.bit_of(vel));
    engine.component_added(e, vel);
    expect([...engine.entities_for_family(family)]).toEqual([e]);

    const pos = e.get(Position);
    e.component_bits.clear(engine.components.bit_for(Position));
    engine.component_removed(e, pos ?? new Position());
    expect(engine.entities_for_family(family).size).toBe(0);
    expect(e.family_bits.has(family.index)).toBe(false);
  });

  it("component_added is O(families): no predicate runs for other entities", () => {
    const engine = new Engine();
    const family = engine.families.all(Position, Velocity);
    const others = Array.from({ length: 5 }, () =>
      engine.create_entity().add(new Position()),
    );
    for (const other of others) engine.add_entity(other);
    const target = engine.create_entity().add(new Position());
    engine.add_entity(target);
    engine.entities_for_family(family);

    const predicate = vi.spyOn(family, "is_member");
    target.add(new Velocity());

    expect(predicate).toHaveBeenCalledOnce();
    expect(predicate).toHaveBeenCalledWith(target);
  });

  it("a change that alters no predicate leaves every cache untouched", () => {
    const engine = new Engine();
    const movers = engine.families.all(Position, Velocity);
    const living = engine.families.get({ all: [Position], exclude: [Dead] });
    const a = engine.create_entity().add(new Position()).add(new Velocity());
    const b = engine.create_entity().add(new Position()).add(new Velocity());
    engine.add_entity(a);
    engine.add_entity(b);

    const mover_set = engine.entities_for_family(movers);
    const living_set = engine.entities_for_family(living);
    const bits_before = a.family_bits.to_array();

    // A delete + re-insert would move `a` behind `b` in iteration order
    a.add(new Health());
    a.remove(Health);
    a.add(new Velocity(9, 9));
    engine.component_added(a, new Position());

    expect([...mover_set]).toEqual([a, b]);
    expect([...living_set]).toEqual([a, b]);
    expect(a.family_bits.to_array()).toEqual(bits_before);
  });

  it("exclusion: gaining a component can drop membership, losing one can restore it", () => {
    const engine = new Engine();
    const living = engine.families.get({ all: [Health], exclude: [Dead] });
    const entity = engine.create_entity().add(new Health());
    engine.add_entity(entity);
    const members = engine.entities_for_family(living);
    expect(members.has(entity)).toBe(true);

    entity.add(new Dead());
    expect(members.has(entity)).toBe(false);
    expect(entity.family_bits.has(living.index)).toBe(false);

    entity.remove(Dead);
    expect(members.has(entity)).toBe(true);
    expect(entity.family_bits.has(living.index)).toBe(true);
  });

  it("ignores notifications for entities that are not live", () => {
    const engine = new Engine();
    const family = engine.families.all(Position);
    engine.entities_for_family(family);

    const stray = engine.create_entity().add(new Position());
    engine.component_added(stray, new Position());

    expect(engine.entities_for_family(family).size).toBe(0);
    expect(stray.family_bits.has(family.index)).toBe(false);
  });

  //=========================================================
  // Entity add / remove
  //=========================================================

  it("an entity added after a family was cached joins it immediately", () => {
    const engine = new Engine();
    const family = engine.families.all(Position);
    const members = engine.entities_for_family(family);

    const entity = engine.create_entity().add(new Position());
    engine.add_entity(entity);

    expect(members.has(entity)).toBe(true);
    expect(entity.family_bits.has(family.index)).toBe(true);
  });

  it("remove_entity purges the entity from cached families", () => {
    const engine = new Engine();
    const family = engine.families.all(Position, Velocity);
    const entity = engine.create_entity().add(new Position()).add(new Velocity());
    engine.add_entity(entity);
    expect(engine.entities_for_family(family).has(entity)).toBe(true);

    engine.remove_entity(entity);

    expect(engine.entities_for_family(family).has(entity)).toBe(false);
    expect(entity.family_bits.has(family.index)).toBe(false);
  });

  it("a removed and re-added entity rejoins its families", () => {
    const engine = new Engine();
    const family = engine.families.all(Position);
    const entity = engine.create_entity().add(new Position());
    engine.add_entity(entity);
    const members = engine.entities_for_family(family);

    engine.remove_entity(entity);
    engine.add_entity(entity);

    expect([...members]).toEqual([entity]);
  });

  //=========================================================
  // Consistency over an operation sequence
  //=========================================================

  it("caches match the live predicate after every operation", () => {
    const engine = new Engine();
    const types: ComponentType[] = [Position, Velocity, Health, Dead];
    const families = [
      engine.families.all(Position),
      engine.families.all(Position, Velocity),
      engine.families.get({ one: [Velocity, Health] }),
      engine.families.get({ all: [Health], exclude: [Dead] }),
    ];
    const make = [
      () => new Position(),
      () => new Velocity(),
      () => new Health(),
      () => new Dead(),
    ];

    // Deterministic LCG so the sequence is the same on every run
    let seed = 12345;
    const next = (n: number): number => {
      seed = (Math.imul(seed, 1103515245) + 12345) >>> 0;
      return seed % n;
    };

    const pool: Entity[] = Array.from({ length: 12 }, () =>
      engine.create_entity(),
    );

    // Query half the families up front, the rest part-way through
    engine.entities_for_family(families[0]);
    engine.entities_for_family(families[3]);

    for (let step = 0; step < 400; step++) {
      const entity = pool[next(pool.length)];
      const op = next(4);
      const kind = next(types.length);

      if (op === 0) {
        engine.add_entity(entity);
      } else if (op === 1) {
        engine.remove_entity(entity);
      } else if (op === 2) {
        entity.add(make[kind]());
      } else {
        entity.remove(types[kind]);
      }

      if (step === 200) {
        engine.entities_for_family(families[1]);
        engine.entities_for_family(families[2]);
      }

      const queried = step < 200 ? [families[0], families[3]] : families;
      expect_consistent(engine, queried);
    }
  });
});
