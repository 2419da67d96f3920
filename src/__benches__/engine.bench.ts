import { bench, describe } from "vitest";
import { Engine } from "../engine";
import type { Entity } from "../entity/entity";

class Position {
  x = 0;
  y = 0;
}
class Velocity {
  dx = 1;
  dy = 1;
}
class Health {
  hp = 100;
}

const TIERS = [1_000, 10_000, 100_000] as const;
const FAMILY_COUNT = 32;

// ============================================================
// Helpers
// ============================================================

function make_engine(N: number) {
  const engine = new Engine();
  const entities: Entity[] = [];
  for (let i = 0; i < N; i++) {
    const e = engine.create_entity().add(new Position());
    if (i % 2 === 0) e.add(new Velocity());
    engine.add_entity(e);
    entities.push(e);
  }
  return { engine, entities };
}

// ============================================================
// First query — one full scan
// ============================================================

describe("entities_for_family (cold)", () => {
  for (const N of TIERS) {
    bench(`first query over ${N.toLocaleString()} entities`, () => {
      const { engine } = make_engine(N);
      engine.entities_for_family(engine.families.all(Position, Velocity));
    });
  }
});

// ============================================================
// Component churn — cost must not grow with entity count
// ============================================================

describe("component add/remove with cached families", () => {
  for (const N of TIERS) {
    const { engine, entities } = make_engine(N);
    engine.entities_for_family(engine.families.all(Position, Velocity));
    engine.entities_for_family(engine.families.all(Health));
    engine.entities_for_family(
      engine.families.get({ all: [Position], exclude: [Health] }),
    );
    const target = entities[0];

    bench(`toggle Health on 1 of ${N.toLocaleString()} entities`, () => {
      target.add(new Health());
      target.remove(Health);
    });
  }
});

describe("component add/remove vs cached family count", () => {
  const { engine, entities } = make_engine(1_000);
  // One marker class per family so every family is distinct
  const markers = Array.from({ length: FAMILY_COUNT }, () => class {});
  for (const marker of markers) {
    engine.entities_for_family(
      engine.families.get({ all: [Position], exclude: [marker] }),
    );
  }
  const target = entities[1];

  bench(`toggle Health with ${engine.cached_family_count} cached families`, () => {
    target.add(new Health());
    target.remove(Health);
  });
});
