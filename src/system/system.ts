/***
 * System — Per-frame processor registered with an Engine.
 *
 * A system is keyed by its class: an engine holds at most one instance
 * of each System subclass. The engine drives three hooks:
 *
 *   added_to_engine(engine)    — after add_system stores it
 *   update(delta_time)         — once per engine.update(delta_time)
 *   removed_from_engine(engine) — after remove_system takes it out
 *
 * Subclasses overriding the lifecycle hooks call super so that
 * `engine` stays accurate.
 *
 ***/

import type { Engine } from "../engine";

export type SystemType<T extends System = System> = abstract new (
  ...args: never[]
) => T;

export abstract class System {
  private _engine: Engine | null = null;

  /** The engine this system is registered with, or null. */
  public get engine(): Engine | null {
    return this._engine;
  }

  public added_to_engine(engine: Engine): void {
    this._engine = engine;
  }

  public removed_from_engine(engine: Engine): void {
    if (this._engine === engine) this._engine = null;
  }

  /**
   * Forget `engine` without running removed_from_engine. Used when the
   * engine silently replaces this system with another of its class.
   */
  public release_engine(engine: Engine): void {
    if (this._engine === engine) this._engine = null;
  }

  public abstract update(delta_time: number): void;
}
