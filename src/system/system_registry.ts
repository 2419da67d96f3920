/***
 *
 * SystemRegistry - One system instance per System subclass
 *
 * Systems are stored in a Map keyed by their class, so iteration follows
 * insertion order. Replacing a system keeps the slot of the instance it
 * replaces. The registry calls no hooks; the Engine does.
 *
 ***/

import type { System, SystemType } from "./system";

export class SystemRegistry {
  private readonly systems: Map<Function, System> = new Map();

  /**
   * Store `system` under its class. Returns the instance it replaced,
   * if any.
   */
  public set(system: System): System | undefined {
    const key = system.constructor;
    const previous = this.systems.get(key);
    this.systems.set(key, system);
    return previous;
  }

  public get<T extends System>(type: SystemType<T>): T | undefined {
    const system = this.systems.get(type);
    return system instanceof type ? system : undefined;
  }

  /** Remove and return the system registered under `type`, if any. */
  public remove<T extends System>(type: SystemType<T>): T | undefined {
    const system = this.get(type);
    if (system !== undefined) this.systems.delete(type);
    return system;
  }

  /**
   * Undo a set(): put `previous` back in its slot, or drop `system`'s
   * class when it replaced nothing.
   */
  public restore(system: System, previous: System | undefined): void {
    if (previous !== undefined) {
      this.systems.set(previous.constructor, previous);
    } else {
      this.systems.delete(system.constructor);
    }
  }

  /**
   * Call update on every system in registration order. The systems
   * registered when the call starts each run once; systems added or
   * removed by an update take effect from the next call.
   */
  public update_all(delta_time: number): void {
    const systems = this.get_all();
    for (let i = 0; i < systems.length; i++) {
      systems[i].update(delta_time);
    }
  }

  /** Registered systems in registration order. */
  public get_all(): System[] {
    return [...this.systems.values()];
  }

  public get count(): number {
    return this.systems.size;
  }
}
