/***
 *
 * Component - Class-typed data attached to entities
 *
 * A component is any class instance. Its class is its type token: the
 * ComponentRegistry maps each distinct class to a ComponentBit the first
 * time it is seen, and an entity records the classes it owns as set bits
 * in its component BitSet. The fields of a component are never read by
 * the engine.
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_positive_integer,
} from "type_primitives";

//=========================================================
// ComponentBit
//=========================================================
export type ComponentBit = Brand<number, "component_bit">;
export const as_component_bit = (value: number) =>
  validate_and_cast<number, ComponentBit>(
    value,
    is_positive_integer,
    "ComponentBit must be a positive integer",
  );

//=========================================================
// ComponentType<T>
//=========================================================

/**
 * The class of a component. Abstract classes qualify, and constructor
 * parameters are unconstrained.
 */
export type ComponentType<T extends object = object> = abstract new (
  ...args: never[]
) => T;
