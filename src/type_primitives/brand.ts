/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only stops
 * values that share a representation from being mixed up.
 *
 * EntityID, ComponentBit and FamilyIndex are all plain numbers at
 * runtime, yet Brand<number, "entity_id"> will not accept a
 * Brand<number, "component_bit">.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
