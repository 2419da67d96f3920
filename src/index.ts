// Engine
export { Engine, type EngineOptions } from "./engine";

// Entities
export { Entity, type EntityID } from "./entity/entity";

// Components
export { ComponentRegistry } from "./component/component_registry";
export type { ComponentBit, ComponentType } from "./component/component";

// Families
export { Family, type FamilyIndex } from "./family/family";
export { FamilyRegistry, type FamilyConfig } from "./family/family_registry";

// Systems
export { System, type SystemType } from "./system/system";
export { IteratingSystem } from "./system/iterating_system";

// Errors
export { ECSError, ECS_ERROR, is_ecs_error } from "./utils/error";
export { BitSet } from "type_primitives";
