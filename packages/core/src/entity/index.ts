export { Entity, isEntityOf } from "./Entity.js";
export { Container } from "./Container.js";
export type { ContainerOptions, FilterCriteria } from "./Container.js";
