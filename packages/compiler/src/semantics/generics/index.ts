export * from "./generic-signature.js";
export * from "./substitution-list.js";
export * from "./substitution-map.js";
export * from "./generic-environment.js";
export { buildArchetypeMap } from "./archetype-builder.js";
