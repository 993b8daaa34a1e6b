export * from "./diagnostics/index.js";
export * from "./perf.js";
export type { ArchetypeId, ProtocolId, TypeId } from "./semantics/ids.js";
export * from "./semantics/types/type-arena.js";
export * from "./semantics/types/type-format.js";
export * from "./semantics/types/protocols.js";
export * from "./semantics/generics/index.js";
