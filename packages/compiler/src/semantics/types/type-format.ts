import type { TypeId } from "../ids.js";
import type { TypeArena } from "./type-arena.js";

export const canonicalParamName = (depth: number, index: number): string =>
  `τ_${depth}_${index}`;

// Render a type the way diagnostics spell it: sugar is kept, canonical
// parameters fall back to their depth/index name.
export const formatType = (arena: TypeArena, type: TypeId): string => {
  const desc = arena.get(type);
  switch (desc.kind) {
    case "primitive":
      return desc.name;
    case "nominal": {
      if (!desc.typeArgs.length) return desc.name;
      const inner = desc.typeArgs.map((arg) => formatType(arena, arg));
      return `${desc.name}<${inner.join(", ")}>`;
    }
    case "tuple":
      return `(${desc.elements.map((el) => formatType(arena, el)).join(", ")})`;
    case "function": {
      const params = desc.parameters.map((param) => formatType(arena, param));
      return `(${params.join(", ")}) -> ${formatType(arena, desc.returnType)}`;
    }
    case "generic-param":
      return desc.name ?? canonicalParamName(desc.depth, desc.index);
    case "dependent-member":
      return `${formatType(arena, desc.base)}.${desc.associatedType.name}`;
    case "archetype":
      return arena.getArchetype(type).name;
    case "alias":
      return desc.name;
    case "error":
      return "<<error type>>";
  }
};
