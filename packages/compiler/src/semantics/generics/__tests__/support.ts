import { isInternalConsistencyError } from "../../../diagnostics/index.js";
import { createProtocolTable } from "../../types/protocols.js";
import { createTypeArena } from "../../types/type-arena.js";

export const captureInternalCode = (fn: () => unknown): string => {
  try {
    fn();
  } catch (error) {
    if (isInternalConsistencyError(error)) return error.code;
    throw error;
  }
  throw new Error("expected an internal consistency failure");
};

/** An arena with `Int`, `Bool`, two named parameters and a `Sequence` protocol. */
export const createGenericsWorld = () => {
  const arena = createTypeArena();
  const protocols = createProtocolTable();
  const sequence = protocols.declare({
    name: "Sequence",
    associatedTypes: ["Element"],
  });
  const equatable = protocols.declare({ name: "Equatable" });
  const element = protocols.associatedType(sequence, "Element");

  const t = arena.internGenericParam({ depth: 0, index: 0, name: "T" });
  const u = arena.internGenericParam({ depth: 0, index: 1, name: "U" });

  return {
    arena,
    protocols,
    sequence,
    equatable,
    element,
    t,
    u,
    canonicalT: arena.getCanonicalType(t),
    canonicalU: arena.getCanonicalType(u),
    int: arena.internPrimitive("Int"),
    bool: arena.internPrimitive("Bool"),
  };
};
