import type { TypeId } from "../ids.js";
import { internalError } from "../../diagnostics/index.js";
import type { ProtocolConformanceRef } from "../types/protocols.js";
import type { GenericSignature } from "./generic-signature.js";

export interface Substitution {
  replacement: TypeId;
  conformances: readonly ProtocolConformanceRef[];
}

/**
 * Substitutions in the order of `signature.getAllDependentTypes()`. The
 * signature travels with the entries so a list can only be applied to the
 * signature it was shaped for.
 */
export interface SubstitutionList {
  readonly signature: GenericSignature;
  readonly entries: readonly Substitution[];
}

export const createSubstitutionList = (
  signature: GenericSignature,
  entries: readonly Substitution[]
): SubstitutionList => {
  const expected = signature.getAllDependentTypes().length;
  if (entries.length !== expected) {
    return internalError({
      code: "GN0006",
      params: {
        kind: "substitution-count-mismatch",
        expected,
        received: entries.length,
      },
    });
  }
  return { signature, entries: [...entries] };
};
