import type { TypeId } from "../ids.js";
import { internalError } from "../../diagnostics/index.js";
import { incrementGenericsPerfCounter } from "../../perf.js";
import { abstractConformance } from "../types/protocols.js";
import type { SubstOptions, TypeArena } from "../types/type-arena.js";
import { formatType } from "../types/type-format.js";
import { buildArchetypeMap } from "./archetype-builder.js";
import type { GenericSignature, LookupConformanceFn } from "./generic-signature.js";
import { SubstitutionMap } from "./substitution-map.js";
import type { SubstitutionList } from "./substitution-list.js";

// Sugar survives both directions so mapped types still read the way the
// user spelled them.
const contextSubstOptions: SubstOptions = { preserveSugar: true };

/**
 * The archetypes one instantiation context of a generic declaration uses in
 * place of its generic parameters, and the substitutions between the two.
 *
 * Built once and never mutated afterwards; all queries are pure.
 */
export class GenericEnvironment {
  readonly signature: GenericSignature;
  readonly #interfaceToContext = new Map<TypeId, TypeId>();
  // Partial: only entries whose context type is an archetype appear here.
  readonly #archetypeToInterface = new Map<TypeId, TypeId>();

  constructor({
    signature,
    interfaceToContext,
  }: {
    signature: GenericSignature;
    interfaceToContext: ReadonlyMap<TypeId, TypeId>;
  }) {
    const arena = signature.arena;
    if (interfaceToContext.size === 0) {
      internalError({
        code: "GN0009",
        params: { kind: "empty-environment" },
      });
    }
    if (interfaceToContext.size !== signature.parameterCount) {
      internalError({
        code: "GN0001",
        params: {
          kind: "parameter-count-mismatch",
          expected: signature.parameterCount,
          received: interfaceToContext.size,
        },
      });
    }

    // Keys are canonicalized for substitution lookups; the reverse map keeps
    // the spelled parameter so mapTypeOutOfContext stays readable.
    interfaceToContext.forEach((contextType, param) => {
      const canonical = arena.getCanonicalType(param);
      if (arena.get(canonical).kind !== "generic-param") {
        internalError({
          code: "GN0010",
          params: {
            kind: "not-a-generic-parameter",
            type: formatType(arena, param),
          },
        });
      }
      if (this.#interfaceToContext.has(canonical)) {
        internalError({
          code: "GN0002",
          params: {
            kind: "duplicate-generic-parameter",
            param: formatType(arena, param),
          },
        });
      }
      this.#interfaceToContext.set(canonical, contextType);

      // FIXME: when several parameters share an archetype the reverse entry
      // depends on the dictionary's iteration order.
      if (arena.isArchetype(contextType)) {
        this.#archetypeToInterface.set(contextType, param);
      }
    });

    this.signature = signature;
    incrementGenericsPerfCounter("generics.environments");
  }

  get arena(): TypeArena {
    return this.signature.arena;
  }

  getGenericParams(): readonly TypeId[] {
    return this.signature.getGenericParams();
  }

  getInterfaceToContextMap(): ReadonlyMap<TypeId, TypeId> {
    return new Map(this.#interfaceToContext);
  }

  getArchetypeToInterfaceMap(): ReadonlyMap<TypeId, TypeId> {
    return new Map(this.#archetypeToInterface);
  }

  containsPrimaryArchetype(archetype: TypeId): boolean {
    return this.#archetypeToInterface.has(archetype);
  }

  mapTypeOutOfContext(type: TypeId): TypeId {
    const mapped = this.arena.substitute(
      type,
      this.#archetypeToInterface,
      contextSubstOptions
    );
    if (this.arena.hasArchetype(mapped)) {
      return internalError({
        code: "GN0003",
        params: {
          kind: "residual-archetype",
          type: formatType(this.arena, mapped),
        },
      });
    }
    return mapped;
  }

  mapTypeIntoContext(type: TypeId): TypeId {
    const mapped = this.arena.substitute(
      type,
      this.#interfaceToContext,
      contextSubstOptions
    );
    // Error types were diagnosed upstream; don't fail on them twice.
    if (this.arena.hasTypeParameter(mapped) && !this.arena.hasError(mapped)) {
      return internalError({
        code: "GN0004",
        params: {
          kind: "residual-type-parameter",
          type: formatType(this.arena, mapped),
        },
      });
    }
    return mapped;
  }

  mapGenericParamIntoContext(param: TypeId): TypeId {
    const found = this.#interfaceToContext.get(
      this.arena.getCanonicalType(param)
    );
    if (found === undefined) {
      return internalError({
        code: "GN0005",
        params: {
          kind: "missing-generic-parameter",
          param: formatType(this.arena, param),
        },
      });
    }
    return found;
  }

  getSugaredType(param: TypeId): TypeId {
    for (const sugared of this.getGenericParams()) {
      if (this.arena.isEqual(sugared, param)) {
        return sugared;
      }
    }
    return internalError({
      code: "GN0005",
      params: {
        kind: "missing-generic-parameter",
        param: formatType(this.arena, param),
      },
    });
  }

  /**
   * Substitutions that pass this environment's archetypes through unchanged,
   * shaped like the signature's dependent types.
   *
   * Conformances are the abstract ones of each requirement's protocol; they
   * are only good for forwarding and must not be combined with another
   * replacement type.
   */
  getForwardingSubstitutions(): SubstitutionList {
    const lookupConformance: LookupConformanceFn = (
      _original,
      _replacement,
      protocol
    ) => abstractConformance(protocol);

    return this.signature.getSubstitutions(
      this.#interfaceToContext,
      lookupConformance
    );
  }

  getSubstitutionMap(subs: SubstitutionList): SubstitutionMap {
    if (subs.signature !== this.signature) {
      return internalError({
        code: "GN0008",
        params: { kind: "foreign-substitution-list" },
      });
    }

    const arena = this.arena;
    const result = new SubstitutionMap();
    const dependentTypes = this.signature.getAllDependentTypes();
    const entries = subs.entries;
    let consumed = 0;

    for (const dependent of dependentTypes) {
      const contextType = arena.substitute(dependent, this.#interfaceToContext);
      if (!arena.isArchetype(contextType)) {
        return internalError({
          code: "GN0007",
          params: {
            kind: "dependent-type-not-archetype",
            type: formatType(arena, dependent),
            context: formatType(arena, contextType),
          },
        });
      }

      const sub = entries[consumed];
      if (sub === undefined) {
        break;
      }
      consumed += 1;

      result.addSubstitution(contextType, sub.replacement);
      result.addConformances(contextType, sub.conformances);
    }

    if (consumed !== dependentTypes.length || consumed !== entries.length) {
      return internalError({
        code: "GN0006",
        params: {
          kind: "substitution-count-mismatch",
          expected: dependentTypes.length,
          received: entries.length,
        },
      });
    }

    for (const req of this.signature.requirements) {
      if (req.kind !== "same-type") continue;

      const first = arena.get(arena.getCanonicalType(req.first));
      const second = arena.get(arena.getCanonicalType(req.second));
      if (first.kind !== "dependent-member" || second.kind !== "dependent-member") {
        continue;
      }

      const archetype = this.mapTypeIntoContext(req.first);
      if (!arena.isArchetype(archetype)) continue;

      const firstBase = this.mapTypeIntoContext(first.base);
      const secondBase = this.mapTypeIntoContext(second.base);
      if (!arena.isArchetype(firstBase) || !arena.isArchetype(secondBase)) {
        continue;
      }

      const parent = arena.getArchetype(archetype).parent;
      if (parent !== firstBase) {
        result.addParent(archetype, firstBase, first.associatedType);
      }
      if (parent !== secondBase) {
        result.addParent(archetype, secondBase, second.associatedType);
      }
    }

    incrementGenericsPerfCounter("generics.substitution-maps");
    return result;
  }
}

/** Builds the primary archetypes for a signature and wraps them. */
export const createPrimaryGenericEnvironment = (
  signature: GenericSignature
): GenericEnvironment =>
  new GenericEnvironment({
    signature,
    interfaceToContext: buildArchetypeMap(signature),
  });
