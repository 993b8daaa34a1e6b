import type { ProtocolId, TypeId } from "../ids.js";
import type { AssociatedTypeRef, ProtocolConformanceRef } from "../types/protocols.js";
import type { TypeArena } from "../types/type-arena.js";

export interface ParentEdge {
  parent: TypeId;
  associatedType: AssociatedTypeRef;
}

/**
 * Replacement types, conformances and parent links keyed by archetype.
 *
 * Parent edges record the extra routes a same-type requirement opens to an
 * associated-type archetype (`A.X == B.Y` makes the archetype reachable from
 * both `A` and `B`), beyond the parent the archetype itself stores.
 */
export class SubstitutionMap {
  #replacements = new Map<TypeId, TypeId>();
  #conformances = new Map<TypeId, ProtocolConformanceRef[]>();
  #parents = new Map<TypeId, ParentEdge[]>();

  addSubstitution(archetype: TypeId, replacement: TypeId): void {
    this.#replacements.set(archetype, replacement);
  }

  addConformances(
    archetype: TypeId,
    conformances: readonly ProtocolConformanceRef[]
  ): void {
    const existing = this.#conformances.get(archetype) ?? [];
    this.#conformances.set(archetype, [...existing, ...conformances]);
  }

  addParent(
    archetype: TypeId,
    parent: TypeId,
    associatedType: AssociatedTypeRef
  ): void {
    const edges = this.#parents.get(archetype) ?? [];
    const duplicate = edges.some(
      (edge) =>
        edge.parent === parent &&
        edge.associatedType.protocol === associatedType.protocol &&
        edge.associatedType.name === associatedType.name
    );
    if (!duplicate) {
      this.#parents.set(archetype, [...edges, { parent, associatedType }]);
    }
  }

  getReplacement(archetype: TypeId): TypeId | undefined {
    return this.#replacements.get(archetype);
  }

  getConformances(archetype: TypeId): readonly ProtocolConformanceRef[] {
    return this.#conformances.get(archetype) ?? [];
  }

  getParents(archetype: TypeId): readonly ParentEdge[] {
    return this.#parents.get(archetype) ?? [];
  }

  lookupConformance(
    archetype: TypeId,
    protocol: ProtocolId
  ): ProtocolConformanceRef | undefined {
    return this.getConformances(archetype).find(
      (conformance) => conformance.protocol === protocol
    );
  }

  get size(): number {
    return this.#replacements.size;
  }

  archetypes(): TypeId[] {
    return Array.from(this.#replacements.keys());
  }

  /**
   * Replaces every archetype in a context type. Archetypes without a direct
   * replacement are reached through a parent (their own, then any recorded
   * edge) and projected through the associated type.
   */
  substitute(arena: TypeArena, type: TypeId): TypeId {
    const resolving = new Set<TypeId>();

    const projectFrom = (
      base: TypeId,
      associatedType: AssociatedTypeRef,
      parentArchetype: TypeId
    ): TypeId | undefined => {
      if (arena.isArchetype(base)) {
        return arena.getNestedType(base, associatedType);
      }
      const conformance = this.lookupConformance(
        parentArchetype,
        associatedType.protocol
      );
      if (conformance?.kind === "concrete") {
        return conformance.typeWitnesses.get(associatedType.name);
      }
      return undefined;
    };

    const replace = (archetype: TypeId): TypeId | undefined => {
      const direct = this.#replacements.get(archetype);
      if (direct !== undefined) {
        return direct;
      }
      if (resolving.has(archetype)) {
        return undefined;
      }
      resolving.add(archetype);

      const record = arena.getArchetype(archetype);
      const routes: ParentEdge[] = [
        ...(record.parent !== undefined && record.associatedType
          ? [{ parent: record.parent, associatedType: record.associatedType }]
          : []),
        ...this.getParents(archetype),
      ];

      for (const route of routes) {
        const base = replace(route.parent);
        if (base === undefined) continue;
        const projected = projectFrom(base, route.associatedType, route.parent);
        if (projected !== undefined) {
          resolving.delete(archetype);
          return projected;
        }
      }

      resolving.delete(archetype);
      return undefined;
    };

    return arena.substitute(type, (leaf) =>
      arena.isArchetype(leaf) ? replace(leaf) : undefined
    );
  }
}
