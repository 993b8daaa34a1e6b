import type { TypeId } from "../ids.js";
import { formatType } from "../types/type-format.js";
import type { GenericSignature } from "./generic-signature.js";

/**
 * Builds the interface-to-context dictionary a GenericEnvironment is
 * constructed from: one archetype per equivalence class, shared by every
 * member of the class, with associated-type archetypes linked to the
 * archetype of their base.
 *
 * Keys are the declared (possibly sugared) parameters.
 */
export const buildArchetypeMap = (
  signature: GenericSignature
): Map<TypeId, TypeId> => {
  const arena = signature.arena;
  const contexts = new Map<TypeId, TypeId>();
  const sugaredNames = new Map<TypeId, string>();

  signature.getGenericParams().forEach((param) => {
    sugaredNames.set(arena.getCanonicalType(param), formatType(arena, param));
  });

  const contextOf = (type: TypeId): TypeId => {
    const cls = signature.getEquivalenceClass(type);
    const known = contexts.get(cls.anchor);
    if (known !== undefined) {
      return known;
    }

    const context = (() => {
      if (cls.concreteType !== undefined) {
        return arena.substitute(cls.concreteType, (leaf) =>
          arena.isTypeParameter(leaf) ? contextOf(leaf) : undefined
        );
      }

      const anchor = arena.get(cls.anchor);
      const shared = {
        conformsTo: cls.conformsTo,
        superclass: cls.superclass,
        layout: cls.layout,
      };
      if (anchor.kind !== "dependent-member") {
        return arena.createArchetype({
          name: sugaredNames.get(cls.anchor) ?? formatType(arena, cls.anchor),
          ...shared,
        });
      }

      const parent = contextOf(anchor.base);
      if (!arena.isArchetype(parent)) {
        return arena.substitute(cls.anchor, (leaf) =>
          arena.isTypeParameter(leaf) ? contextOf(leaf) : undefined
        );
      }
      return arena.createArchetype({
        name: `${arena.getArchetype(parent).name}.${anchor.associatedType.name}`,
        parent,
        associatedType: anchor.associatedType,
        ...shared,
      });
    })();

    contexts.set(cls.anchor, context);

    // Every spelling of the class resolves to the same context type when
    // projected from its own base.
    cls.members.forEach((member) => {
      const desc = arena.get(member);
      if (desc.kind !== "dependent-member") return;
      const base = contextOf(desc.base);
      if (arena.isArchetype(base)) {
        arena.setNestedType(base, desc.associatedType.name, context);
      }
    });

    return context;
  };

  signature.getAllDependentTypes().forEach((dependent) => {
    contextOf(dependent);
  });
  // Registers `T.Element == Int` as the nested type of T's archetype, which
  // no dependent type reaches.
  signature.getConcreteAnchors().forEach((anchor) => {
    contextOf(anchor);
  });

  const result = new Map<TypeId, TypeId>();
  signature.getGenericParams().forEach((param) => {
    result.set(param, contextOf(param));
  });
  return result;
};
