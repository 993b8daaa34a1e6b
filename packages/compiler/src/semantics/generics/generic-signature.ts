import type { ProtocolId, TypeId } from "../ids.js";
import { internalError } from "../../diagnostics/index.js";
import type {
  LayoutConstraint,
  TypeArena,
  TypeSubstitution,
} from "../types/type-arena.js";
import { formatType } from "../types/type-format.js";
import type { ProtocolConformanceRef } from "../types/protocols.js";
import {
  createSubstitutionList,
  type Substitution,
  type SubstitutionList,
} from "./substitution-list.js";

export type Requirement =
  | { kind: "conformance"; subject: TypeId; protocol: ProtocolId }
  | { kind: "superclass"; subject: TypeId; superclass: TypeId }
  | { kind: "same-type"; first: TypeId; second: TypeId }
  | { kind: "layout"; subject: TypeId; layout: LayoutConstraint };

/** Type parameters a same-type requirement (transitively) makes equal. */
export interface EquivalenceClass {
  // First member in dependent-type enumeration order; canonical.
  anchor: TypeId;
  members: readonly TypeId[];
  concreteType?: TypeId;
  conformsTo: readonly ProtocolId[];
  superclass?: TypeId;
  layout?: LayoutConstraint;
}

export type LookupConformanceFn = (
  original: TypeId,
  replacement: TypeId,
  protocol: ProtocolId
) => ProtocolConformanceRef;

export interface GenericSignature {
  readonly arena: TypeArena;
  readonly requirements: readonly Requirement[];
  readonly parameterCount: number;
  /** Parameters as declared, sugar included. */
  getGenericParams(): readonly TypeId[];
  getCanonicalParams(): readonly TypeId[];
  /**
   * Every type parameter that needs its own replacement: one per
   * equivalence class not fixed to a concrete type, params first, then
   * requirement subjects in requirement order.
   */
  getAllDependentTypes(): readonly TypeId[];
  /** One anchor per equivalence class fixed to a concrete type. */
  getConcreteAnchors(): readonly TypeId[];
  getEquivalenceClass(type: TypeId): EquivalenceClass;
  getSubstitutions(
    substitution: TypeSubstitution,
    lookupConformance: LookupConformanceFn
  ): SubstitutionList;
}

interface MutableClass {
  anchor?: TypeId;
  members: TypeId[];
  concreteType?: TypeId;
  conformsTo: ProtocolId[];
  superclass?: TypeId;
  layout?: LayoutConstraint;
}

export const createGenericSignature = ({
  arena,
  params,
  requirements = [],
}: {
  arena: TypeArena;
  params: readonly TypeId[];
  requirements?: readonly Requirement[];
}): GenericSignature => {
  const declaredParams = [...params];
  const canonicalParams = declaredParams.map((param) => {
    const canonical = arena.getCanonicalType(param);
    if (arena.get(canonical).kind !== "generic-param") {
      return internalError({
        code: "GN0010",
        params: { kind: "not-a-generic-parameter", type: formatType(arena, param) },
      });
    }
    return canonical;
  });

  const parents = new Map<TypeId, TypeId>();

  const find = (type: TypeId): TypeId => {
    const next = parents.get(type);
    if (next === undefined || next === type) return type;
    const root = find(next);
    parents.set(type, root);
    return root;
  };

  // Members are keyed by their base's class root, so `U.A` and `T.A` share
  // a node once `T == U` is known.
  const reduce = (type: TypeId): TypeId => {
    const canonical = arena.getCanonicalType(type);
    const desc = arena.get(canonical);
    if (desc.kind !== "dependent-member") {
      return canonical;
    }
    const base = find(reduce(desc.base));
    return arena.isTypeParameter(base)
      ? arena.internDependentMember(base, desc.associatedType)
      : arena.internDependentMember(reduce(desc.base), desc.associatedType);
  };

  const union = (a: TypeId, b: TypeId): boolean => {
    const left = find(a);
    const right = find(b);
    if (left === right) return false;
    // Keep type parameters as roots so reduced bases stay type parameters.
    if (arena.isTypeParameter(left)) {
      parents.set(right, left);
    } else {
      parents.set(left, right);
    }
    return true;
  };

  const sameTypeRequirements = requirements.filter(
    (req): req is Extract<Requirement, { kind: "same-type" }> =>
      req.kind === "same-type"
  );

  // A later union can change the reduced form of an earlier member, so run
  // to a fixed point.
  let changed = true;
  while (changed) {
    changed = false;
    for (const req of sameTypeRequirements) {
      changed = union(reduce(req.first), reduce(req.second)) || changed;
    }
  }

  const candidates: TypeId[] = [...canonicalParams];
  requirements.forEach((req) => {
    const subjects =
      req.kind === "same-type" ? [req.first, req.second] : [req.subject];
    subjects
      .filter((subject) => arena.isTypeParameter(subject))
      .forEach((subject) => candidates.push(arena.getCanonicalType(subject)));
  });

  const classes = new Map<TypeId, MutableClass>();
  const classFor = (type: TypeId): MutableClass => {
    const root = find(reduce(type));
    const existing = classes.get(root);
    if (existing) return existing;
    const created: MutableClass = { members: [], conformsTo: [] };
    classes.set(root, created);
    return created;
  };

  candidates.forEach((candidate) => {
    const cls = classFor(candidate);
    cls.anchor ??= candidate;
    if (!cls.members.includes(candidate)) {
      cls.members.push(candidate);
    }
  });

  requirements.forEach((req) => {
    switch (req.kind) {
      case "conformance": {
        const cls = classFor(req.subject);
        if (!cls.conformsTo.includes(req.protocol)) {
          cls.conformsTo.push(req.protocol);
        }
        return;
      }
      case "superclass": {
        const cls = classFor(req.subject);
        cls.superclass ??= req.superclass;
        return;
      }
      case "layout": {
        const cls = classFor(req.subject);
        cls.layout ??= req.layout;
        return;
      }
      case "same-type": {
        const concrete = [req.first, req.second].find(
          (side) => !arena.isTypeParameter(side)
        );
        if (concrete === undefined) return;
        const cls = classFor(concrete);
        cls.concreteType ??= concrete;
        return;
      }
    }
  });

  const freeze = (root: TypeId, cls: MutableClass): EquivalenceClass => ({
    anchor: cls.anchor ?? root,
    members: cls.members.length > 0 ? [...cls.members] : [root],
    concreteType: cls.concreteType,
    conformsTo: [...cls.conformsTo],
    superclass: cls.superclass,
    layout: cls.layout,
  });

  const getEquivalenceClass = (type: TypeId): EquivalenceClass => {
    const root = find(reduce(type));
    return freeze(root, classes.get(root) ?? { members: [], conformsTo: [] });
  };

  // `T.Element` has no archetype of its own once `T` is concrete; it is
  // whatever the concrete type's witness says.
  const hasConcreteBase = (type: TypeId): boolean => {
    const desc = arena.get(type);
    if (desc.kind !== "dependent-member") return false;
    return (
      getEquivalenceClass(desc.base).concreteType !== undefined ||
      hasConcreteBase(desc.base)
    );
  };

  const dependentTypes: TypeId[] = [];
  const concreteAnchors: TypeId[] = [];
  const seenAnchors = new Set<TypeId>();
  candidates.forEach((candidate) => {
    const cls = getEquivalenceClass(candidate);
    if (seenAnchors.has(cls.anchor) || hasConcreteBase(candidate)) {
      return;
    }
    seenAnchors.add(cls.anchor);
    if (cls.concreteType !== undefined) {
      concreteAnchors.push(cls.anchor);
    } else {
      dependentTypes.push(cls.anchor);
    }
  });

  const signature: GenericSignature = {
    arena,
    requirements: [...requirements],
    parameterCount: declaredParams.length,
    getGenericParams: () => declaredParams,
    getCanonicalParams: () => canonicalParams,
    getAllDependentTypes: () => dependentTypes,
    getConcreteAnchors: () => concreteAnchors,
    getEquivalenceClass,
    getSubstitutions: (substitution, lookupConformance) => {
      const entries = dependentTypes.map((dependent): Substitution => {
        const replacement = arena.substitute(dependent, substitution);
        return {
          replacement,
          conformances: getEquivalenceClass(dependent).conformsTo.map(
            (protocol) => lookupConformance(dependent, replacement, protocol)
          ),
        };
      });
      return createSubstitutionList(signature, entries);
    },
  };

  return signature;
};
