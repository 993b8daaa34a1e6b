import type { ProtocolId, TypeId } from "../ids.js";

export interface ProtocolDecl {
  id: ProtocolId;
  name: string;
  associatedTypes: readonly string[];
  inherits: readonly ProtocolId[];
}

export interface AssociatedTypeRef {
  protocol: ProtocolId;
  name: string;
}

/**
 * Abstract conformances name the protocol only; they stand for "whatever
 * conformance the replacement has", which is all a forwarding substitution
 * can promise. Concrete conformances carry the witnesses for one type.
 */
export type ProtocolConformanceRef =
  | { kind: "abstract"; protocol: ProtocolId }
  | {
      kind: "concrete";
      protocol: ProtocolId;
      conformingType: TypeId;
      typeWitnesses: ReadonlyMap<string, TypeId>;
    };

export interface ProtocolTable {
  declare(desc: {
    name: string;
    associatedTypes?: readonly string[];
    inherits?: readonly ProtocolId[];
  }): ProtocolId;
  get(id: ProtocolId): Readonly<ProtocolDecl>;
  associatedType(protocol: ProtocolId, name: string): AssociatedTypeRef;
  /** The protocol itself followed by everything it refines, depth first. */
  allInherited(protocol: ProtocolId): readonly ProtocolId[];
}

export const createProtocolTable = (): ProtocolTable => {
  const decls: ProtocolDecl[] = [];

  const get = (id: ProtocolId): ProtocolDecl => {
    const decl = decls[id];
    if (!decl) {
      throw new Error(`unknown ProtocolId ${id}`);
    }
    return decl;
  };

  const declare = ({
    name,
    associatedTypes = [],
    inherits = [],
  }: {
    name: string;
    associatedTypes?: readonly string[];
    inherits?: readonly ProtocolId[];
  }): ProtocolId => {
    inherits.forEach((parent) => get(parent));
    const id = decls.length;
    decls.push({
      id,
      name,
      associatedTypes: [...associatedTypes],
      inherits: [...inherits],
    });
    return id;
  };

  const allInherited = (protocol: ProtocolId): readonly ProtocolId[] => {
    const seen = new Set<ProtocolId>();
    const visit = (current: ProtocolId): void => {
      if (seen.has(current)) return;
      seen.add(current);
      get(current).inherits.forEach(visit);
    };
    visit(protocol);
    return Array.from(seen);
  };

  const associatedType = (
    protocol: ProtocolId,
    name: string
  ): AssociatedTypeRef => {
    const owner = allInherited(protocol).find((candidate) =>
      get(candidate).associatedTypes.includes(name)
    );
    if (owner === undefined) {
      throw new Error(
        `protocol ${get(protocol).name} has no associated type ${name}`
      );
    }
    return { protocol: owner, name };
  };

  return { declare, get, associatedType, allInherited };
};

export const abstractConformance = (
  protocol: ProtocolId
): ProtocolConformanceRef => ({ kind: "abstract", protocol });

export const concreteConformance = ({
  protocol,
  conformingType,
  typeWitnesses = new Map(),
}: {
  protocol: ProtocolId;
  conformingType: TypeId;
  typeWitnesses?: ReadonlyMap<string, TypeId>;
}): ProtocolConformanceRef => ({
  kind: "concrete",
  protocol,
  conformingType,
  typeWitnesses,
});
