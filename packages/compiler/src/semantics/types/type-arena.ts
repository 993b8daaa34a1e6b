import type { ArchetypeId, ProtocolId, TypeId } from "../ids.js";
import { internalError } from "../../diagnostics/index.js";
import { incrementGenericsPerfCounter } from "../../perf.js";
import type { AssociatedTypeRef } from "./protocols.js";

export type TypeDescriptor =
  | PrimitiveType
  | NominalType
  | TupleType
  | FunctionType
  | GenericParamType
  | DependentMemberType
  | ArchetypeType
  | TypeAliasType
  | ErrorType;

export interface PrimitiveType {
  kind: "primitive";
  name: string;
}

export interface NominalType {
  kind: "nominal";
  name: string;
  typeArgs: readonly TypeId[];
  isClass?: boolean;
}

export interface TupleType {
  kind: "tuple";
  elements: readonly TypeId[];
}

export interface FunctionType {
  kind: "function";
  parameters: readonly TypeId[];
  returnType: TypeId;
}

/** A formal generic parameter. Only the unnamed form is canonical. */
export interface GenericParamType {
  kind: "generic-param";
  depth: number;
  index: number;
  name?: string;
}

/** `base.Assoc`, where base is a type parameter or another dependent member. */
export interface DependentMemberType {
  kind: "dependent-member";
  base: TypeId;
  associatedType: AssociatedTypeRef;
}

export interface ArchetypeType {
  kind: "archetype";
  archetype: ArchetypeId;
}

export interface TypeAliasType {
  kind: "alias";
  name: string;
  underlying: TypeId;
}

export interface ErrorType {
  kind: "error";
}

export type LayoutConstraint = "class" | "trivial";

export interface ArchetypeRecord {
  id: ArchetypeId;
  type: TypeId;
  name: string;
  // Set for associated-type archetypes: the archetype they were projected
  // from and the associated type they project.
  parent?: TypeId;
  associatedType?: AssociatedTypeRef;
  conformsTo: readonly ProtocolId[];
  superclass?: TypeId;
  layout?: LayoutConstraint;
}

export type TypeSubstitutionMap = ReadonlyMap<TypeId, TypeId>;
export type TypeSubstitutionFn = (type: TypeId) => TypeId | undefined;
/**
 * Keys are canonical generic parameters or archetypes. Anything else in a
 * substituted type is rebuilt around its substituted leaves.
 */
export type TypeSubstitution = TypeSubstitutionMap | TypeSubstitutionFn;

export interface SubstOptions {
  // Rebuild aliases around their substituted underlying type instead of
  // dropping them.
  preserveSugar?: boolean;
  // Resolves `base.Assoc` once base has been replaced by a concrete type.
  lookupTypeWitness?: (
    base: TypeId,
    associatedType: AssociatedTypeRef
  ) => TypeId | undefined;
}

export interface TypeArena {
  get(id: TypeId): Readonly<TypeDescriptor>;
  internPrimitive(name: string): TypeId;
  internNominal(desc: Omit<NominalType, "kind">): TypeId;
  internTuple(elements: readonly TypeId[]): TypeId;
  internFunction(desc: Omit<FunctionType, "kind">): TypeId;
  internGenericParam(desc: Omit<GenericParamType, "kind">): TypeId;
  internDependentMember(
    base: TypeId,
    associatedType: AssociatedTypeRef
  ): TypeId;
  internTypeAlias(desc: Omit<TypeAliasType, "kind">): TypeId;
  errorType(): TypeId;
  createArchetype(desc: {
    name: string;
    parent?: TypeId;
    associatedType?: AssociatedTypeRef;
    conformsTo?: readonly ProtocolId[];
    superclass?: TypeId;
    layout?: LayoutConstraint;
  }): TypeId;
  isArchetype(type: TypeId): boolean;
  getArchetype(type: TypeId): Readonly<ArchetypeRecord>;
  getNestedType(archetype: TypeId, associatedType: AssociatedTypeRef): TypeId;
  setNestedType(archetype: TypeId, name: string, type: TypeId): void;
  nestedTypes(archetype: TypeId): ReadonlyMap<string, TypeId>;
  getCanonicalType(type: TypeId): TypeId;
  isCanonical(type: TypeId): boolean;
  isEqual(a: TypeId, b: TypeId): boolean;
  isTypeParameter(type: TypeId): boolean;
  hasArchetype(type: TypeId): boolean;
  hasTypeParameter(type: TypeId): boolean;
  hasError(type: TypeId): boolean;
  substitute(
    type: TypeId,
    substitution: TypeSubstitution,
    options?: SubstOptions
  ): TypeId;
}

const toLookup = (substitution: TypeSubstitution): TypeSubstitutionFn => {
  if (typeof substitution === "function") {
    return substitution;
  }
  const map = substitution;
  return (key) => map.get(key);
};

const HAS_ARCHETYPE = 1;
const HAS_TYPE_PARAMETER = 2;
const HAS_ERROR = 4;

export const createTypeArena = (): TypeArena => {
  let nextTypeId: TypeId = 0;

  const descriptors: TypeDescriptor[] = [];
  const descriptorCache = new Map<string, TypeId>();
  const archetypes: ArchetypeRecord[] = [];
  const nested = new Map<ArchetypeId, Map<string, TypeId>>();
  const canonicalCache = new Map<TypeId, TypeId>();
  const propertyCache = new Map<TypeId, number>();

  const keyFor = (desc: TypeDescriptor): string => JSON.stringify(desc);

  const storeDescriptor = (desc: TypeDescriptor): TypeId => {
    const key = keyFor(desc);
    const cached = descriptorCache.get(key);
    if (typeof cached === "number") {
      return cached;
    }

    const id = nextTypeId++;
    descriptors[id] = desc;
    descriptorCache.set(key, id);
    return id;
  };

  const getDescriptor = (id: TypeId): TypeDescriptor => {
    const desc = descriptors[id];
    if (!desc) {
      throw new Error(`unknown TypeId ${id}`);
    }

    return desc;
  };

  const internPrimitive = (name: string): TypeId =>
    storeDescriptor({ kind: "primitive", name });

  const internNominal = (desc: Omit<NominalType, "kind">): TypeId =>
    storeDescriptor({
      kind: "nominal",
      name: desc.name,
      typeArgs: [...desc.typeArgs],
      isClass: desc.isClass ?? false,
    });

  const internTuple = (elements: readonly TypeId[]): TypeId =>
    storeDescriptor({ kind: "tuple", elements: [...elements] });

  const internFunction = (desc: Omit<FunctionType, "kind">): TypeId =>
    storeDescriptor({
      kind: "function",
      parameters: [...desc.parameters],
      returnType: desc.returnType,
    });

  const internGenericParam = (desc: Omit<GenericParamType, "kind">): TypeId =>
    storeDescriptor(
      desc.name === undefined
        ? { kind: "generic-param", depth: desc.depth, index: desc.index }
        : {
            kind: "generic-param",
            depth: desc.depth,
            index: desc.index,
            name: desc.name,
          }
    );

  const internDependentMember = (
    base: TypeId,
    associatedType: AssociatedTypeRef
  ): TypeId =>
    storeDescriptor({
      kind: "dependent-member",
      base,
      associatedType: {
        protocol: associatedType.protocol,
        name: associatedType.name,
      },
    });

  const internTypeAlias = (desc: Omit<TypeAliasType, "kind">): TypeId =>
    storeDescriptor({
      kind: "alias",
      name: desc.name,
      underlying: desc.underlying,
    });

  const errorType = (): TypeId => storeDescriptor({ kind: "error" });

  const createArchetype = ({
    name,
    parent,
    associatedType,
    conformsTo = [],
    superclass,
    layout,
  }: {
    name: string;
    parent?: TypeId;
    associatedType?: AssociatedTypeRef;
    conformsTo?: readonly ProtocolId[];
    superclass?: TypeId;
    layout?: LayoutConstraint;
  }): TypeId => {
    const id = archetypes.length;
    const type = storeDescriptor({ kind: "archetype", archetype: id });
    archetypes.push({
      id,
      type,
      name,
      parent,
      associatedType,
      conformsTo: [...conformsTo],
      superclass,
      layout,
    });
    return type;
  };

  const isArchetype = (type: TypeId): boolean =>
    getDescriptor(type).kind === "archetype";

  const archetypeRecordOf = (type: TypeId): ArchetypeRecord | undefined => {
    const desc = getDescriptor(type);
    return desc.kind === "archetype" ? archetypes[desc.archetype] : undefined;
  };

  const getArchetype = (type: TypeId): ArchetypeRecord => {
    const record = archetypeRecordOf(type);
    if (!record) {
      return internalError({
        code: "GN0011",
        params: { kind: "not-an-archetype", type: `#${type}` },
      });
    }
    return record;
  };

  const nestedTableOf = (archetype: TypeId): Map<string, TypeId> => {
    const record = getArchetype(archetype);
    const existing = nested.get(record.id);
    if (existing) {
      return existing;
    }
    const table = new Map<string, TypeId>();
    nested.set(record.id, table);
    return table;
  };

  const setNestedType = (
    archetype: TypeId,
    name: string,
    type: TypeId
  ): void => {
    const table = nestedTableOf(archetype);
    const existing = table.get(name);
    if (existing === undefined) {
      table.set(name, type);
      return;
    }
    if (existing !== type) {
      internalError({
        code: "GN0012",
        params: {
          kind: "conflicting-nested-type",
          archetype: getArchetype(archetype).name,
          name,
          existing: `#${existing}`,
          incoming: `#${type}`,
        },
      });
    }
  };

  // Nested types the archetype builder did not fix up front are created on
  // first use, parented to the archetype they are projected from.
  const getNestedType = (
    archetype: TypeId,
    associatedType: AssociatedTypeRef
  ): TypeId => {
    const table = nestedTableOf(archetype);
    const existing = table.get(associatedType.name);
    if (existing !== undefined) {
      return existing;
    }
    const created = createArchetype({
      name: `${getArchetype(archetype).name}.${associatedType.name}`,
      parent: archetype,
      associatedType,
    });
    table.set(associatedType.name, created);
    return created;
  };

  const nestedTypes = (archetype: TypeId): ReadonlyMap<string, TypeId> =>
    new Map(nestedTableOf(archetype));

  const getCanonicalType = (type: TypeId): TypeId => {
    const cached = canonicalCache.get(type);
    if (cached !== undefined) {
      return cached;
    }

    const desc = getDescriptor(type);
    const canonical = (() => {
      switch (desc.kind) {
        case "primitive":
        case "archetype":
        case "error":
          return type;
        case "generic-param":
          return internGenericParam({ depth: desc.depth, index: desc.index });
        case "alias":
          return getCanonicalType(desc.underlying);
        case "dependent-member":
          return internDependentMember(
            getCanonicalType(desc.base),
            desc.associatedType
          );
        case "nominal":
          return internNominal({
            name: desc.name,
            typeArgs: desc.typeArgs.map(getCanonicalType),
            isClass: desc.isClass,
          });
        case "tuple":
          return internTuple(desc.elements.map(getCanonicalType));
        case "function":
          return internFunction({
            parameters: desc.parameters.map(getCanonicalType),
            returnType: getCanonicalType(desc.returnType),
          });
      }
    })();

    canonicalCache.set(type, canonical);
    canonicalCache.set(canonical, canonical);
    return canonical;
  };

  const isCanonical = (type: TypeId): boolean =>
    getCanonicalType(type) === type;

  const isEqual = (a: TypeId, b: TypeId): boolean =>
    a === b || getCanonicalType(a) === getCanonicalType(b);

  const isTypeParameter = (type: TypeId): boolean => {
    const kind = getDescriptor(getCanonicalType(type)).kind;
    return kind === "generic-param" || kind === "dependent-member";
  };

  const childrenOf = (desc: TypeDescriptor): readonly TypeId[] => {
    switch (desc.kind) {
      case "nominal":
        return desc.typeArgs;
      case "tuple":
        return desc.elements;
      case "function":
        return [...desc.parameters, desc.returnType];
      case "dependent-member":
        return [desc.base];
      case "alias":
        return [desc.underlying];
      default:
        return [];
    }
  };

  const propertiesOf = (type: TypeId): number => {
    const cached = propertyCache.get(type);
    if (cached !== undefined) {
      return cached;
    }

    const desc = getDescriptor(type);
    const own =
      desc.kind === "archetype"
        ? HAS_ARCHETYPE
        : desc.kind === "generic-param"
          ? HAS_TYPE_PARAMETER
          : desc.kind === "error"
            ? HAS_ERROR
            : 0;
    const flags = childrenOf(desc).reduce(
      (acc, child) => acc | propertiesOf(child),
      own
    );
    propertyCache.set(type, flags);
    return flags;
  };

  const hasArchetype = (type: TypeId): boolean =>
    (propertiesOf(type) & HAS_ARCHETYPE) !== 0;

  const hasTypeParameter = (type: TypeId): boolean =>
    (propertiesOf(type) & HAS_TYPE_PARAMETER) !== 0;

  const hasError = (type: TypeId): boolean =>
    (propertiesOf(type) & HAS_ERROR) !== 0;

  const stripSugar = (type: TypeId): TypeId => {
    const desc = getDescriptor(type);
    return desc.kind === "alias" ? stripSugar(desc.underlying) : type;
  };

  const substitute = (
    type: TypeId,
    substitution: TypeSubstitution,
    options?: SubstOptions
  ): TypeId => {
    if (typeof substitution !== "function" && substitution.size === 0) {
      return type;
    }
    incrementGenericsPerfCounter("generics.substitute");

    const lookup = toLookup(substitution);
    const resolved = new Map<TypeId, TypeId>();

    const projectMember = (
      base: TypeId,
      associatedType: AssociatedTypeRef
    ): TypeId => {
      const stripped = stripSugar(base);
      switch (getDescriptor(stripped).kind) {
        case "archetype":
          return getNestedType(stripped, associatedType);
        case "generic-param":
        case "dependent-member":
          return internDependentMember(base, associatedType);
        case "error":
          return errorType();
        default:
          return (
            options?.lookupTypeWitness?.(stripped, associatedType) ??
            errorType()
          );
      }
    };

    const rebuildAll = (
      types: readonly TypeId[]
    ): { types: TypeId[]; changed: boolean } => {
      const rebuilt = types.map(substituteInternal);
      return {
        types: rebuilt,
        changed: rebuilt.some((member, idx) => member !== types[idx]),
      };
    };

    const substituteInternal = (current: TypeId): TypeId => {
      const cached = resolved.get(current);
      if (cached !== undefined) {
        return cached;
      }

      const desc = getDescriptor(current);
      const result = (() => {
        switch (desc.kind) {
          case "primitive":
          case "error":
            return current;
          case "generic-param":
            return lookup(getCanonicalType(current)) ?? current;
          case "archetype": {
            const replacement = lookup(current);
            if (replacement !== undefined) {
              return replacement;
            }
            const record = getArchetype(current);
            if (record.parent === undefined || !record.associatedType) {
              return current;
            }
            const parent = substituteInternal(record.parent);
            return parent === record.parent
              ? current
              : projectMember(parent, record.associatedType);
          }
          case "dependent-member": {
            const base = substituteInternal(desc.base);
            return base === desc.base
              ? current
              : projectMember(base, desc.associatedType);
          }
          case "alias": {
            const underlying = substituteInternal(desc.underlying);
            if (underlying === desc.underlying) {
              return current;
            }
            return options?.preserveSugar
              ? internTypeAlias({ name: desc.name, underlying })
              : underlying;
          }
          case "nominal": {
            const args = rebuildAll(desc.typeArgs);
            return args.changed
              ? internNominal({
                  name: desc.name,
                  typeArgs: args.types,
                  isClass: desc.isClass,
                })
              : current;
          }
          case "tuple": {
            const elements = rebuildAll(desc.elements);
            return elements.changed ? internTuple(elements.types) : current;
          }
          case "function": {
            const parameters = rebuildAll(desc.parameters);
            const returnType = substituteInternal(desc.returnType);
            return parameters.changed || returnType !== desc.returnType
              ? internFunction({ parameters: parameters.types, returnType })
              : current;
          }
        }
      })();

      resolved.set(current, result);
      return result;
    };

    return substituteInternal(type);
  };

  const get = (id: TypeId): Readonly<TypeDescriptor> => getDescriptor(id);

  return {
    get,
    internPrimitive,
    internNominal,
    internTuple,
    internFunction,
    internGenericParam,
    internDependentMember,
    internTypeAlias,
    errorType,
    createArchetype,
    isArchetype,
    getArchetype,
    getNestedType,
    setNestedType,
    nestedTypes,
    getCanonicalType,
    isCanonical,
    isEqual,
    isTypeParameter,
    hasArchetype,
    hasTypeParameter,
    hasError,
    substitute,
  };
};
