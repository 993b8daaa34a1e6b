import { describe, expect, it } from "vitest";
import {
  abstractConformance,
  concreteConformance,
  createProtocolTable,
} from "../protocols.js";

describe("protocol table", () => {
  it("finds associated types declared on refined protocols", () => {
    const protocols = createProtocolTable();
    const sequence = protocols.declare({
      name: "Sequence",
      associatedTypes: ["Element"],
    });
    const collection = protocols.declare({
      name: "Collection",
      associatedTypes: ["Index"],
      inherits: [sequence],
    });

    expect(protocols.associatedType(collection, "Element")).toEqual({
      protocol: sequence,
      name: "Element",
    });
    expect(protocols.associatedType(collection, "Index")).toEqual({
      protocol: collection,
      name: "Index",
    });
    expect(protocols.allInherited(collection)).toEqual([collection, sequence]);
  });

  it("rejects unknown associated types and protocols", () => {
    const protocols = createProtocolTable();
    const equatable = protocols.declare({ name: "Equatable" });

    expect(() => protocols.associatedType(equatable, "Element")).toThrow(
      "protocol Equatable has no associated type Element"
    );
    expect(() => protocols.get(7)).toThrow("unknown ProtocolId 7");
    expect(() => protocols.declare({ name: "Broken", inherits: [7] })).toThrow(
      "unknown ProtocolId 7"
    );
  });

  it("builds abstract and concrete conformance references", () => {
    const witnesses = new Map([["Element", 3]]);
    expect(abstractConformance(1)).toEqual({ kind: "abstract", protocol: 1 });
    expect(
      concreteConformance({
        protocol: 1,
        conformingType: 2,
        typeWitnesses: witnesses,
      })
    ).toEqual({
      kind: "concrete",
      protocol: 1,
      conformingType: 2,
      typeWitnesses: witnesses,
    });
  });
});
