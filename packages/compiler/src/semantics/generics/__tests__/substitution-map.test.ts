import { describe, expect, it } from "vitest";
import {
  abstractConformance,
  concreteConformance,
} from "../../types/protocols.js";
import { SubstitutionMap } from "../substitution-map.js";
import { createGenericsWorld } from "./support.js";

describe("substitution map", () => {
  it("appends conformances in the order they are added", () => {
    const { arena, sequence, equatable } = createGenericsWorld();
    const archetype = arena.createArchetype({ name: "T" });
    const map = new SubstitutionMap();

    map.addConformances(archetype, [abstractConformance(sequence)]);
    map.addConformances(archetype, [abstractConformance(equatable)]);

    expect(map.getConformances(archetype)).toEqual([
      abstractConformance(sequence),
      abstractConformance(equatable),
    ]);
    expect(map.lookupConformance(archetype, equatable)).toEqual(
      abstractConformance(equatable)
    );
    expect(map.lookupConformance(archetype, 99)).toBeUndefined();
  });

  it("records each parent edge once", () => {
    const { arena, element } = createGenericsWorld();
    const parent = arena.createArchetype({ name: "U" });
    const archetype = arena.createArchetype({ name: "T.Element" });
    const map = new SubstitutionMap();

    map.addParent(archetype, parent, element);
    map.addParent(archetype, parent, { ...element });

    expect(map.getParents(archetype)).toEqual([
      { parent, associatedType: element },
    ]);
  });

  it("lists the archetypes it replaces", () => {
    const { arena, int, bool } = createGenericsWorld();
    const first = arena.createArchetype({ name: "T" });
    const second = arena.createArchetype({ name: "U" });
    const map = new SubstitutionMap();

    map.addSubstitution(first, int);
    map.addSubstitution(second, bool);

    expect(map.size).toBe(2);
    expect(map.archetypes()).toEqual([first, second]);
    expect(map.getReplacement(second)).toBe(bool);
    expect(map.getReplacement(arena.createArchetype({ name: "V" }))).toBeUndefined();
  });

  it("resolves associated types through recorded parent edges", () => {
    const { arena, int, element, sequence } = createGenericsWorld();
    const root = arena.createArchetype({ name: "T", conformsTo: [sequence] });
    const other = arena.createArchetype({ name: "U", conformsTo: [sequence] });
    const nested = arena.getNestedType(root, element);
    const setOfInt = arena.internNominal({ name: "Set", typeArgs: [int] });

    // Only the second route has a replacement.
    const map = new SubstitutionMap();
    map.addSubstitution(other, setOfInt);
    map.addConformances(other, [
      concreteConformance({
        protocol: sequence,
        conformingType: setOfInt,
        typeWitnesses: new Map([["Element", int]]),
      }),
    ]);
    map.addParent(nested, other, element);

    expect(map.substitute(arena, nested)).toBe(int);
  });

  it("projects onto the nested archetype of a replacement archetype", () => {
    const { arena, element } = createGenericsWorld();
    const root = arena.createArchetype({ name: "T" });
    const target = arena.createArchetype({ name: "X" });
    const map = new SubstitutionMap();
    map.addSubstitution(root, target);

    const projected = map.substitute(arena, arena.getNestedType(root, element));
    expect(projected).toBe(arena.getNestedType(target, element));
    expect(arena.getArchetype(projected).name).toBe("X.Element");
  });
});
