import { describe, expect, it } from "vitest";
import {
  InternalConsistencyError,
  diagnosticCodes,
  diagnosticFromCode,
  formatDiagnostic,
  getDiagnosticDefinition,
  internalError,
  isInternalConsistencyError,
} from "../index.js";

describe("diagnostic utilities", () => {
  it("formats diagnostics with their phase", () => {
    const diagnostic = diagnosticFromCode({
      code: "GN0001",
      params: { kind: "parameter-count-mismatch", expected: 2, received: 1 },
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "ERROR [generics] GN0001: incorrect number of parameters: signature declares 2, environment binds 1"
    );
  });

  it("carries registry hints onto diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "GN0005",
      params: { kind: "missing-generic-parameter", param: "U" },
    });
    expect(diagnostic.message).toBe("missing generic parameter 'U'");
    expect(diagnostic.hints?.[0]?.message).toContain("rebuild the environment");
  });

  it("throws internal failures as their own error class", () => {
    let caught: unknown;
    try {
      internalError({
        code: "GN0003",
        params: { kind: "residual-archetype", type: "Array<X>" },
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InternalConsistencyError);
    expect(isInternalConsistencyError(caught)).toBe(true);
    if (!isInternalConsistencyError(caught)) return;
    expect(caught.code).toBe("GN0003");
    expect(caught.message).toBe(
      "internal consistency failure: ERROR [generics] GN0003: not fully substituted: 'Array<X>' still contains an archetype"
    );
  });

  it("does not mistake ordinary errors for internal failures", () => {
    expect(isInternalConsistencyError(new Error("boom"))).toBe(false);
  });

  it("registers every code once", () => {
    const codes = diagnosticCodes();
    expect(codes).toHaveLength(12);
    expect(new Set(codes).size).toBe(codes.length);
    expect(codes[0]).toBe("GN0001");
  });

  it("puts archetype bookkeeping failures in the generics phase", () => {
    const diagnostic = diagnosticFromCode({
      code: "GN0011",
      params: { kind: "not-an-archetype", type: "Int" },
    });
    expect(diagnostic.phase).toBe("generics");
    expect(
      diagnosticCodes().filter(
        (code) => getDiagnosticDefinition(code).phase !== "generics"
      )
    ).toEqual([]);
  });
});
