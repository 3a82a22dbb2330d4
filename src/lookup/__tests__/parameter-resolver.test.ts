import { describe, it, expect, vi } from "vitest";
import { resolveParameter } from "../parameter-resolver";
import {
  LookupErrorType,
  NotFoundError,
  UnsupportedModeError,
} from "../lookup-errors";
import {
  createCaseResult,
  createIterationResult,
} from "../../types/__tests__/test-data/test-results";

describe("resolveParameter", () => {
  describe("case results", () => {
    it("should return a numeric override unchanged", () => {
      expect(resolveParameter("Gain", createCaseResult())).toBe(2.5);
    });

    it("should coerce an override stored as text", () => {
      expect(resolveParameter("Offset", createCaseResult())).toBe(3.14);
    });

    it("should return NaN for a non-numeric text override", () => {
      expect(resolveParameter("Mode", createCaseResult())).toBeNaN();
    });

    it("should match names case-sensitively", () => {
      expect(() => resolveParameter("gain", createCaseResult())).toThrow(
        NotFoundError
      );
    });

    it("should fail with NotFoundError when the parameter is absent", () => {
      expect(() => resolveParameter("Missing", createCaseResult())).toThrow(
        '"Missing" not found in test result (searched: parameterSet.parameterOverrides)'
      );
    });

    it("should return the first match when names repeat", () => {
      const result = createCaseResult({
        parameterSet: {
          parameterOverrides: [
            { variable: "Gain", value: 1 },
            { variable: "Gain", value: 7 },
          ],
        },
      });

      expect(resolveParameter("Gain", result)).toBe(1);
    });

    it("should ignore iteration settings when the case is not an iteration", () => {
      const onWarning = vi.fn();
      const result = createCaseResult({
        iterationSettings: {
          variableParameters: [{ parameterName: "Gain", value: 9 }],
        },
      });

      expect(resolveParameter("Gain", result, { onWarning })).toBe(2.5);
      expect(onWarning).not.toHaveBeenCalled();
    });

    it("should prefer the iteration override for a named iteration", () => {
      const result = createCaseResult({
        iterationName: "Iteration 3",
        iterationSettings: {
          variableParameters: [{ parameterName: "Gain", value: "9.5" }],
        },
      });

      expect(resolveParameter("Gain", result)).toBe(9.5);
    });

    it("should fall back to the parameter set with a warning", () => {
      const onWarning = vi.fn();
      const result = createCaseResult({
        iterationName: "Iteration 3",
        iterationSettings: { variableParameters: [] },
      });

      expect(resolveParameter("Offset", result, { onWarning })).toBe(3.14);
      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning).toHaveBeenCalledWith(
        "Variable Offset not found, probably not changed in test iteration"
      );
    });

    it("should warn and fall back for a named iteration without settings", () => {
      const onWarning = vi.fn();
      const result = createCaseResult({ iterationName: "Iteration 1" });

      expect(resolveParameter("Gain", result, { onWarning })).toBe(2.5);
      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning).toHaveBeenCalledWith(
        "Variable Gain not found, probably not changed in test iteration"
      );
    });

    it("should list the iteration settings as searched for a named iteration", () => {
      const result = createCaseResult({ iterationName: "Iteration 1" });

      try {
        resolveParameter("Missing", result, { onWarning: () => {} });
        expect.fail("expected a NotFoundError");
      } catch (error) {
        expect(error).toBeInstanceOf(NotFoundError);
        if (error instanceof NotFoundError) {
          expect(error.context.searched).toEqual([
            "iterationSettings.variableParameters",
            "parameterSet.parameterOverrides",
          ]);
        }
      }
    });
  });

  describe("iteration results", () => {
    it("should read the iteration override first", () => {
      const onWarning = vi.fn();

      expect(
        resolveParameter("Gain", createIterationResult(), { onWarning })
      ).toBe(4);
      expect(onWarning).not.toHaveBeenCalled();
    });

    it("should fall back to the parameter set", () => {
      const onWarning = vi.fn();

      expect(
        resolveParameter("Threshold", createIterationResult(), { onWarning })
      ).toBe(12);
      expect(onWarning).toHaveBeenCalledTimes(1);
    });

    it("should not warn when fallback warnings are disabled", () => {
      const onWarning = vi.fn();

      resolveParameter("Threshold", createIterationResult(), {
        onWarning,
        warnOnIterationFallback: false,
      });

      expect(onWarning).not.toHaveBeenCalled();
    });

    it("should warn through console.warn by default", () => {
      const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

      try {
        resolveParameter("Threshold", createIterationResult());
        expect(warnSpy).toHaveBeenCalledWith(
          "Variable Threshold not found, probably not changed in test iteration"
        );
      } finally {
        warnSpy.mockRestore();
      }
    });

    it("should list both searched locations when the parameter is absent", () => {
      try {
        resolveParameter("Missing", createIterationResult(), {
          onWarning: () => {},
        });
        expect.fail("expected a NotFoundError");
      } catch (error) {
        expect(error).toBeInstanceOf(NotFoundError);
        if (error instanceof NotFoundError) {
          expect(error.type).toBe(LookupErrorType.NOT_FOUND);
          expect(error.context.searched).toEqual([
            "iterationSettings.variableParameters",
            "parameterSet.parameterOverrides",
          ]);
          expect(error.context.resultKind).toBe("iteration");
        }
      }
    });
  });

  describe("equivalence tests", () => {
    it("should reject case results before searching", () => {
      const onWarning = vi.fn();
      const result = createCaseResult({
        testCaseType: "Equivalence Test",
        iterationName: "Iteration 1",
        iterationSettings: { variableParameters: [] },
      });

      expect(() => resolveParameter("Gain", result, { onWarning })).toThrow(
        UnsupportedModeError
      );
      expect(onWarning).not.toHaveBeenCalled();
    });

    it("should reject iteration results even when the override exists", () => {
      const result = createIterationResult({
        testCaseType: "Equivalence Test",
      });

      expect(() => resolveParameter("Gain", result)).toThrow(
        'Cannot resolve "Gain" for an equivalence test: two sets of results are returned'
      );
    });
  });
});
