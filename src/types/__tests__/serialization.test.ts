import { describe, it, expect } from "vitest";
import {
  deserializeTestResult,
  parseAndValidateTestResult,
  serializeTestResult,
} from "../serialization.js";
import { createCaseResult, createIterationResult } from "./test-data/test-results";

describe("Serialization Functions", () => {
  it("should serialize a test result as indented JSON", () => {
    const result = createIterationResult({ outputRuns: [] });
    const json = serializeTestResult(result);

    expect(json).toBe(JSON.stringify(result, null, 2));
  });

  it("should deserialize a serialized case result", () => {
    const original = createCaseResult();
    const { result, validation } = deserializeTestResult(
      serializeTestResult(original)
    );

    expect(validation.isValid).toBe(true);
    expect(result).toEqual(original);
  });

  it("should report malformed JSON", () => {
    const { result, validation } = deserializeTestResult("{ not json");

    expect(result).toBeNull();
    expect(validation.isValid).toBe(false);
    expect(validation.errors).toHaveLength(1);
    expect(validation.errors[0].startsWith("Invalid JSON format: ")).toBe(true);
  });

  it("should return validation errors for a structurally invalid record", () => {
    const { result, validation } = deserializeTestResult('{"kind": "case"}');

    expect(result).toBeNull();
    expect(validation.errors).toContain('"testCaseType" is required');
  });

  it("should throw from parseAndValidateTestResult on invalid input", () => {
    expect(() => parseAndValidateTestResult('{"kind": "suite"}')).toThrow(
      'Invalid TestResult: "kind" must be one of [case, iteration]'
    );
  });

  it("should return the record from parseAndValidateTestResult", () => {
    const original = createIterationResult();

    expect(parseAndValidateTestResult(JSON.stringify(original))).toEqual(
      original
    );
  });
});
