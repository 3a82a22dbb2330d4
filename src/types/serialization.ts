import { TestResult, ValidationResult } from "./index";
import { checkTestResult } from "./validation";

/**
 * Serializes a TestResult to JSON string
 */
export function serializeTestResult(result: TestResult): string {
  try {
    return JSON.stringify(result, null, 2);
  } catch (error) {
    throw new Error(
      `Failed to serialize TestResult: ${
        error instanceof Error ? error.message : "Unknown error"
      }`
    );
  }
}

/**
 * Deserializes a JSON string to TestResult with validation
 */
export function deserializeTestResult(json: string): {
  result: TestResult | null;
  validation: ValidationResult;
} {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      result: null,
      validation: {
        isValid: false,
        errors: [
          `Invalid JSON format: ${
            error instanceof Error ? error.message : "Unknown error"
          }`,
        ],
        warnings: [],
      },
    };
  }

  return checkTestResult(parsed);
}

/**
 * Validates and normalizes a TestResult from potentially untrusted JSON
 */
export function parseAndValidateTestResult(json: string): TestResult {
  const { result, validation } = deserializeTestResult(json);

  if (!validation.isValid) {
    throw new Error(`Invalid TestResult: ${validation.errors.join(", ")}`);
  }

  if (!result) {
    throw new Error("Failed to parse TestResult");
  }

  return result;
}
