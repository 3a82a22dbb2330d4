import Joi from "joi";
import {
  CaseResult,
  IterationResult,
  SignalRecord,
  TestResult,
  TestResultKind,
  ValidationResult,
} from "./index";

// string first, so numeric text is kept as text
const parameterValueSchema = Joi.alternatives().try(
  Joi.string().allow(""),
  Joi.number().unsafe()
);

const parameterOverrideSchema = Joi.object({
  variable: Joi.string().required(),
  value: parameterValueSchema.required(),
});

const parameterSetSchema = Joi.object({
  name: Joi.string().optional(),
  parameterOverrides: Joi.array().items(parameterOverrideSchema).required(),
});

const iterationParameterSchema = Joi.object({
  parameterName: Joi.string().required(),
  value: parameterValueSchema.required(),
});

const iterationSettingsSchema = Joi.object({
  variableParameters: Joi.array().items(iterationParameterSchema).required(),
});

// Logged signal schemas
const timeSeriesSchema = Joi.object({
  Data: Joi.array().items(Joi.number().unsafe()).required(),
  Time: Joi.array().items(Joi.number().unsafe()).required(),
});

const signalBusSchema = Joi.object()
  .pattern(
    Joi.string(),
    Joi.alternatives().try(timeSeriesSchema, Joi.link("#signalBus"))
  )
  .min(1)
  .id("signalBus");

const loggedSignalSchema = Joi.object({
  name: Joi.string().optional(),
  Values: Joi.alternatives().try(timeSeriesSchema, signalBusSchema).required(),
});

const signalRecordSchema = Joi.object({
  label: Joi.string().required(),
  values: Joi.array().items(Joi.number().unsafe()).required(),
  times: Joi.array().items(Joi.number().unsafe()).required(),
});

const testCaseTypeSchema = Joi.string()
  .valid("Baseline Test", "Equivalence Test", "Simulation Test")
  .required();

const kindSchema = Joi.object<{ kind: TestResultKind }>({
  kind: Joi.string().valid("case", "iteration").required(),
}).unknown(true);

// Test result schemas, one per variant
const caseResultSchema = Joi.object<CaseResult>({
  kind: Joi.string().valid("case").required(),
  testCaseType: testCaseTypeSchema,
  iterationName: Joi.string().allow("").optional(),
  iterationSettings: iterationSettingsSchema.optional(),
  parameterSet: parameterSetSchema.required(),
  logsout: Joi.object().pattern(Joi.string(), loggedSignalSchema).required(),
});

const iterationResultSchema = Joi.object<IterationResult>({
  kind: Joi.string().valid("iteration").required(),
  testCaseType: testCaseTypeSchema,
  parameterSet: parameterSetSchema.required(),
  iterationSettings: iterationSettingsSchema.required(),
  outputRuns: Joi.array().items(signalRecordSchema).required(),
});

function toValidationResult(
  error: Joi.ValidationError | undefined,
  warnings: string[] = []
): ValidationResult {
  return {
    isValid: !error,
    errors: error ? error.details.map((detail) => detail.message) : [],
    warnings,
  };
}

/**
 * Sample-level checks Joi cannot express: equal lengths and
 * non-decreasing time.
 */
function collectSignalRecordWarnings(records: SignalRecord[]): string[] {
  const warnings: string[] = [];

  for (const record of records) {
    if (record.values.length !== record.times.length) {
      warnings.push(
        `Signal record "${record.label}" has ${record.values.length} values but ${record.times.length} time samples`
      );
    }

    const decreasing = record.times.some(
      (time, index) => index > 0 && time < record.times[index - 1]
    );
    if (decreasing) {
      warnings.push(
        `Signal record "${record.label}" has decreasing time samples`
      );
    }
  }

  return warnings;
}

/**
 * Validates a test result and returns the typed record when it is valid
 */
export function checkTestResult(value: unknown): {
  result: TestResult | null;
  validation: ValidationResult;
} {
  const kindCheck = kindSchema.validate(value);
  if (kindCheck.error) {
    return { result: null, validation: toValidationResult(kindCheck.error) };
  }

  if (kindCheck.value.kind === "iteration") {
    const checked = iterationResultSchema.validate(value, {
      abortEarly: false,
    });
    if (checked.error) {
      return { result: null, validation: toValidationResult(checked.error) };
    }
    return {
      result: checked.value,
      validation: toValidationResult(
        undefined,
        collectSignalRecordWarnings(checked.value.outputRuns)
      ),
    };
  }

  const checked = caseResultSchema.validate(value, { abortEarly: false });
  if (checked.error) {
    return { result: null, validation: toValidationResult(checked.error) };
  }
  return { result: checked.value, validation: toValidationResult(undefined) };
}

/**
 * Validates a TestResult object
 */
export function validateTestResult(value: unknown): ValidationResult {
  return checkTestResult(value).validation;
}

/**
 * Validates a SignalRecord object
 */
export function validateSignalRecord(record: SignalRecord): ValidationResult {
  const result = signalRecordSchema.validate(record, { abortEarly: false });

  return toValidationResult(
    result.error,
    result.error ? [] : collectSignalRecordWarnings([record])
  );
}
