import { IterationSettings, TestResult } from "../types";
import { LookupConfig, resolveLookupConfig } from "./lookup-config";
import { NotFoundError, UnsupportedModeError } from "./lookup-errors";
import { coerceToNumber } from "./numeric-coercion";

const ITERATION_SETTINGS = "iterationSettings.variableParameters";
const PARAMETER_SET = "parameterSet.parameterOverrides";

/**
 * Iteration overrides apply to iteration results, and to case results that
 * run as a named iteration. A named iteration without settings changed
 * nothing.
 */
function getIterationSettings(result: TestResult): IterationSettings | null {
  if (result.kind === "iteration") {
    return result.iterationSettings;
  }

  if (result.iterationName) {
    return result.iterationSettings ?? { variableParameters: [] };
  }

  return null;
}

/**
 * Retrieves the value of a scalar overridden parameter from a test result.
 *
 * Per-iteration overrides are searched first. A parameter missing there was
 * left unchanged by the iteration, so the lookup falls back to the test's
 * parameter set with a warning. Values stored as text are parsed to a
 * double.
 *
 * @throws UnsupportedModeError for equivalence tests, which carry two
 *   parameter sets
 * @throws NotFoundError when no override location holds `name`
 */
export function resolveParameter(
  name: string,
  result: TestResult,
  options: Partial<LookupConfig> = {}
): number {
  const config = resolveLookupConfig(options);
  const context = {
    operation: "resolveParameter" as const,
    name,
    resultKind: result.kind,
  };

  if (result.testCaseType === "Equivalence Test") {
    throw new UnsupportedModeError(context);
  }

  const searched: string[] = [];
  const iterationSettings = getIterationSettings(result);

  if (iterationSettings) {
    searched.push(ITERATION_SETTINGS);
    const iterationParameter = iterationSettings.variableParameters.find(
      (parameter) => parameter.parameterName === name
    );

    if (iterationParameter) {
      return coerceToNumber(iterationParameter.value);
    }

    if (config.warnOnIterationFallback) {
      config.onWarning(
        `Variable ${name} not found, probably not changed in test iteration`
      );
    }
  }

  searched.push(PARAMETER_SET);
  const override = result.parameterSet.parameterOverrides.find(
    (parameter) => parameter.variable === name
  );

  if (!override) {
    throw new NotFoundError({ ...context, searched });
  }

  return coerceToNumber(override.value);
}
