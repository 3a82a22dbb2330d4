import {
  CaseResult,
  IterationResult,
  ResolvedSignal,
  SignalBus,
  TestResult,
  TimeSeries,
} from "../types";
import { LookupConfig, resolveLookupConfig } from "./lookup-config";
import {
  LookupErrorContext,
  MalformedSignalError,
  NoLoggedDataError,
  NotFoundError,
} from "./lookup-errors";

type SignalContext = Omit<LookupErrorContext, "timestamp">;

export function isTimeSeries(value: TimeSeries | SignalBus): value is TimeSeries {
  return (
    "Data" in value &&
    Array.isArray(value.Data) &&
    "Time" in value &&
    Array.isArray(value.Time)
  );
}

/**
 * Follows the first field of each bus level down to the innermost flat
 * series. Fails once `maxDepth` bus levels have been crossed.
 */
export function unwrapLeafSeries(
  value: TimeSeries | SignalBus,
  maxDepth: number,
  context: SignalContext
): TimeSeries {
  let current = value;

  for (let depth = 0; ; depth++) {
    if (isTimeSeries(current)) {
      return current;
    }

    if (depth >= maxDepth) {
      throw new MalformedSignalError(
        `bus nesting exceeds ${maxDepth} levels`,
        context
      );
    }

    const [firstField] = Object.keys(current);
    if (firstField === undefined) {
      throw new MalformedSignalError(
        `bus level ${depth + 1} has no fields`,
        context
      );
    }

    const next: unknown = current[firstField];
    if (typeof next !== "object" || next === null || Array.isArray(next)) {
      throw new MalformedSignalError(
        `field "${firstField}" is neither a bus nor a time series`,
        context
      );
    }
    current = current[firstField];
  }
}

function resolveLoggedSignal(
  name: string,
  result: CaseResult,
  config: LookupConfig
): ResolvedSignal {
  const context: SignalContext = {
    operation: "resolveSignal",
    name,
    resultKind: result.kind,
  };

  if (Object.keys(result.logsout).length === 0) {
    throw new NoLoggedDataError(context);
  }

  if (!Object.hasOwn(result.logsout, name)) {
    throw new NotFoundError({ ...context, searched: ["logsout"] });
  }

  const series = unwrapLeafSeries(
    result.logsout[name].Values,
    config.maxBusDepth,
    context
  );

  return { values: series.Data, times: series.Time };
}

function resolveOutputRun(name: string, result: IterationResult): ResolvedSignal {
  const context: SignalContext = {
    operation: "resolveSignal",
    name,
    resultKind: result.kind,
  };

  if (result.outputRuns.length === 0) {
    throw new NoLoggedDataError(context);
  }

  const record = result.outputRuns.find((run) => run.label === name);
  if (!record) {
    throw new NotFoundError({ ...context, searched: ["outputRuns"] });
  }

  return { values: record.values, times: record.times };
}

/**
 * Retrieves a logged signal and its time stamps from a test result. The
 * signal must have been logged during the test.
 *
 * Returned arrays are the result's own arrays, not copies.
 */
export function resolveSignal(
  name: string,
  result: TestResult,
  options: Partial<LookupConfig> = {}
): ResolvedSignal {
  const config = resolveLookupConfig(options);

  switch (result.kind) {
    case "case":
      return resolveLoggedSignal(name, result, config);
    case "iteration":
      return resolveOutputRun(name, result);
  }
}
