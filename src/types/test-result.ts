import { ParameterValue, TestCaseType } from "./common";

export interface ParameterOverride {
  variable: string;
  value: ParameterValue;
}

export interface ParameterSet {
  name?: string;
  parameterOverrides: ParameterOverride[];
}

export interface IterationParameter {
  parameterName: string;
  value: ParameterValue;
}

export interface IterationSettings {
  variableParameters: IterationParameter[];
}

/**
 * A flat logged series as the simulation engine exports it.
 */
export interface TimeSeries {
  Data: number[];
  Time: number[];
}

/**
 * Structured (bus) signal. Field order follows the bus definition, and the
 * first field is the one followed when unwrapping.
 */
export interface SignalBus {
  [field: string]: TimeSeries | SignalBus;
}

export interface LoggedSignal {
  name?: string;
  Values: TimeSeries | SignalBus;
}

export interface SignalRecord {
  label: string;
  values: number[];
  times: number[];
}

interface TestResultBase {
  testCaseType: TestCaseType;
  parameterSet: ParameterSet;
}

/**
 * Result handed to a custom acceptance criteria while a test case runs.
 */
export interface CaseResult extends TestResultBase {
  kind: "case";
  iterationName?: string;
  iterationSettings?: IterationSettings;
  logsout: Record<string, LoggedSignal>;
}

/**
 * Iteration result reloaded from a saved results file.
 */
export interface IterationResult extends TestResultBase {
  kind: "iteration";
  iterationSettings: IterationSettings;
  outputRuns: SignalRecord[];
}

export type TestResult = CaseResult | IterationResult;

export interface ResolvedSignal {
  values: number[];
  times: number[];
}

export interface SignalStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  initial: number;
  final: number;
  startTime: number;
  endTime: number;
}
