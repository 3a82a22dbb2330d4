// Common types and enums

export type TestCaseType =
  | "Baseline Test"
  | "Equivalence Test"
  | "Simulation Test";

export type TestResultKind = "case" | "iteration";

export type ParameterValue = number | string;

export type ExportFormat = "json" | "csv";

export type OutputFormat = "table" | ExportFormat;

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}
