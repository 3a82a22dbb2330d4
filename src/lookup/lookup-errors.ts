import { TestResultKind } from "../types";

export enum LookupErrorType {
  NOT_FOUND = "NOT_FOUND",
  NO_LOGGED_DATA = "NO_LOGGED_DATA",
  UNSUPPORTED_MODE = "UNSUPPORTED_MODE",
  MALFORMED_SIGNAL = "MALFORMED_SIGNAL",
}

export type LookupOperation = "resolveParameter" | "resolveSignal";

export interface LookupErrorContext {
  operation: LookupOperation;
  name: string;
  resultKind: TestResultKind;
  searched?: string[];
  timestamp: Date;
}

/**
 * Base class for every failure a result lookup can raise. Lookup failures
 * describe a misconfigured test, so none of them is retryable.
 */
export class ResultLookupError extends Error {
  public readonly type: LookupErrorType;
  public readonly context: LookupErrorContext;
  public readonly retryable = false;

  constructor(
    type: LookupErrorType,
    message: string,
    context: Omit<LookupErrorContext, "timestamp">
  ) {
    super(message);
    this.name = "ResultLookupError";
    this.type = type;
    this.context = { ...context, timestamp: new Date() };
  }

  toJSON() {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

export class NotFoundError extends ResultLookupError {
  constructor(context: Omit<LookupErrorContext, "timestamp">) {
    const where = context.searched?.length
      ? ` (searched: ${context.searched.join(", ")})`
      : "";
    super(
      LookupErrorType.NOT_FOUND,
      `"${context.name}" not found in test result${where}`,
      context
    );
    this.name = "NotFoundError";
  }
}

export class NoLoggedDataError extends ResultLookupError {
  constructor(context: Omit<LookupErrorContext, "timestamp">) {
    super(
      LookupErrorType.NO_LOGGED_DATA,
      "The test results do not contain any logged signals - enable signal logging in the test model",
      context
    );
    this.name = "NoLoggedDataError";
  }
}

export class UnsupportedModeError extends ResultLookupError {
  constructor(context: Omit<LookupErrorContext, "timestamp">) {
    super(
      LookupErrorType.UNSUPPORTED_MODE,
      `Cannot resolve "${context.name}" for an equivalence test: two sets of results are returned`,
      context
    );
    this.name = "UnsupportedModeError";
  }
}

export class MalformedSignalError extends ResultLookupError {
  constructor(
    reason: string,
    context: Omit<LookupErrorContext, "timestamp">
  ) {
    super(
      LookupErrorType.MALFORMED_SIGNAL,
      `Logged signal "${context.name}" is malformed: ${reason}`,
      context
    );
    this.name = "MalformedSignalError";
  }
}

export function isResultLookupError(
  error: unknown
): error is ResultLookupError {
  return error instanceof ResultLookupError;
}
