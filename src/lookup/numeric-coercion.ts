import { ParameterValue } from "../types";

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)inf(inity)?$/i;

/**
 * Converts an override value to a double. Text is parsed as a decimal
 * literal (or Inf/NaN); anything unparsable becomes NaN instead of throwing.
 */
export function coerceToNumber(value: ParameterValue): number {
  if (typeof value === "number") {
    return value;
  }

  const text = value.trim();

  if (DECIMAL_PATTERN.test(text)) {
    return parseFloat(text);
  }

  const infinity = INFINITY_PATTERN.exec(text);
  if (infinity) {
    return infinity[1] === "-" ? -Infinity : Infinity;
  }

  return NaN;
}
