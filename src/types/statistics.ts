import { ResolvedSignal, SignalStats } from "./test-result";

/**
 * Calculates basic statistical measures from an array of numbers
 */
export function calculateBasicStats(values: number[]): {
  min: number;
  max: number;
  avg: number;
  sum: number;
  count: number;
} {
  if (values.length === 0) {
    return { min: 0, max: 0, avg: 0, sum: 0, count: 0 };
  }

  const sum = values.reduce((acc, val) => acc + val, 0);
  const min = values.reduce((acc, val) => Math.min(acc, val), Infinity);
  const max = values.reduce((acc, val) => Math.max(acc, val), -Infinity);
  const avg = sum / values.length;

  return { min, max, avg, sum, count: values.length };
}

/**
 * Summarizes a resolved signal: value range plus first and last samples
 */
export function calculateSignalStats(signal: ResolvedSignal): SignalStats {
  const { values, times } = signal;
  const basicStats = calculateBasicStats(values);

  if (values.length === 0) {
    return {
      count: 0,
      min: 0,
      max: 0,
      avg: 0,
      initial: 0,
      final: 0,
      startTime: 0,
      endTime: 0,
    };
  }

  return {
    count: basicStats.count,
    min: basicStats.min,
    max: basicStats.max,
    avg: Math.round(basicStats.avg * 1e6) / 1e6,
    initial: values[0],
    final: values[values.length - 1],
    startTime: times.length > 0 ? times[0] : 0,
    endTime: times.length > 0 ? times[times.length - 1] : 0,
  };
}
