/**
 * Configuration for result lookups
 */
export interface LookupConfig {
  /** Deepest bus nesting followed before a signal is rejected as malformed */
  maxBusDepth: number;
  /** Emit a warning when an iteration lookup falls back to the parameter set */
  warnOnIterationFallback: boolean;
  onWarning: (message: string) => void;
}

export const DEFAULT_LOOKUP_CONFIG: LookupConfig = {
  maxBusDepth: 32,
  warnOnIterationFallback: true,
  onWarning: (message) => console.warn(message),
};

/**
 * Validate configuration values
 */
export function validateLookupConfig(config: LookupConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.maxBusDepth) || config.maxBusDepth <= 0) {
    errors.push("maxBusDepth must be a positive integer");
  }

  if (typeof config.onWarning !== "function") {
    errors.push("onWarning must be a function");
  }

  return errors;
}

/**
 * Merges a partial configuration over the defaults
 */
export function resolveLookupConfig(
  config: Partial<LookupConfig> = {}
): LookupConfig {
  const merged: LookupConfig = { ...DEFAULT_LOOKUP_CONFIG };

  // undefined entries keep their defaults
  if (config.maxBusDepth !== undefined) merged.maxBusDepth = config.maxBusDepth;
  if (config.warnOnIterationFallback !== undefined) {
    merged.warnOnIterationFallback = config.warnOnIterationFallback;
  }
  if (config.onWarning !== undefined) merged.onWarning = config.onWarning;

  const errors = validateLookupConfig(merged);
  if (errors.length > 0) {
    throw new Error(`Invalid lookup configuration: ${errors.join(", ")}`);
  }

  return merged;
}
