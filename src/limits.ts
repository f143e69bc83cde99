/**
 * Execution Limits Configuration
 *
 * Centralized configuration for the limits that keep a single line from
 * exhausting memory or the call stack. These can be overridden when
 * creating a LineScript session.
 */

/**
 * Configuration for execution limits.
 * All limits are optional - undefined values use defaults.
 */
export interface ExecutionLimits {
  /** Maximum characters in one source line (default: 10000) */
  maxLineLength?: number;

  /** Maximum depth of parentheses, prefix operators and operator chains (default: 200) */
  maxNestingDepth?: number;
}

/**
 * Default execution limits.
 */
export const DEFAULT_LIMITS: Required<ExecutionLimits> = {
  maxLineLength: 10000,
  maxNestingDepth: 200,
};

/**
 * Resolve execution limits by merging user-provided limits with defaults.
 */
export function resolveLimits(
  userLimits?: ExecutionLimits,
): Required<ExecutionLimits> {
  if (!userLimits) {
    return { ...DEFAULT_LIMITS };
  }
  return {
    maxLineLength: userLimits.maxLineLength ?? DEFAULT_LIMITS.maxLineLength,
    maxNestingDepth:
      userLimits.maxNestingDepth ?? DEFAULT_LIMITS.maxNestingDepth,
  };
}
