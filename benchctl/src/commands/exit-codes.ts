/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  INTEGRATION_FAILED: 1,
  PARTIAL_GENERATION: 2,
  INVALID_ARGS: 3,
} as const;
