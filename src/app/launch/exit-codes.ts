export const EXIT_CODES = {
  success: 0,
  /** Bad options, configuration, flow or state; no runs; unexpected engine failure. */
  failure: 1,
  /** The pipeline itself reported a failure, e.g. a step's check failed. */
  pipelineFailure: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
