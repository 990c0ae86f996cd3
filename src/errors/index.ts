/**
 * errors — Failure types surfaced by the engine.
 *
 * A circumpolar Moon is not an error; see HorizonCondition in types.ts.
 */

/**
 * A date, position or setting that the engine cannot accept.
 * Raised before any computation starts.
 */
export class InvalidInputError extends RangeError {
  override readonly name = 'InvalidInputError'

  constructor(
    /** Name of the offending input, e.g. 'latitude' or 'date' */
    readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`)
  }
}

export type SolverName = 'moon-age' | 'moon-rise-set'

/** An iterative solver ran out of iterations before meeting its threshold. */
export class NonConvergenceError extends Error {
  override readonly name = 'NonConvergenceError'

  constructor(
    readonly solver: SolverName,
    readonly iterations: number,
    /** Last correction (degrees for moon-age, days for moon-rise-set) */
    readonly residual: number,
  ) {
    super(`${solver} did not converge after ${iterations} iterations (last residual ${residual})`)
  }
}
