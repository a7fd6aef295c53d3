import {
  RebalanceError,
  ShapeError,
  SolverError,
  OptimizationError,
  InfeasibleError,
  UnboundedError,
} from './error.js';

/**
 * Solve status from the solver.
 */
export type SolveStatus =
  | 'optimal'
  | 'infeasible'
  | 'unbounded'
  | 'max_iterations'
  | 'numerical_error'
  | 'unknown';

/**
 * One linear equality row: `coeffs · x = rhs`.
 */
export interface EqualityConstraint {
  readonly name?: string;
  readonly coeffs: Float64Array;
  readonly rhs: number;
}

/**
 * Per-variable bounds. Use `-Infinity` / `Infinity` for an open side.
 */
export interface Bound {
  readonly lower: number;
  readonly upper: number;
}

/**
 * A linear program in minimization form:
 *
 *   minimize    c' x
 *   subject to  A_eq x = b_eq
 *               lower <= x <= upper
 */
export interface LinearProgram {
  readonly c: Float64Array;
  readonly equalities: readonly EqualityConstraint[];
  readonly bounds: readonly Bound[];
}

/**
 * Solver settings.
 */
export interface SolverSettings {
  /** Print solver output */
  verbose?: boolean;
  /** Maximum simplex iterations */
  maxIter?: number;
  /** Time limit in seconds */
  timeLimit?: number;
}

/**
 * Raw result reported by an {@link LpSolver}.
 */
export interface LpSolveResult {
  status: SolveStatus;
  objVal: number | null;
  x: Float64Array | null;
  solveTime: number;
}

/**
 * The linear-programming collaborator. Any LP library can stand behind
 * this interface; {@link HighsSolver} is the default.
 */
export interface LpSolver {
  solve(program: LinearProgram, settings: SolverSettings): Promise<LpSolveResult>;
}

/**
 * Optimal solution of a {@link LinearProblem}.
 */
export interface Solution {
  readonly status: 'optimal';
  /** Optimal objective value */
  readonly value: number;
  /** Optimal variable vector, in column order */
  readonly x: Float64Array;
  /** Solve time in seconds */
  readonly solveTime: number;
}

/**
 * Problem builder for linear programs.
 *
 * @example
 * ```ts
 * const solution = await LinearProblem.minimize([1.2, 0.9])
 *   .subjectTo([{ coeffs: Float64Array.from([50, 30]), rhs: 9500 }])
 *   .bounds([{ lower: 0, upper: Infinity }, { lower: 0, upper: Infinity }])
 *   .solve(new HighsSolver());
 * ```
 */
export class LinearProblem {
  private readonly _c: Float64Array;
  private _equalities: EqualityConstraint[] = [];
  private _bounds: Bound[];
  private _settings: SolverSettings = {};

  private constructor(c: Float64Array) {
    if (c.length === 0) {
      throw new ShapeError('Objective must have at least one variable', '>= 1', '0');
    }
    this._c = c;
    this._bounds = Array.from({ length: c.length }, () => ({ lower: -Infinity, upper: Infinity }));
  }

  /**
   * Create a minimization problem from an objective coefficient vector.
   */
  static minimize(c: Float64Array | readonly number[]): LinearProblem {
    return new LinearProblem(Float64Array.from(c));
  }

  /**
   * Add equality constraints to the problem.
   */
  subjectTo(constraints: readonly EqualityConstraint[]): this {
    for (const constraint of constraints) {
      if (constraint.coeffs.length !== this._c.length) {
        throw new ShapeError(
          `Constraint ${constraint.name ?? this._equalities.length} has wrong length`,
          String(this._c.length),
          String(constraint.coeffs.length)
        );
      }
    }
    this._equalities = [...this._equalities, ...constraints];
    return this;
  }

  /**
   * Set per-variable bounds (one pair per objective coefficient).
   */
  bounds(bounds: readonly Bound[]): this {
    if (bounds.length !== this._c.length) {
      throw new ShapeError('Bounds must match variable count', String(this._c.length), String(bounds.length));
    }
    this._bounds = [...bounds];
    return this;
  }

  /**
   * Set solver settings.
   *
   * @example
   * ```ts
   * problem.settings({ verbose: true, timeLimit: 5 })
   * ```
   */
  settings(settings: SolverSettings): this {
    this._settings = { ...this._settings, ...settings };
    return this;
  }

  get size(): number {
    return this._c.length;
  }

  get constraints(): readonly EqualityConstraint[] {
    return this._equalities;
  }

  /**
   * The program as handed to the solver.
   */
  toProgram(): LinearProgram {
    return { c: this._c, equalities: this._equalities, bounds: this._bounds };
  }

  /**
   * Solve the problem.
   *
   * @throws InfeasibleError if problem is infeasible
   * @throws UnboundedError if problem is unbounded
   * @throws OptimizationError for any other non-optimal status
   * @throws SolverError if the solver itself fails
   */
  async solve(solver: LpSolver): Promise<Solution> {
    let result: LpSolveResult;
    try {
      result = await solver.solve(this.toProgram(), this._settings);
    } catch (e) {
      if (e instanceof RebalanceError) throw e;
      throw new SolverError(`Solver failed: ${e instanceof Error ? e.message : String(e)}`);
    }

    if (result.status === 'infeasible') {
      throw new InfeasibleError('Problem is infeasible');
    }
    if (result.status === 'unbounded') {
      throw new UnboundedError('Problem is unbounded');
    }
    if (result.status === 'numerical_error') {
      throw new OptimizationError(result.status, 'Solver encountered numerical difficulties');
    }
    if (result.status !== 'optimal' || !result.x) {
      throw new OptimizationError(result.status);
    }
    if (result.x.length !== this._c.length) {
      throw new ShapeError('Solver returned wrong solution length', String(this._c.length), String(result.x.length));
    }

    let value = result.objVal;
    if (value === null) {
      value = 0;
      for (let i = 0; i < this._c.length; i++) {
        value += this._c[i]! * result.x[i]!;
      }
    }

    return {
      status: 'optimal',
      value,
      x: result.x,
      solveTime: result.solveTime,
    };
  }
}
