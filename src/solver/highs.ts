/**
 * HiGHS WASM solver interface.
 *
 * HiGHS is a high-performance solver for linear programming (LP),
 * mixed-integer programming (MIP), and quadratic programming (QP).
 * Only its LP path is used here.
 */

import type {
  LinearProgram,
  LpSolver,
  LpSolveResult,
  SolverSettings,
  SolveStatus,
} from '../problem.js';
import { SolverError } from '../error.js';
import { generateLP } from './lp-format.js';

interface HighsColumn {
  Primal?: number;
}

interface HighsSolution {
  Status: string;
  ObjectiveValue?: number;
  Columns?: Record<string, HighsColumn>;
}

/**
 * HiGHS WASM module interface.
 */
export interface HighsWasm {
  solve(problem: string, options?: Record<string, unknown>): HighsSolution;
}

type HighsLoader = () => Promise<unknown>;

// Singleton HiGHS instance
let highsInstance: HighsWasm | null = null;
let highsLoading: Promise<HighsWasm> | null = null;

function isHighsWasm(value: unknown): value is HighsWasm {
  return (
    typeof value === 'object' &&
    value !== null &&
    'solve' in value &&
    typeof value.solve === 'function'
  );
}

/**
 * The package is CommonJS; depending on the loader its factory arrives as
 * the namespace itself, as `default`, or as `default.default`.
 */
function resolveLoader(mod: unknown): HighsLoader {
  let candidate = mod;
  for (let depth = 0; depth < 3; depth++) {
    if (typeof candidate === 'function') {
      const factory = candidate;
      return () => Promise.resolve(factory());
    }
    if (typeof candidate === 'object' && candidate !== null && 'default' in candidate) {
      candidate = candidate.default;
    } else {
      break;
    }
  }
  throw new SolverError('highs module does not export a loader function');
}

/**
 * Load HiGHS WASM module.
 *
 * The instance is shared by every solve in the process.
 */
export async function loadHiGHS(): Promise<HighsWasm> {
  if (highsInstance) {
    return highsInstance;
  }

  if (highsLoading) {
    return highsLoading;
  }

  highsLoading = (async () => {
    try {
      const highsModule: unknown = await import('highs');
      const instance = await resolveLoader(highsModule)();
      if (!isHighsWasm(instance)) {
        throw new Error('loader did not return a solver instance');
      }
      highsInstance = instance;
      return highsInstance;
    } catch (e) {
      highsLoading = null;
      throw new SolverError(
        `Failed to load HiGHS WASM: ${e instanceof Error ? e.message : String(e)}`
      );
    }
  })();

  return highsLoading;
}

/**
 * Reset the HiGHS singleton instance.
 * Useful for testing or recovering from WASM errors.
 */
export function resetHiGHS(): void {
  highsInstance = null;
  highsLoading = null;
}

/**
 * Convert HiGHS status to SolveStatus.
 */
export function parseHighsStatus(status: string): SolveStatus {
  const s = status.toLowerCase();
  if (s === 'optimal') return 'optimal';
  if (s === 'infeasible') return 'infeasible';
  if (s === 'unbounded') return 'unbounded';
  // "Primal infeasible or unbounded" and similar
  if (s.includes('unbounded')) return 'unbounded';
  if (s.includes('infeasible')) return 'infeasible';
  if (s.includes('iteration') || s.includes('limit')) return 'max_iterations';
  if (s.includes('error')) return 'numerical_error';
  return 'unknown';
}

/**
 * Build HiGHS options from solver settings.
 */
export function buildHighsOptions(settings: SolverSettings): Record<string, unknown> {
  const options: Record<string, unknown> = {};

  if (settings.verbose !== undefined) {
    options.output_flag = settings.verbose;
  }
  if (settings.maxIter !== undefined) {
    options.simplex_iteration_limit = settings.maxIter;
  }
  if (settings.timeLimit !== undefined) {
    options.time_limit = settings.timeLimit;
  }

  return options;
}

/**
 * {@link LpSolver} backed by the HiGHS WASM build. The dense program is
 * written as CPLEX LP text and columns are read back by name, so the
 * returned vector is in the program's column order.
 */
export class HighsSolver implements LpSolver {
  async solve(program: LinearProgram, settings: SolverSettings): Promise<LpSolveResult> {
    const { lpString, varNames } = generateLP(program);
    const startTime = performance.now();
    const highs = await loadHiGHS();

    let result: HighsSolution;
    try {
      result = highs.solve(lpString, buildHighsOptions(settings));
    } catch (e) {
      // A crashed instance cannot be reused
      resetHiGHS();
      throw new SolverError(`HiGHS solver error: ${e instanceof Error ? e.message : String(e)}`);
    }

    const solveTime = (performance.now() - startTime) / 1000;
    const status = parseHighsStatus(result.Status);
    const objVal = result.ObjectiveValue ?? null;
    const columns = result.Columns;

    if (status !== 'optimal' || !columns) {
      return { status, objVal, x: null, solveTime };
    }

    const x = Float64Array.from(varNames, (name) => columns[name]?.Primal ?? 0);
    return { status, objVal, x, solveTime };
  }
}
