import type { LinearProgram, LpSolver, LpSolveResult, SolverSettings } from '../../src/index.js';

/**
 * In-process stand-in for the LP collaborator. Records every call and
 * answers with `respond`.
 */
export class FakeSolver implements LpSolver {
  readonly calls: { program: LinearProgram; settings: SolverSettings }[] = [];

  constructor(private readonly respond: (program: LinearProgram) => LpSolveResult) {}

  async solve(program: LinearProgram, settings: SolverSettings): Promise<LpSolveResult> {
    this.calls.push({ program, settings });
    return this.respond(program);
  }
}

/**
 * Exact optimum of `min c'x s.t. a'x = b, x >= 0` for a single equality
 * row with positive coefficients: all of `b` goes to the column with the
 * smallest c[i] / a[i] (first one on ties).
 */
export function budgetVertex(program: LinearProgram): LpSolveResult {
  const row = program.equalities[0];
  if (!row || row.rhs < 0) {
    return { status: 'infeasible', objVal: null, x: null, solveTime: 0 };
  }

  let best = 0;
  for (let i = 1; i < program.c.length; i++) {
    if (program.c[i]! / row.coeffs[i]! < program.c[best]! / row.coeffs[best]!) {
      best = i;
    }
  }

  const x = new Float64Array(program.c.length);
  x[best] = row.rhs / row.coeffs[best]!;
  return { status: 'optimal', objVal: program.c[best]! * x[best]!, x, solveTime: 0 };
}

export function fixedResult(result: Partial<LpSolveResult> & Pick<LpSolveResult, 'status'>): () => LpSolveResult {
  return () => ({ objVal: null, x: null, solveTime: 0, ...result });
}
