import { describe, it, expect } from 'vitest';
import {
  LinearProblem,
  ShapeError,
  SolverError,
  OptimizationError,
  InfeasibleError,
  UnboundedError,
} from '../../src/index.js';
import { FakeSolver, fixedResult } from '../helpers/fake-solver.js';

const budget = { name: 'budget', coeffs: Float64Array.from([1, 1]), rhs: 10 };
const nonneg = [
  { lower: 0, upper: Infinity },
  { lower: 0, upper: Infinity },
];

describe('LinearProblem', () => {
  describe('builder pattern', () => {
    it('defaults every variable to free', () => {
      const program = LinearProblem.minimize([1, 2]).toProgram();
      expect(program.bounds).toEqual([
        { lower: -Infinity, upper: Infinity },
        { lower: -Infinity, upper: Infinity },
      ]);
      expect(program.equalities).toEqual([]);
    });

    it('adds constraints', () => {
      const p = LinearProblem.minimize([1, 2]).subjectTo([budget]).subjectTo([budget]);
      expect(p.constraints.length).toBe(2);
      expect(p.size).toBe(2);
    });

    it('throws on an empty objective', () => {
      expect(() => LinearProblem.minimize([])).toThrow(ShapeError);
    });

    it('throws on a constraint of the wrong length', () => {
      expect(() =>
        LinearProblem.minimize([1, 2]).subjectTo([{ coeffs: Float64Array.from([1]), rhs: 1 }])
      ).toThrow('Constraint 0 has wrong length: expected 2, got 1');
    });

    it('throws on the wrong number of bounds', () => {
      expect(() => LinearProblem.minimize([1, 2]).bounds([{ lower: 0, upper: 1 }])).toThrow(
        ShapeError
      );
    });

    it('merges settings and passes them to the solver', async () => {
      const solver = new FakeSolver(fixedResult({ status: 'optimal', x: Float64Array.from([10, 0]) }));
      await LinearProblem.minimize([1, 2])
        .subjectTo([budget])
        .bounds(nonneg)
        .settings({ verbose: true })
        .settings({ timeLimit: 5 })
        .solve(solver);

      expect(solver.calls).toHaveLength(1);
      expect(solver.calls[0]?.settings).toEqual({ verbose: true, timeLimit: 5 });
      expect(solver.calls[0]?.program.bounds).toEqual(nonneg);
    });
  });

  describe('solve', () => {
    it('returns the optimum', async () => {
      const solver = new FakeSolver(
        fixedResult({ status: 'optimal', objVal: 10, x: Float64Array.from([10, 0]), solveTime: 0.25 })
      );
      const solution = await LinearProblem.minimize([1, 2]).subjectTo([budget]).solve(solver);

      expect(solution.status).toBe('optimal');
      expect(solution.value).toBe(10);
      expect(Array.from(solution.x)).toEqual([10, 0]);
      expect(solution.solveTime).toBe(0.25);
    });

    it('computes the objective when the solver omits it', async () => {
      const solver = new FakeSolver(fixedResult({ status: 'optimal', x: Float64Array.from([4, 6]) }));
      const solution = await LinearProblem.minimize([1, 2]).solve(solver);
      expect(solution.value).toBe(16);
    });

    it('throws InfeasibleError', async () => {
      const solver = new FakeSolver(fixedResult({ status: 'infeasible' }));
      const problem = LinearProblem.minimize([1, 2]).subjectTo([budget]);

      await expect(problem.solve(solver)).rejects.toThrow(InfeasibleError);
      await expect(problem.solve(solver)).rejects.toThrow(OptimizationError);
    });

    it('throws UnboundedError', async () => {
      const solver = new FakeSolver(fixedResult({ status: 'unbounded' }));
      await expect(LinearProblem.minimize([-1]).solve(solver)).rejects.toThrow(UnboundedError);
    });

    it('reports other statuses on OptimizationError', async () => {
      const solver = new FakeSolver(fixedResult({ status: 'max_iterations' }));
      const error: unknown = await LinearProblem.minimize([1])
        .solve(solver)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OptimizationError);
      expect(error).not.toBeInstanceOf(InfeasibleError);
      if (error instanceof OptimizationError) {
        expect(error.status).toBe('max_iterations');
        expect(error.message).toBe('Optimization failed with status max_iterations');
      }
    });

    it('reports a crashing solver as an OptimizationError', async () => {
      const solver = new FakeSolver(() => {
        throw new Error('HiGHS error -1');
      });
      const error: unknown = await LinearProblem.minimize([1])
        .solve(solver)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SolverError);
      expect(error).toBeInstanceOf(OptimizationError);
      if (error instanceof OptimizationError) {
        expect(error.status).toBe('numerical_error');
        expect(error.message).toBe('Solver failed: HiGHS error -1');
      }
    });

    it('passes solver errors through unchanged', async () => {
      const original = new SolverError('HiGHS solver error: bad model');
      const solver = new FakeSolver(() => {
        throw original;
      });
      const error: unknown = await LinearProblem.minimize([1])
        .solve(solver)
        .catch((e: unknown) => e);

      expect(error).toBe(original);
    });

    it('rejects a solution of the wrong length', async () => {
      const solver = new FakeSolver(fixedResult({ status: 'optimal', x: Float64Array.from([1]) }));
      await expect(LinearProblem.minimize([1, 2]).solve(solver)).rejects.toThrow(ShapeError);
    });
  });
});
