import type { SolveStatus } from './problem.js';

/**
 * Base error class for capm-rebalancer.
 */
export class RebalanceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RebalanceError';
  }
}

/**
 * A single problem found while validating portfolio input.
 */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Error thrown when portfolio or market input is malformed.
 */
export class ValidationError extends RebalanceError {
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(issues.length > 0 ? `${message}: ${formatIssues(issues)}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Error thrown when a formula is undefined for its inputs
 * (zero denominators, zero total investment, non-finite results).
 */
export class DomainError extends RebalanceError {
  constructor(message: string) {
    super(message);
    this.name = 'DomainError';
  }
}

/**
 * Error thrown when problem dimensions are incompatible.
 */
export class ShapeError extends RebalanceError {
  readonly expected: string;
  readonly got: string;

  constructor(message: string, expected: string, got: string) {
    super(`${message}: expected ${expected}, got ${got}`);
    this.name = 'ShapeError';
    this.expected = expected;
    this.got = got;
  }
}

/**
 * Error thrown when the solver returns without an optimal solution.
 */
export class OptimizationError extends RebalanceError {
  readonly status: SolveStatus;

  constructor(status: SolveStatus, message = `Optimization failed with status ${status}`) {
    super(message);
    this.name = 'OptimizationError';
    this.status = status;
  }
}

/**
 * Error thrown when the solver itself fails (loading, crashes, rejected input).
 */
export class SolverError extends OptimizationError {
  constructor(message: string) {
    super('numerical_error', message);
    this.name = 'SolverError';
  }
}

/**
 * Error thrown when problem is infeasible.
 */
export class InfeasibleError extends OptimizationError {
  constructor(message = 'Problem is infeasible') {
    super('infeasible', message);
    this.name = 'InfeasibleError';
  }
}

/**
 * Error thrown when problem is unbounded.
 */
export class UnboundedError extends OptimizationError {
  constructor(message = 'Problem is unbounded') {
    super('unbounded', message);
    this.name = 'UnboundedError';
  }
}

function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
}
