/**
 * Valuation error taxonomy. Every error here aborts the run except
 * terminal-value failures inside a sensitivity grid cell.
 */

export type ValuationErrorCode =
  | 'validation_failed'
  | 'invalid_assumption'
  | 'invalid_terminal_value'
  | 'unknown_provenance'
  | 'division_by_zero';

export class ValuationError extends Error {
  constructor(
    message: string,
    public code: ValuationErrorCode
  ) {
    super(message);
    this.name = 'ValuationError';
  }
}

export class ValidationError extends ValuationError {
  constructor(
    message: string,
    public field: string,
    public details: string[] = []
  ) {
    super(`${field}: ${message}`, 'validation_failed');
    this.name = 'ValidationError';
  }
}

export class InvalidAssumptionError extends ValuationError {
  constructor(
    message: string,
    public assumption: string
  ) {
    super(`${assumption}: ${message}`, 'invalid_assumption');
    this.name = 'InvalidAssumptionError';
  }
}

export class InvalidTerminalValueError extends ValuationError {
  constructor(
    public wacc: number,
    public terminalGrowth: number
  ) {
    super(
      `cost of capital (${wacc}) must exceed terminal growth (${terminalGrowth}) for the Gordon method`,
      'invalid_terminal_value'
    );
    this.name = 'InvalidTerminalValueError';
  }
}

export class UnknownProvenanceError extends ValuationError {
  constructor(public tag: string) {
    super(`unknown provenance tag "${tag}"`, 'unknown_provenance');
    this.name = 'UnknownProvenanceError';
  }
}

export class DivisionByZeroError extends ValuationError {
  constructor(
    message: string,
    public divisor: string
  ) {
    super(message, 'division_by_zero');
    this.name = 'DivisionByZeroError';
  }
}
