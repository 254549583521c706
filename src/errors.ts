export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  NO_PRIME_IMPLICANTS: 'NO_PRIME_IMPLICANTS',
  COVERAGE_GAP: 'COVERAGE_GAP',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export class MinimizerError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: string,
  ) {
    super(message);
    this.name = 'MinimizerError';
  }

  override toString(): string {
    return this.details ? `${this.message}\n  ${this.details}` : this.message;
  }
}

export function invalidInputError(message: string): MinimizerError {
  return new MinimizerError(`Invalid input: ${message}`, ErrorCodes.INVALID_INPUT);
}

export function noPrimeImplicantsError(): MinimizerError {
  return new MinimizerError(
    'The function has no prime implicants',
    ErrorCodes.NO_PRIME_IMPLICANTS,
    'At least one required minterm is needed; a function made only of don\'t-cares cannot be realized.',
  );
}

/**
 * A required minterm that no prime implicant covers. Generation is complete,
 * so seeing this means the generator is broken, not the input.
 */
export function coverageGapError(value: number): MinimizerError {
  return new MinimizerError(
    `Minterm ${value} is not covered by any prime implicant`,
    ErrorCodes.COVERAGE_GAP,
    'Internal invariant violated in prime implicant generation.',
  );
}

export function formatError(error: unknown): string {
  if (error instanceof MinimizerError) {
    return error.toString();
  }
  return error instanceof Error ? error.message : String(error);
}
