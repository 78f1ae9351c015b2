export type EstimateErrorCode = 'InvalidInput' | 'InvalidEnum';

export class EstimateInputError extends Error {
  code: EstimateErrorCode;
  field: string;

  constructor(code: EstimateErrorCode, field: string, message: string) {
    super(message);
    this.name = 'EstimateInputError';
    this.code = code;
    this.field = field;
  }
}

export function isEstimateInputError(e: unknown): e is EstimateInputError {
  return e instanceof EstimateInputError;
}

export function requirePositive(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new EstimateInputError('InvalidInput', field, `${field} must be a positive number (got ${value})`);
  }
  return value;
}

export function requireNonNegative(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new EstimateInputError('InvalidInput', field, `${field} must be zero or greater (got ${value})`);
  }
  return value;
}

export function requireOneOf<T extends string>(value: unknown, allowed: readonly T[], field: string): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new EstimateInputError(
      'InvalidEnum',
      field,
      `${field} must be one of ${allowed.join(', ')} (got ${String(value)})`,
    );
  }
  return match;
}
