export class SynthesisError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "SynthesisError";
  }
}

/**
 * Raised when a parameter falls outside its documented domain. There is no
 * retry path: the caller has to correct the input.
 */
export class DomainError extends SynthesisError {
  readonly parameter: string;
  readonly value: unknown;

  constructor(parameter: string, value: unknown, expectation: string) {
    super(`Parameter '${parameter}' = ${String(value)} is outside its domain: ${expectation}.`);
    this.name = "DomainError";
    this.parameter = parameter;
    this.value = value;
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

export function assertFinite(parameter: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new DomainError(parameter, value, "expected a finite number");
  }
}

export function assertInRange(parameter: string, value: number, min: number, max: number): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new DomainError(parameter, value, `expected a value in [${min}, ${max}]`);
  }
}
