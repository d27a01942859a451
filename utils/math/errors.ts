// Errors thrown by the fixed-point helpers in ./fixed-point
export class ArithmeticOverflowError extends Error {
  readonly code = "ARITHMETIC_OVERFLOW";

  constructor(
    readonly operation: string,
    readonly operands: readonly bigint[],
  ) {
    super(`Arithmetic overflow in ${operation}(${operands.join(", ")})`);
    this.name = "ArithmeticOverflowError";
  }
}

export class DivisionByZeroError extends Error {
  readonly code = "DIVISION_BY_ZERO";

  constructor(
    readonly operation: string,
    readonly dividend: bigint,
  ) {
    super(`Division by zero in ${operation}(${dividend}, 0)`);
    this.name = "DivisionByZeroError";
  }
}

export class InvalidDomainError extends Error {
  readonly code = "INVALID_DOMAIN";

  constructor(
    readonly operation: string,
    // Decimals counts are plain numbers
    readonly input: bigint | number,
    reason: string,
  ) {
    super(`Invalid input for ${operation}: ${input} (${reason})`);
    this.name = "InvalidDomainError";
  }
}
