// src/import/errors.ts

/**
 * Raised when a product slot has a name and price but a quantity that is not a
 * positive whole number. The row is reported as failed instead of guessing.
 */
export class InvalidQuantityError extends Error {
  readonly column: string;
  readonly value: string;

  constructor(column: string, value: string) {
    super(`Invalid quantity "${value}" in ${column}`);
    this.name = 'InvalidQuantityError';
    this.column = column;
    this.value = value;
  }
}
