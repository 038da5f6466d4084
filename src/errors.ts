/**
 * Raised when configuration bookkeeping breaks, e.g. removing a subtree size that
 * is not present. Continuing would silently lose probability mass.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/** Raised when a leaf count, index or exponent leaves the safe integer range. */
export class OverflowError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = "OverflowError";
  }
}

/** Throws unless `value` is an integer; unsafe integers raise OverflowError. */
export function assertInteger(value: number, label: string): void {
  if (!Number.isInteger(value)) {
    throw new Error(`${label} must be an integer, got ${value}`);
  }
  if (!Number.isSafeInteger(value)) {
    throw new OverflowError(`${label} exceeds the safe integer range: ${value}`);
  }
}

/** Adds two non-negative integers, failing instead of losing precision. */
export function safeAdd(a: number, b: number, label: string): number {
  const sum = a + b;
  if (!Number.isSafeInteger(sum)) {
    throw new OverflowError(`${label} exceeds the safe integer range`);
  }
  return sum;
}

/** Multiplies two non-negative integers, failing instead of losing precision. */
export function safeMultiply(a: number, b: number, label: string): number {
  const product = a * b;
  if (!Number.isSafeInteger(product)) {
    throw new OverflowError(`${label} exceeds the safe integer range`);
  }
  return product;
}
